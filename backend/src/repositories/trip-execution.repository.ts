/**
 * Trip Execution Repository
 *
 * Execution records. A partial unique index on trip_id allows at most one
 * active (queued or processing) row per trip; rows are never deleted.
 */

import { z } from 'zod';
import {
  ACTIVE_EXECUTION_STATUSES,
  ActiveExecutionStatus,
  TerminalExecutionStatus,
  TripExecution,
  executionRecordStatusSchema,
} from '@trip-execution/shared';
import type { DatabasePool, Queryable } from '../config/database';
import { BaseRepository, assertStatus } from './base.repository';

const tripExecutionRowSchema = z
  .object({
    id: z.coerce.number().int(),
    trip_id: z.coerce.number().int(),
    status: executionRecordStatusSchema,
    progress_message: z.string().nullable(),
    general_error: z.string().nullable(),
    job_id: z.string(),
    started_at: z.coerce.date().nullable(),
    completed_at: z.coerce.date().nullable(),
    created_at: z.coerce.date(),
    updated_at: z.coerce.date(),
  })
  .transform(
    (row): TripExecution => ({
      id: row.id,
      tripId: row.trip_id,
      status: row.status,
      progressMessage: row.progress_message,
      generalError: row.general_error,
      jobId: row.job_id,
      startedAt: row.started_at,
      completedAt: row.completed_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    })
  );

const ACTIVE = [...ACTIVE_EXECUTION_STATUSES];

export class TripExecutionRepository extends BaseRepository<TripExecution> {
  constructor(db: DatabasePool) {
    super(db, 'trip_executions', tripExecutionRowSchema);
  }

  /**
   * Inserts a queued row. Throws ConflictError when the trip already has an
   * active execution.
   */
  async insertActive(
    tripId: number,
    jobId: string,
    progressMessage: string,
    executor: Queryable = this.db
  ): Promise<TripExecution> {
    const result = await this.run(
      'insert',
      `INSERT INTO trip_executions (trip_id, status, progress_message, job_id)
       VALUES ($1, 'queued', $2, $3)
       RETURNING *`,
      [tripId, progressMessage, jobId],
      executor
    );
    return this.mapRow(result.rows[0]);
  }

  /**
   * Locks the trip's active row for the rest of the transaction.
   */
  async lockActive(tripId: number, executor: Queryable = this.db): Promise<TripExecution | null> {
    const result = await this.run(
      'lock',
      `SELECT * FROM trip_executions
        WHERE trip_id = $1 AND status = ANY($2::text[])
        FOR UPDATE`,
      [tripId, ACTIVE],
      executor
    );
    return this.firstOrNull(result);
  }

  /**
   * Moves an active row between active statuses. Returns null when the row
   * is no longer active.
   */
  async updateActiveStatus(
    id: number,
    status: ActiveExecutionStatus,
    progressMessage: string,
    executor: Queryable = this.db
  ): Promise<TripExecution | null> {
    const value = assertStatus(executionRecordStatusSchema, status, 'execution');

    const result = await this.run(
      'update status of',
      `UPDATE trip_executions
          SET status = $2,
              progress_message = $3,
              started_at = CASE WHEN $2 = 'processing' THEN COALESCE(started_at, now()) ELSE started_at END,
              updated_at = now()
        WHERE id = $1 AND status = ANY($4::text[])
        RETURNING *`,
      [id, value, progressMessage, ACTIVE],
      executor
    );
    return this.firstOrNull(result);
  }

  /**
   * Moves an active row to a terminal status. Returns null when the row was
   * already finalized.
   */
  async finalizeActive(
    id: number,
    status: TerminalExecutionStatus,
    progressMessage: string,
    generalError: string | null,
    executor: Queryable = this.db
  ): Promise<TripExecution | null> {
    const value = assertStatus(executionRecordStatusSchema, status, 'execution');

    const result = await this.run(
      'finalize',
      `UPDATE trip_executions
          SET status = $2,
              progress_message = $3,
              general_error = $4,
              completed_at = now(),
              updated_at = now()
        WHERE id = $1 AND status = ANY($5::text[])
        RETURNING *`,
      [id, value, progressMessage, generalError, ACTIVE],
      executor
    );
    return this.firstOrNull(result);
  }

  /**
   * Most recent execution of a trip, active or not
   */
  async findLatestByTrip(tripId: number, executor: Queryable = this.db): Promise<TripExecution | null> {
    const result = await this.run(
      'find latest',
      `SELECT * FROM trip_executions WHERE trip_id = $1 ORDER BY created_at DESC, id DESC LIMIT 1`,
      [tripId],
      executor
    );
    return this.firstOrNull(result);
  }

  /**
   * Active rows not written since `olderThan`
   */
  async findStaleActive(olderThan: Date, executor: Queryable = this.db): Promise<TripExecution[]> {
    const result = await this.run(
      'find stale',
      `SELECT * FROM trip_executions
        WHERE status = ANY($1::text[]) AND updated_at < $2
        ORDER BY updated_at ASC`,
      [ACTIVE, olderThan],
      executor
    );
    return this.mapRows(result.rows);
  }
}
