/**
 * Execution State Store
 *
 * The only writer of trip, order and execution status. The orchestrator,
 * the job runner and the HTTP layer depend on the ExecutionStateStore
 * interface; PgExecutionStateStore is the PostgreSQL implementation.
 */

import { randomUUID } from 'crypto';
import type {
  ActiveExecutionStatus,
  ExecutionRecordStatus,
  TerminalExecutionStatus,
  Trip,
  TripExecution,
  TripExecutionStatus,
  TripOrder,
  TripOrderStatus,
  TripWithOrders,
} from '@trip-execution/shared';
import { Queryable, withTransaction } from '../config/database';
import { ConflictError } from '../models/errors/api-error';
import type { OrderStatusFields, RepositoryContainer } from '../repositories';
import { logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface ExecutionHandle {
  executionId: number;
  tripId: number;
  jobId: string;
}

export interface UpsertResult {
  handle: ExecutionHandle;
  /** false when an active execution already existed and was attached to */
  created: boolean;
  status: ExecutionRecordStatus;
}

export interface FinalizeOptions {
  progressMessage: string;
  generalError?: string | null;
}

export interface ExecutionSnapshot {
  trip: Trip;
  execution: TripExecution | null;
  orders: TripOrder[];
}

export type { OrderStatusFields };

export interface ExecutionStateStore {
  loadTrip(tripId: number): Promise<TripWithOrders | null>;
  /**
   * Creates the trip's active execution or attaches to the existing one. An
   * active row last written before `staleBefore` is finalized as interrupted
   * and replaced.
   */
  upsertExecution(tripId: number, staleBefore?: Date): Promise<UpsertResult>;
  /** Returns false when the execution is no longer active. */
  setStatus(handle: ExecutionHandle, status: ActiveExecutionStatus, message: string): Promise<boolean>;
  setTripStatus(tripId: number, status: TripExecutionStatus): Promise<void>;
  resetOrders(tripId: number): Promise<void>;
  /** Returns false when the execution is no longer active and nothing was written. */
  setOrderStatus(
    handle: ExecutionHandle,
    orderId: number,
    status: TripOrderStatus,
    fields?: OrderStatusFields
  ): Promise<boolean>;
  /** Returns false when the execution had already been finalized. */
  finalize(handle: ExecutionHandle, status: TerminalExecutionStatus, options: FinalizeOptions): Promise<boolean>;
  getSnapshot(tripId: number): Promise<ExecutionSnapshot | null>;
  findStaleExecutions(olderThan: Date): Promise<ExecutionHandle[]>;
}

export const QUEUED_MESSAGE = 'Queued for execution';

export const INTERRUPTED_MESSAGE = 'Execution interrupted before completion';

const INSERT_SAVEPOINT = 'execution_insert';

/** Insert attempts when the conflicting row keeps finishing before it can be locked */
const UPSERT_ATTEMPTS = 3;

export function toHandle(execution: TripExecution): ExecutionHandle {
  return { executionId: execution.id, tripId: execution.tripId, jobId: execution.jobId };
}

// ============================================================================
// PostgreSQL implementation
// ============================================================================

export class PgExecutionStateStore implements ExecutionStateStore {
  constructor(private readonly repos: RepositoryContainer) {}

  async loadTrip(tripId: number): Promise<TripWithOrders | null> {
    const trip = await this.repos.trips.findById(tripId);
    if (!trip) {
      return null;
    }
    const orders = await this.repos.orders.findByTrip(tripId);
    return { ...trip, orders };
  }

  /**
   * Insert first; on a unique violation roll back to the savepoint and
   * attach to the row that won. When that row finished before it could be
   * locked, or is stale, the insert is tried again. The transaction is never
   * left aborted.
   */
  async upsertExecution(tripId: number, staleBefore?: Date): Promise<UpsertResult> {
    return withTransaction(this.repos.db, async (client) => {
      for (let attempt = 1; attempt <= UPSERT_ATTEMPTS; attempt++) {
        const created = await this.tryInsert(tripId, client);
        if (created) {
          logger.info('Execution record created', { tripId, executionId: created.id, jobId: created.jobId });
          return { handle: toHandle(created), created: true, status: created.status };
        }

        const existing = await this.repos.executions.lockActive(tripId, client);
        if (!existing) {
          logger.debug('Active execution finished before lock, retrying insert', { tripId, attempt });
          continue;
        }

        if (staleBefore && existing.updatedAt.getTime() < staleBefore.getTime()) {
          await this.repos.executions.finalizeActive(
            existing.id,
            'failed',
            INTERRUPTED_MESSAGE,
            INTERRUPTED_MESSAGE,
            client
          );
          await this.repos.trips.setExecutionStatus(tripId, 'failed', client);
          logger.warn('Replacing stale execution', {
            tripId,
            executionId: existing.id,
            updatedAt: existing.updatedAt.toISOString(),
          });
          continue;
        }

        logger.info('Attached to active execution', { tripId, executionId: existing.id, jobId: existing.jobId });
        return { handle: toHandle(existing), created: false, status: existing.status };
      }

      throw new ConflictError(`Execution for trip ${tripId} changed concurrently, retry the request`);
    });
  }

  private async tryInsert(tripId: number, client: Queryable): Promise<TripExecution | null> {
    await client.query(`SAVEPOINT ${INSERT_SAVEPOINT}`);

    try {
      const created = await this.repos.executions.insertActive(tripId, randomUUID(), QUEUED_MESSAGE, client);
      await client.query(`RELEASE SAVEPOINT ${INSERT_SAVEPOINT}`);
      return created;
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }
      await client.query(`ROLLBACK TO SAVEPOINT ${INSERT_SAVEPOINT}`);
      return null;
    }
  }

  async setStatus(handle: ExecutionHandle, status: ActiveExecutionStatus, message: string): Promise<boolean> {
    const updated = await this.repos.executions.updateActiveStatus(handle.executionId, status, message);
    if (!updated) {
      logger.warn('Status write ignored, execution no longer active', {
        executionId: handle.executionId,
        status,
      });
    }
    return updated !== null;
  }

  async setTripStatus(tripId: number, status: TripExecutionStatus): Promise<void> {
    await this.repos.trips.setExecutionStatus(tripId, status);
  }

  async resetOrders(tripId: number): Promise<void> {
    const count = await this.repos.orders.resetForTrip(tripId);
    logger.debug('Orders reset', { tripId, count });
  }

  async setOrderStatus(
    handle: ExecutionHandle,
    orderId: number,
    status: TripOrderStatus,
    fields: OrderStatusFields = {}
  ): Promise<boolean> {
    const written = await this.repos.orders.updateStatusForExecution(
      handle.tripId,
      orderId,
      handle.executionId,
      status,
      fields
    );
    if (!written) {
      logger.warn('Order write ignored, execution no longer active', {
        executionId: handle.executionId,
        orderId,
        status,
      });
    }
    return written;
  }

  /**
   * Terminal write for the execution and the trip in one transaction. Only
   * an active row is moved, so a late writer cannot replace a timeout.
   */
  async finalize(
    handle: ExecutionHandle,
    status: TerminalExecutionStatus,
    options: FinalizeOptions
  ): Promise<boolean> {
    return withTransaction(this.repos.db, async (client) => {
      const finalized = await this.repos.executions.finalizeActive(
        handle.executionId,
        status,
        options.progressMessage,
        options.generalError ?? null,
        client
      );

      if (!finalized) {
        logger.warn('Finalize ignored, execution already terminal', {
          executionId: handle.executionId,
          status,
        });
        return false;
      }

      await this.repos.trips.setExecutionStatus(handle.tripId, status, client);

      logger.info('Execution finalized', {
        tripId: handle.tripId,
        executionId: handle.executionId,
        status,
        generalError: finalized.generalError,
      });
      return true;
    });
  }

  async getSnapshot(tripId: number): Promise<ExecutionSnapshot | null> {
    const trip = await this.repos.trips.findById(tripId);
    if (!trip) {
      return null;
    }

    const [execution, orders] = await Promise.all([
      this.repos.executions.findLatestByTrip(tripId),
      this.repos.orders.findByTrip(tripId),
    ]);

    return { trip, execution, orders };
  }

  async findStaleExecutions(olderThan: Date): Promise<ExecutionHandle[]> {
    const stale = await this.repos.executions.findStaleActive(olderThan);
    return stale.map(toHandle);
  }
}
