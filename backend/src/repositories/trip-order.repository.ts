/**
 * Trip Order Repository
 *
 * Data access for the orders on a trip and their per-order execution state.
 */

import { z } from 'zod';
import {
  ACTIVE_EXECUTION_STATUSES,
  TripOrder,
  TripOrderStatus,
  lineItemsSchema,
  tripOrderStatusSchema,
} from '@trip-execution/shared';
import type { DatabasePool, Queryable } from '../config/database';
import { BaseRepository, assertStatus } from './base.repository';

const tripOrderRowSchema = z
  .object({
    id: z.coerce.number().int(),
    trip_id: z.coerce.number().int(),
    order_ref: z.string(),
    sequence_order: z.coerce.number().int(),
    line_items: lineItemsSchema,
    target_room: z.string().nullable(),
    counterpart_license: z.string().nullable(),
    address: z.string().nullable(),
    status: tripOrderStatusSchema,
    error_message: z.string().nullable(),
    manifest_id: z.string().nullable(),
    new_unit_ids: z.array(z.string()).nullable().catch(null),
  })
  .transform(
    (row): TripOrder => ({
      id: row.id,
      tripId: row.trip_id,
      orderRef: row.order_ref,
      sequenceOrder: row.sequence_order,
      lineItems: row.line_items,
      targetRoom: row.target_room,
      counterpartLicense: row.counterpart_license,
      address: row.address,
      status: row.status,
      errorMessage: row.error_message,
      manifestId: row.manifest_id,
      newUnitIds: row.new_unit_ids ?? [],
    })
  );

const ACTIVE = [...ACTIVE_EXECUTION_STATUSES];

export interface OrderStatusFields {
  errorMessage?: string | null;
  manifestId?: string | null;
  newUnitIds?: string[];
}

export class TripOrderRepository extends BaseRepository<TripOrder> {
  constructor(db: DatabasePool) {
    super(db, 'trip_orders', tripOrderRowSchema);
  }

  /**
   * Orders of a trip in execution order
   */
  async findByTrip(tripId: number, executor: Queryable = this.db): Promise<TripOrder[]> {
    const result = await this.run(
      'list',
      `SELECT * FROM trip_orders WHERE trip_id = $1 ORDER BY sequence_order ASC, id ASC`,
      [tripId],
      executor
    );
    return this.mapRows(result.rows);
  }

  /**
   * Clears the outcome of any previous attempt.
   */
  async resetForTrip(tripId: number, executor: Queryable = this.db): Promise<number> {
    const result = await this.run(
      'reset',
      `UPDATE trip_orders
          SET status = 'pending', error_message = NULL, manifest_id = NULL,
              new_unit_ids = '[]'::jsonb, updated_at = now()
        WHERE trip_id = $1`,
      [tripId],
      executor
    );
    return result.rowCount ?? 0;
  }

  /**
   * Writes an order's status plus whichever outcome fields are given, only
   * while `executionId` is still active. Returns false when nothing was
   * written, so a timed-out run cannot overwrite its successor's rows.
   */
  async updateStatusForExecution(
    tripId: number,
    orderId: number,
    executionId: number,
    status: TripOrderStatus,
    fields: OrderStatusFields = {},
    executor: Queryable = this.db
  ): Promise<boolean> {
    const values: unknown[] = [
      tripId,
      orderId,
      executionId,
      ACTIVE,
      assertStatus(tripOrderStatusSchema, status, 'trip order'),
    ];
    const assignments = ['status = $5', 'updated_at = now()'];

    if (fields.errorMessage !== undefined) {
      values.push(fields.errorMessage);
      assignments.push(`error_message = $${values.length}`);
    }
    if (fields.manifestId !== undefined) {
      values.push(fields.manifestId);
      assignments.push(`manifest_id = $${values.length}`);
    }
    if (fields.newUnitIds !== undefined) {
      values.push(JSON.stringify(fields.newUnitIds));
      assignments.push(`new_unit_ids = $${values.length}::jsonb`);
    }

    const result = await this.run(
      'update status of',
      `UPDATE trip_orders SET ${assignments.join(', ')}
        WHERE trip_id = $1 AND id = $2
          AND EXISTS (SELECT 1 FROM trip_executions WHERE id = $3 AND status = ANY($4::text[]))`,
      values,
      executor
    );
    return (result.rowCount ?? 0) > 0;
  }
}
