/**
 * Trip Repository
 *
 * Data access for trips and their execution status.
 */

import { z } from 'zod';
import {
  Trip,
  TripExecutionStatus,
  routeSegmentsSchema,
  tripExecutionStatusSchema,
} from '@trip-execution/shared';
import type { DatabasePool, Queryable } from '../config/database';
import { BaseRepository, assertStatus } from './base.repository';

const tripRowSchema = z
  .object({
    id: z.coerce.number().int(),
    driver1_id: z.string().nullable(),
    driver2_id: z.string().nullable(),
    vehicle_id: z.string().nullable(),
    delivery_date: z.coerce.date().nullable(),
    approximate_start_time: z.coerce.date().nullable(),
    route_data: routeSegmentsSchema.nullable().catch(null),
    execution_status: tripExecutionStatusSchema,
    created_at: z.coerce.date(),
  })
  .transform(
    (row): Trip => ({
      id: row.id,
      driver1Id: row.driver1_id,
      driver2Id: row.driver2_id,
      vehicleId: row.vehicle_id,
      deliveryDate: row.delivery_date,
      approximateStartTime: row.approximate_start_time,
      routeSegments: row.route_data,
      executionStatus: row.execution_status,
      createdAt: row.created_at,
    })
  );

export class TripRepository extends BaseRepository<Trip> {
  constructor(db: DatabasePool) {
    super(db, 'trips', tripRowSchema);
  }

  /**
   * Sets trips.execution_status
   */
  async setExecutionStatus(
    tripId: number,
    status: TripExecutionStatus,
    executor: Queryable = this.db
  ): Promise<void> {
    const value = assertStatus(tripExecutionStatusSchema, status, 'trip execution');

    await this.run(
      'update execution status of',
      `UPDATE trips SET execution_status = $2, updated_at = now() WHERE id = $1`,
      [tripId, value],
      executor
    );
  }
}
