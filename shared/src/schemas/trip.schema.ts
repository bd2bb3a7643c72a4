import { z } from 'zod';
import { TRIP_EXECUTION_STATUSES } from '../types/trip';
import { TRIP_ORDER_STATUSES } from '../types/trip-order';
import { EXECUTION_RECORD_STATUSES } from '../types/execution';

export const tripExecutionStatusSchema = z.enum(TRIP_EXECUTION_STATUSES);
export const tripOrderStatusSchema = z.enum(TRIP_ORDER_STATUSES);
export const executionRecordStatusSchema = z.enum(EXECUTION_RECORD_STATUSES);

/**
 * Route segments are stored as JSON on the trip. Fields are individually
 * optional so that a partially populated segment is still readable; the
 * orchestrator decides per stop whether a segment is complete.
 */
export const routeSegmentSchema = z
  .object({
    departure_time: z.coerce.number().int().nonnegative().optional(),
    arrival_time: z.coerce.number().int().nonnegative().optional(),
    route: z.string().optional(),
  })
  .transform((segment) => ({
    departureTime: segment.departure_time,
    arrivalTime: segment.arrival_time,
    route: segment.route,
  }));

export const routeSegmentsSchema = z.array(routeSegmentSchema.nullable().catch(null));

/**
 * A malformed unit id is kept as an empty string so that the order is
 * skipped at run time instead of failing to load.
 */
export const lineItemSchema = z.object({
  unitId: z
    .unknown()
    .transform((value) => (typeof value === 'string' || typeof value === 'number' ? String(value) : '')),
  quantity: z.unknown(),
});

export const lineItemsSchema = z.array(lineItemSchema);
