import type { TripOrder } from './trip-order';

export const TRIP_EXECUTION_STATUSES = ['not_started', 'processing', 'completed', 'failed'] as const;

export type TripExecutionStatus = (typeof TRIP_EXECUTION_STATUSES)[number];

/**
 * One leg of the delivery route, as produced by the routing service.
 * Timestamps are Unix seconds.
 */
export interface RouteSegment {
  departureTime: number;
  arrivalTime: number;
  route: string;
}

export interface Trip {
  id: number;
  driver1Id: string | null;   // remote employee id
  driver2Id: string | null;
  vehicleId: string | null;   // remote vehicle id
  deliveryDate: Date | null;
  approximateStartTime: Date | null;
  routeSegments: Array<Partial<RouteSegment> | null> | null;
  executionStatus: TripExecutionStatus;
  createdAt: Date;
}

export interface TripWithOrders extends Trip {
  orders: TripOrder[];
}
