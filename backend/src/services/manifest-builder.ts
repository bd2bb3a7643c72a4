/**
 * Manifest stop grouping and timing.
 */

import type { RouteSegment, Trip } from '@trip-execution/shared';
import type { OrderResult } from './order-processor.service';

// ============================================================================
// Constants
// ============================================================================

/** Gap between synthetic departures of consecutive stops */
export const STOP_INTERVAL_MS = 30 * 60 * 1000;

/** Synthetic travel time of one stop */
export const STOP_DURATION_MS = 15 * 60 * 1000;

export const ROUTE_FALLBACK_TEXT = 'Route directions not available';

// ============================================================================
// Stops
// ============================================================================

export interface ManifestStop {
  stopNumber: number;
  /** Position of the stop's first order in the trip sequence; indexes the route segments */
  routeIndex: number;
  counterpartLicense: string;
  orderIds: number[];
  unitIds: string[];
}

export interface MovedOrder {
  result: OrderResult;
  counterpartLicense: string;
  /** 0-based position of the order among all orders of the trip */
  position: number;
}

/**
 * Groups moved orders into stops. Consecutive orders (in sequence) with the
 * same counterpart license share a stop; stop numbers start at 1.
 */
export function groupStops(moved: MovedOrder[]): ManifestStop[] {
  const stops: ManifestStop[] = [];

  for (const { result, counterpartLicense, position } of moved) {
    const current = stops[stops.length - 1];

    if (current && current.counterpartLicense === counterpartLicense) {
      current.orderIds.push(result.orderId);
      current.unitIds.push(...result.newUnitIds);
      continue;
    }

    stops.push({
      stopNumber: stops.length + 1,
      routeIndex: position,
      counterpartLicense,
      orderIds: [result.orderId],
      unitIds: [...result.newUnitIds],
    });
  }

  return stops;
}

// ============================================================================
// Timing
// ============================================================================

export interface StopTiming {
  departureTime: Date;
  arrivalTime: Date;
  route: string;
  synthetic: boolean;
}

function isCompleteSegment(segment: Partial<RouteSegment> | null | undefined): segment is RouteSegment {
  return (
    !!segment &&
    typeof segment.departureTime === 'number' &&
    typeof segment.arrivalTime === 'number' &&
    typeof segment.route === 'string' &&
    segment.route.trim().length > 0
  );
}

/**
 * Route segment `routeIndex` when it is complete, otherwise synthetic
 * timing off the trip start: departure = start + routeIndex * 30 min,
 * arrival = departure + 15 min. Segments follow the order sequence, so a
 * stop keeps its own leg when earlier orders failed.
 */
export function resolveStopTiming(trip: Trip, routeIndex: number, now: Date): StopTiming {
  const segment = trip.routeSegments?.[routeIndex];

  if (isCompleteSegment(segment)) {
    return {
      departureTime: new Date(segment.departureTime * 1000),
      arrivalTime: new Date(segment.arrivalTime * 1000),
      route: segment.route,
      synthetic: false,
    };
  }

  const start = trip.approximateStartTime ?? now;
  const departure = new Date(start.getTime() + routeIndex * STOP_INTERVAL_MS);

  return {
    departureTime: departure,
    arrivalTime: new Date(departure.getTime() + STOP_DURATION_MS),
    route: ROUTE_FALLBACK_TEXT,
    synthetic: true,
  };
}
