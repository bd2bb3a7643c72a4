/**
 * Test data builders
 */

import type { Trip, TripOrder, TripWithOrders } from '@trip-execution/shared';

export const VALID_UNIT_A = '1234567890123456';
export const VALID_UNIT_B = '6543210987654321';
export const VALID_UNIT_C = '1111222233334444';

export function buildTrip(overrides: Partial<Trip> = {}): Trip {
  return {
    id: 1,
    driver1Id: 'EMP-1',
    driver2Id: 'EMP-2',
    vehicleId: 'VEH-1',
    deliveryDate: new Date('2026-03-02T00:00:00Z'),
    approximateStartTime: new Date('2026-03-02T08:00:00Z'),
    routeSegments: null,
    executionStatus: 'not_started',
    createdAt: new Date('2026-03-01T12:00:00Z'),
    ...overrides,
  };
}

export function buildOrder(overrides: Partial<TripOrder> = {}): TripOrder {
  return {
    id: 10,
    tripId: 1,
    orderRef: 'ORD-10',
    sequenceOrder: 1,
    lineItems: [{ unitId: VALID_UNIT_A, quantity: 5 }],
    targetRoom: 'Room-7',
    counterpartLicense: 'LIC-100',
    address: '1 Test Street',
    status: 'pending',
    errorMessage: null,
    manifestId: null,
    newUnitIds: [],
    ...overrides,
  };
}

export function buildTripWithOrders(
  trip: Partial<Trip> = {},
  orders: Array<Partial<TripOrder>> = [{}]
): TripWithOrders {
  const base = buildTrip(trip);
  return {
    ...base,
    orders: orders.map((order, index) =>
      buildOrder({
        id: 10 + index,
        orderRef: `ORD-${10 + index}`,
        sequenceOrder: index + 1,
        ...order,
        tripId: base.id,
      })
    ),
  };
}
