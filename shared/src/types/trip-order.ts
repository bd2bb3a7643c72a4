export const TRIP_ORDER_STATUSES = [
  'pending',
  'skipped',
  'sublotted',
  'inventory_moved',
  'manifested',
  'failed',
] as const;

export type TripOrderStatus = (typeof TRIP_ORDER_STATUSES)[number];

/**
 * An inventory unit to split for an order. `quantity` is kept as it was
 * stored; it is checked to be a positive number only when the order runs.
 */
export interface LineItem {
  unitId: string;
  quantity?: unknown;
}

export interface TripOrder {
  id: number;
  tripId: number;
  orderRef: string;
  sequenceOrder: number;
  lineItems: LineItem[];
  targetRoom: string | null;
  counterpartLicense: string | null;
  address: string | null;
  status: TripOrderStatus;
  errorMessage: string | null;
  manifestId: string | null;
  newUnitIds: string[];
}
