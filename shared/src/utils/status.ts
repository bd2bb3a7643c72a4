import type { TripExecutionStatus } from '../types/trip';
import type { TripOrderStatus } from '../types/trip-order';
import type { ActiveExecutionStatus, ExecutionRecordStatus } from '../types/execution';
import { ACTIVE_EXECUTION_STATUSES } from '../types/execution';

export const TRIP_EXECUTION_STATUS_LABELS: Record<TripExecutionStatus, string> = {
  not_started: 'Not Started',
  processing: 'Processing',
  completed: 'Completed',
  failed: 'Failed',
};

export const TRIP_ORDER_STATUS_LABELS: Record<TripOrderStatus, string> = {
  pending: 'Pending',
  skipped: 'Skipped',
  sublotted: 'Sublotted',
  inventory_moved: 'Inventory Moved',
  manifested: 'Manifested',
  failed: 'Failed',
};

export function tripExecutionStatusLabel(status: TripExecutionStatus): string {
  return TRIP_EXECUTION_STATUS_LABELS[status] ?? status;
}

export function tripOrderStatusLabel(status: TripOrderStatus): string {
  return TRIP_ORDER_STATUS_LABELS[status] ?? status;
}

export function isActiveExecutionStatus(status: ExecutionRecordStatus): status is ActiveExecutionStatus {
  return ACTIVE_EXECUTION_STATUSES.some((active) => active === status);
}

/**
 * Order statuses that end an order's run. `inventory_moved` is not final:
 * the order still waits for its stop's manifest.
 */
export function isSettledOrderStatus(status: TripOrderStatus): boolean {
  return status === 'skipped' || status === 'manifested' || status === 'failed';
}
