import type { TripExecutionStatus } from './trip';
import type { TripOrderStatus } from './trip-order';

export const EXECUTION_RECORD_STATUSES = ['queued', 'processing', 'completed', 'failed'] as const;

export type ExecutionRecordStatus = (typeof EXECUTION_RECORD_STATUSES)[number];

export type ActiveExecutionStatus = Extract<ExecutionRecordStatus, 'queued' | 'processing'>;
export type TerminalExecutionStatus = Exclude<ExecutionRecordStatus, ActiveExecutionStatus>;

export const ACTIVE_EXECUTION_STATUSES: readonly ActiveExecutionStatus[] = ['queued', 'processing'];

export interface TripExecution {
  id: number;
  tripId: number;
  status: ExecutionRecordStatus;
  progressMessage: string | null;
  generalError: string | null;
  jobId: string;
  startedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface OrderStatusView {
  orderId: number;
  orderRef: string;
  sequenceOrder: number;
  status: TripOrderStatus;
  errorMessage: string | null;
  manifestId: string | null;
}

/**
 * What a polling client sees for a trip.
 */
export interface ExecutionStatusView {
  tripId: number;
  status: ExecutionRecordStatus | 'not_started';
  tripStatus: TripExecutionStatus;
  progressMessage: string | null;
  generalError: string | null;
  progressPercentage: number;
  jobId: string | null;
  startedAt: string | null;
  completedAt: string | null;
  orders: OrderStatusView[];
}
