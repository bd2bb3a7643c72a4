/**
 * Trip Execution DTOs
 */

import { z } from 'zod';
import type { ExecutionRecordStatus } from '@trip-execution/shared';

export const TripIdParamsSchema = z.object({
  tripId: z.coerce
    .number({ invalid_type_error: 'tripId must be a number' })
    .int('tripId must be an integer')
    .positive('tripId must be positive'),
});

export type TripIdParams = z.infer<typeof TripIdParamsSchema>;

export interface ExecuteTripResponse {
  tripId: number;
  jobId: string;
  executionId: number;
  status: ExecutionRecordStatus;
  attached: boolean;
  message: string;
}
