/**
 * Inventory API wire schemas.
 *
 * Every response shares one envelope: a `success` flag ("1"/"0", sometimes
 * a number or boolean) and, on rejection, `error` and `errorcode`.
 */

import { z } from 'zod';

export const INVENTORY_API_VERSION = '4.0';

export type InventoryAction = 'login' | 'inventory_split' | 'inventory_move' | 'inventory_manifest';

const successFlagSchema = z.union([
  z.literal('1'),
  z.literal(1),
  z.literal(true),
  z.literal('0'),
  z.literal(0),
  z.literal(false),
]);

export const envelopeSchema = z
  .object({
    success: successFlagSchema,
    error: z.unknown().optional(),
    errorcode: z.unknown().optional(),
  })
  .passthrough();

export type Envelope = z.infer<typeof envelopeSchema>;

export function isSuccessFlag(flag: Envelope['success']): boolean {
  return flag === '1' || flag === 1 || flag === true;
}

// Numeric ids above 2^53 have already lost digits in JSON.parse
const remoteIdSchema = z
  .union([
    z.string().min(1),
    z.number().refine(Number.isSafeInteger, { message: 'Numeric id is not a safe integer' }),
  ])
  .transform((value) => String(value));

export const loginPayloadSchema = z.object({
  sessionid: z.string().min(1),
});

export const splitPayloadSchema = z.object({
  barcode_id: z.array(remoteIdSchema),
});

export const movePayloadSchema = z.object({
  transactionid: remoteIdSchema.optional(),
});

export const manifestPayloadSchema = z.object({
  barcode_id: remoteIdSchema,
});

// ============================================================================
// Request bodies
// ============================================================================

export interface RequestEnvelope {
  API: typeof INVENTORY_API_VERSION;
  action: InventoryAction;
  sessionid?: string;
  training: '0' | '1';
}

export interface SplitLine {
  barcodeid: string;
  remove_quantity: string;
}

export interface MoveLine {
  barcodeid: string;
  room: string;
}

export interface StopOverview {
  approximate_departure: string;
  approximate_arrival: string;
  approximate_route: string;
  stop_number: string;
  vendor_license: string;
  barcodeid: string[];
}
