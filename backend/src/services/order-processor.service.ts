/**
 * Order Processor
 *
 * Runs one order through split and move:
 *
 *   pending → skipped                       (no valid unit ids, no remote call)
 *   pending → sublotted → inventory_moved   (waits for its stop's manifest)
 *   any failure → failed                    (errorMessage recorded on the order)
 *
 * process() never throws. Every error is persisted on the order and
 * returned as a result so the orchestrator can continue with the next order.
 */

import { normalizeUnitId, partitionUnitIds } from '@trip-execution/shared';
import type { LineItem, TripOrder, TripOrderStatus } from '@trip-execution/shared';
import type { InventoryGateway, SessionToken, SplitRequestItem } from '../clients/inventory.client';
import { ConflictError, ValidationError } from '../models/errors/api-error';
import { logger } from '../utils/logger';
import type { ExecutionHandle, ExecutionStateStore, OrderStatusFields } from './execution-state.service';

export interface OrderResult {
  orderId: number;
  orderRef: string;
  status: TripOrderStatus;
  newUnitIds: string[];
  errorMessage: string | null;
}

export const NO_VALID_UNITS_MESSAGE = 'No valid unit ids on order';

/**
 * Accepts finite numbers and numeric strings that stay positive once rounded
 * to the two decimals sent on the wire.
 */
export function parseQuantity(value: unknown): number | null {
  const numeric =
    typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  return Number.isFinite(numeric) && Number(numeric.toFixed(2)) > 0 ? numeric : null;
}

export class OrderProcessor {
  constructor(
    private readonly store: ExecutionStateStore,
    private readonly inventory: InventoryGateway
  ) {}

  /**
   * An aborted `signal` stops the order before its next step; writes for an
   * execution that is no longer active are dropped by the store.
   */
  async process(
    handle: ExecutionHandle,
    order: TripOrder,
    token: SessionToken,
    signal?: AbortSignal
  ): Promise<OrderResult> {
    const { valid, invalid } = partitionUnitIds(order.lineItems, (item) => item.unitId);

    for (const item of invalid) {
      logger.warn('Excluding malformed unit id from order', { orderRef: order.orderRef, unitId: item.unitId });
    }

    try {
      if (valid.length === 0) {
        await this.record(handle, order, 'skipped', { errorMessage: NO_VALID_UNITS_MESSAGE });
        return this.result(order, 'skipped', [], NO_VALID_UNITS_MESSAGE);
      }

      const { targetRoom, splitItems } = this.validate(order, valid);

      signal?.throwIfAborted();
      const newUnitIds = await this.inventory.splitInventory(token, splitItems);
      if (newUnitIds.length === 0) {
        throw new ValidationError('Inventory split returned no new unit ids');
      }
      if (!(await this.record(handle, order, 'sublotted', { newUnitIds }))) {
        throw new ConflictError('Execution is no longer active');
      }

      signal?.throwIfAborted();
      await this.inventory.moveInventory(
        token,
        newUnitIds.map((unitId) => ({ unitId, targetRoom }))
      );
      await this.record(handle, order, 'inventory_moved');

      logger.info('Order ready for manifest', { orderRef: order.orderRef, units: newUnitIds.length });
      return this.result(order, 'inventory_moved', newUnitIds, null);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      logger.warn('Order failed', { orderRef: order.orderRef, error: message });
      await this.recordFailure(handle, order, message);
      return this.result(order, 'failed', [], message);
    }
  }

  private validate(order: TripOrder, items: LineItem[]): { targetRoom: string; splitItems: SplitRequestItem[] } {
    if (!order.targetRoom) {
      throw new ValidationError('Order has no target room');
    }
    if (!order.counterpartLicense) {
      throw new ValidationError('Order has no counterpart license');
    }

    const splitItems = items.map((item) => {
      const sourceUnitId = normalizeUnitId(item.unitId);
      const quantity = parseQuantity(item.quantity);
      if (quantity === null) {
        throw new ValidationError(
          `Invalid quantity for unit ${sourceUnitId}: must be a positive number`
        );
      }
      return { sourceUnitId, quantity };
    });

    return { targetRoom: order.targetRoom, splitItems };
  }

  private async record(
    handle: ExecutionHandle,
    order: TripOrder,
    status: TripOrderStatus,
    fields?: OrderStatusFields
  ): Promise<boolean> {
    return this.store.setOrderStatus(handle, order.id, status, fields);
  }

  private async recordFailure(handle: ExecutionHandle, order: TripOrder, message: string): Promise<void> {
    try {
      await this.record(handle, order, 'failed', { errorMessage: message });
    } catch (persistError) {
      logger.error('Could not persist order failure', {
        orderRef: order.orderRef,
        error: message,
        persistError: persistError instanceof Error ? persistError.message : String(persistError),
      });
    }
  }

  private result(
    order: TripOrder,
    status: TripOrderStatus,
    newUnitIds: string[],
    errorMessage: string | null
  ): OrderResult {
    return { orderId: order.id, orderRef: order.orderRef, status, newUnitIds, errorMessage };
  }
}
