/**
 * Trip Orchestrator
 *
 * Runs one execution of a trip:
 *   1. mark execution and trip processing
 *   2. load and check the trip
 *   3. reset every order
 *   4. authenticate once
 *   5. process orders in sequence
 *   6. one manifest per stop for the orders that reached inventory_moved
 *   7. finalize completed (any order manifested) or failed
 *
 * Order failures stay on the order. Only failures that abort the whole trip
 * (authentication, an unusable trip, unexpected exceptions) are recorded as
 * the execution's general error.
 */

import type { TerminalExecutionStatus, TripOrder, TripWithOrders } from '@trip-execution/shared';
import type { InventoryGateway, SessionToken } from '../clients/inventory.client';
import { NotFoundError, ValidationError } from '../models/errors/api-error';
import { logger } from '../utils/logger';
import type { ExecutionHandle, ExecutionStateStore } from './execution-state.service';
import { MovedOrder, groupStops, resolveStopTiming } from './manifest-builder';
import { OrderProcessor, OrderResult } from './order-processor.service';

// ============================================================================
// Types
// ============================================================================

export interface TripExecutionResult {
  status: TerminalExecutionStatus;
  succeeded: number;
  failed: number;
  skipped: number;
  manifestIds: string[];
  generalError: string | null;
  /** false when the execution had already been finalized elsewhere (e.g. timeout) */
  applied: boolean;
}

export interface ExecutableTrip {
  trip: TripWithOrders;
  driver1Id: string;
  driver2Id: string;
  vehicleId: string;
}

export const PROGRESS = {
  starting: 'Starting trip execution...',
  authenticating: 'Authenticating with inventory API...',
  authFailed: 'Authentication with inventory API failed',
  manifests: (stops: number) => `Creating ${stops} manifest(s)...`,
  order: (index: number, total: number, orderRef: string) =>
    `Processing order ${index} of ${total}: ${orderRef}`,
  success: 'Trip execution completed successfully',
  partial: (succeeded: number, failed: number) =>
    `Trip partially completed: ${succeeded} orders succeeded, ${failed} failed`,
  allFailed: 'All orders failed to process',
  aborted: 'Trip execution aborted',
} as const;

/**
 * Checks that a trip can be executed: it exists, has orders, and has both
 * drivers and a vehicle assigned.
 */
export function assertExecutable(trip: TripWithOrders | null, tripId: number): ExecutableTrip {
  if (!trip) {
    throw new NotFoundError(`Trip ${tripId}`);
  }
  if (trip.orders.length === 0) {
    throw new ValidationError('Trip has no orders');
  }
  if (!trip.driver1Id || !trip.driver2Id) {
    throw new ValidationError('Trip must have two drivers assigned');
  }
  if (!trip.vehicleId) {
    throw new ValidationError('Trip has no vehicle assigned');
  }
  return { trip, driver1Id: trip.driver1Id, driver2Id: trip.driver2Id, vehicleId: trip.vehicleId };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Orchestrator
// ============================================================================

export class TripOrchestrator {
  private readonly processor: OrderProcessor;

  constructor(
    private readonly store: ExecutionStateStore,
    private readonly inventory: InventoryGateway,
    private readonly now: () => Date = () => new Date(),
    processor?: OrderProcessor
  ) {
    this.processor = processor ?? new OrderProcessor(store, inventory);
  }

  async execute(handle: ExecutionHandle, signal?: AbortSignal): Promise<TripExecutionResult> {
    const { tripId } = handle;

    try {
      if (!(await this.store.setStatus(handle, 'processing', PROGRESS.starting))) {
        return this.result('failed', [], [], null, false);
      }
      await this.store.setTripStatus(tripId, 'processing');

      const executable = assertExecutable(await this.store.loadTrip(tripId), tripId);
      const { trip } = executable;

      await this.store.resetOrders(tripId);

      await this.store.setStatus(handle, 'processing', PROGRESS.authenticating);
      let token: SessionToken;
      try {
        token = await this.inventory.authenticate();
      } catch (error) {
        const message = errorMessage(error);
        logger.error('Authentication failed, aborting trip', { tripId, error: message });
        return this.finish(handle, 'failed', [], [], PROGRESS.authFailed, message);
      }

      const results = await this.processOrders(handle, trip.orders, token, signal);
      const manifestIds = await this.createManifests(handle, executable, results, token, signal);

      const succeeded = results.filter((result) => result.status === 'manifested').length;
      const failed = results.filter((result) => result.status === 'failed').length;

      const status: TerminalExecutionStatus = succeeded > 0 ? 'completed' : 'failed';
      const message =
        status === 'failed'
          ? PROGRESS.allFailed
          : failed > 0
            ? PROGRESS.partial(succeeded, failed)
            : PROGRESS.success;

      return this.finish(handle, status, results, manifestIds, message, null);
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Trip execution aborted', { tripId, error: message });
      return this.finish(handle, 'failed', [], [], PROGRESS.aborted, message);
    }
  }

  private async processOrders(
    handle: ExecutionHandle,
    orders: TripOrder[],
    token: SessionToken,
    signal?: AbortSignal
  ): Promise<OrderResult[]> {
    const results: OrderResult[] = [];

    for (const [index, order] of orders.entries()) {
      signal?.throwIfAborted();

      await this.store.setStatus(
        handle,
        'processing',
        PROGRESS.order(index + 1, orders.length, order.orderRef)
      );
      results.push(await this.processor.process(handle, order, token, signal));
    }

    return results;
  }

  /**
   * Issues one manifest per stop. A failed manifest fails that stop's
   * orders; other stops continue. Mutates the status of `results`.
   */
  private async createManifests(
    handle: ExecutionHandle,
    executable: ExecutableTrip,
    results: OrderResult[],
    token: SessionToken,
    signal?: AbortSignal
  ): Promise<string[]> {
    const { trip } = executable;
    const positions = new Map(
      trip.orders.map((order, position): [number, { position: number; license: string | null }] => [
        order.id,
        { position, license: order.counterpartLicense },
      ])
    );

    const moved: MovedOrder[] = [];
    for (const result of results) {
      const placed = positions.get(result.orderId);
      if (result.status === 'inventory_moved' && placed?.license) {
        moved.push({ result, counterpartLicense: placed.license, position: placed.position });
      }
    }

    if (moved.length === 0) {
      logger.info('No orders reached inventory_moved, skipping manifests', { tripId: trip.id });
      return [];
    }

    const stops = groupStops(moved);
    const resultsById = new Map(results.map((result): [number, OrderResult] => [result.orderId, result]));
    const manifestIds: string[] = [];

    await this.store.setStatus(handle, 'processing', PROGRESS.manifests(stops.length));

    for (const stop of stops) {
      signal?.throwIfAborted();

      const timing = resolveStopTiming(trip, stop.routeIndex, this.now());
      if (timing.synthetic) {
        logger.info('Using synthetic timing for stop', {
          tripId: trip.id,
          stopNumber: stop.stopNumber,
          routeIndex: stop.routeIndex,
        });
      }

      let nextStatus: 'manifested' | 'failed';
      let fields: { manifestId?: string; errorMessage?: string };

      try {
        const manifestId = await this.inventory.createManifest(token, {
          stopNumber: stop.stopNumber,
          counterpartLicense: stop.counterpartLicense,
          unitIds: stop.unitIds,
          departureTime: timing.departureTime,
          arrivalTime: timing.arrivalTime,
          route: timing.route,
          employeeId: executable.driver1Id,
          employeeId2: executable.driver2Id,
          vehicleId: executable.vehicleId,
        });
        manifestIds.push(manifestId);
        nextStatus = 'manifested';
        fields = { manifestId };
      } catch (error) {
        const message = `Manifest creation failed: ${errorMessage(error)}`;
        logger.warn('Manifest failed for stop', { tripId: trip.id, stopNumber: stop.stopNumber, error: message });
        nextStatus = 'failed';
        fields = { errorMessage: message };
      }

      for (const orderId of stop.orderIds) {
        await this.store.setOrderStatus(handle, orderId, nextStatus, fields);

        const result = resultsById.get(orderId);
        if (result) {
          result.status = nextStatus;
          result.errorMessage = fields.errorMessage ?? null;
        }
      }
    }

    return manifestIds;
  }

  private async finish(
    handle: ExecutionHandle,
    status: TerminalExecutionStatus,
    results: OrderResult[],
    manifestIds: string[],
    progressMessage: string,
    generalError: string | null
  ): Promise<TripExecutionResult> {
    const applied = await this.store.finalize(handle, status, { progressMessage, generalError });

    logger.info('Trip execution finished', { tripId: handle.tripId, status, applied, progressMessage });
    return this.result(status, results, manifestIds, generalError, applied);
  }

  private result(
    status: TerminalExecutionStatus,
    results: OrderResult[],
    manifestIds: string[],
    generalError: string | null,
    applied: boolean
  ): TripExecutionResult {
    return {
      status,
      succeeded: results.filter((result) => result.status === 'manifested').length,
      failed: results.filter((result) => result.status === 'failed').length,
      skipped: results.filter((result) => result.status === 'skipped').length,
      manifestIds,
      generalError,
      applied,
    };
  }
}
