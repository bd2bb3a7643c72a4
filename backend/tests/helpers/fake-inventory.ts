/**
 * Scriptable InventoryGateway. Records every call; split returns fresh
 * sixteen-digit ids unless a failure is queued.
 */

import type {
  InventoryGateway,
  ManifestRequest,
  MoveAck,
  MoveRequestItem,
  SessionToken,
  SplitRequestItem,
} from '../../src/clients/inventory.client';

export const TEST_SESSION = 'test-session';

export class FakeInventory implements InventoryGateway {
  readonly splitCalls: SplitRequestItem[][] = [];
  readonly moveCalls: MoveRequestItem[][] = [];
  readonly manifestCalls: ManifestRequest[] = [];
  authCalls = 0;

  authError: Error | null = null;
  /** Errors returned by successive split calls; undefined entries succeed */
  splitErrors: Array<Error | undefined> = [];
  /** Errors returned by successive manifest calls; undefined entries succeed */
  manifestErrors: Array<Error | undefined> = [];
  /** Awaited before each split resolves, e.g. to time out the run mid-call */
  beforeSplit: () => void | Promise<void> = () => undefined;

  private unitCounter = 0;
  private manifestCounter = 0;

  async authenticate(): Promise<SessionToken> {
    this.authCalls++;
    if (this.authError) throw this.authError;
    return TEST_SESSION;
  }

  async splitInventory(_token: SessionToken, items: SplitRequestItem[]): Promise<string[]> {
    this.splitCalls.push(items);
    await this.beforeSplit();

    const failure = this.splitErrors.shift();
    if (failure) throw failure;

    return items.map(() => String(7000000000000000 + ++this.unitCounter));
  }

  async moveInventory(_token: SessionToken, moves: MoveRequestItem[]): Promise<MoveAck> {
    this.moveCalls.push(moves);
    return { transactionId: `TX-${this.moveCalls.length}`, unitIds: moves.map((move) => move.unitId) };
  }

  async createManifest(_token: SessionToken, request: ManifestRequest): Promise<string> {
    this.manifestCalls.push(request);

    const failure = this.manifestErrors.shift();
    if (failure) throw failure;

    return `MANIFEST-${++this.manifestCounter}`;
  }
}
