/**
 * Inventory API Client
 *
 * Talks to the external inventory-tracking API: login, split, move and
 * manifest. Every call goes through the injected RetryPolicy, every response
 * is validated against its wire schema, and malformed unit ids are filtered
 * out before a request is sent.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { normalizeUnitId, partitionUnitIds, toUnixSeconds } from '@trip-execution/shared';
import {
  ApiError,
  AuthError,
  ProtocolError,
  SemanticRemoteError,
  TransientRemoteError,
  ValidationError,
} from '../models/errors/api-error';
import { RetryPolicy, isTransientError } from '../services/retry.service';
import { logger, logHelpers } from '../utils/logger';
import {
  INVENTORY_API_VERSION,
  InventoryAction,
  MoveLine,
  RequestEnvelope,
  SplitLine,
  StopOverview,
  envelopeSchema,
  isSuccessFlag,
  loginPayloadSchema,
  manifestPayloadSchema,
  movePayloadSchema,
  splitPayloadSchema,
} from './inventory.schemas';

// ============================================================================
// Types
// ============================================================================

export type InventoryEnvironment = 'production' | 'training';

export interface InventoryClientConfig {
  apiUrl: string;
  username: string;
  password: string;
  license: string;
  location: string;
  environment: InventoryEnvironment;
  timeoutMs: number;
}

export type SessionToken = string;

export interface SplitRequestItem {
  sourceUnitId: string;
  quantity: number;
}

export interface MoveRequestItem {
  unitId: string;
  targetRoom: string;
}

export interface MoveAck {
  transactionId: string | null;
  unitIds: string[];
}

export interface ManifestRequest {
  stopNumber: number;
  counterpartLicense: string;
  unitIds: string[];
  departureTime: Date;
  arrivalTime: Date;
  route: string;
  employeeId: string;
  employeeId2: string;
  vehicleId: string;
}

/**
 * The four remote operations the pipeline consumes.
 */
export interface InventoryGateway {
  authenticate(): Promise<SessionToken>;
  splitInventory(token: SessionToken, items: SplitRequestItem[]): Promise<string[]>;
  moveInventory(token: SessionToken, moves: MoveRequestItem[]): Promise<MoveAck>;
  createManifest(token: SessionToken, request: ManifestRequest): Promise<string>;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * Minimal POST transport. Rejects on non-2xx responses the way axios does.
 */
export interface HttpPoster {
  post(url: string, body: unknown, options: { timeout: number }): Promise<HttpResponse>;
}

export function createAxiosPoster(instance: AxiosInstance = axios.create()): HttpPoster {
  return {
    async post(url, body, options) {
      const response = await instance.post<unknown>(url, body, {
        timeout: options.timeout,
        headers: { 'Content-Type': 'application/json' },
      });
      return { status: response.status, data: response.data };
    },
  };
}

// ============================================================================
// Error mapping
// ============================================================================

/**
 * Maps a transport failure onto the remote error taxonomy.
 */
export function toRemoteError(error: unknown, timeoutMs: number): Error {
  if (error instanceof ApiError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status !== undefined) {
      const message = `Inventory API responded with HTTP ${status}`;
      if (status >= 500 || status === 429) {
        return new TransientRemoteError(message, { status });
      }
      return new SemanticRemoteError(message, `HTTP_${status}`);
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TransientRemoteError(`Inventory API request timed out after ${timeoutMs}ms`);
    }

    return new TransientRemoteError(`Inventory API unreachable: ${error.message}`, { code: error.code });
  }

  if (error instanceof Error) {
    return isTransientError(error) ? new TransientRemoteError(error.message) : error;
  }

  return new Error(String(error));
}

// Rounded before the check: 0.004 would otherwise go out as "0.00"
function formatQuantity(quantity: number, unitId: string): string {
  const formatted = Number.isFinite(quantity) ? quantity.toFixed(2) : '';
  if (!(Number(formatted) > 0)) {
    throw new ValidationError(`Invalid quantity for unit ${unitId}: must be a positive number`);
  }
  return formatted;
}

// ============================================================================
// Client
// ============================================================================

export class InventoryClient implements InventoryGateway {
  private readonly trainingFlag: '0' | '1';

  constructor(
    private readonly config: InventoryClientConfig,
    private readonly retryPolicy: RetryPolicy = new RetryPolicy(),
    private readonly http: HttpPoster = createAxiosPoster()
  ) {
    this.trainingFlag = config.environment === 'production' ? '0' : '1';
  }

  async authenticate(): Promise<SessionToken> {
    try {
      const payload = await this.call(
        'login',
        undefined,
        {
          username: this.config.username,
          password: this.config.password,
          license_number: this.config.license,
        },
        loginPayloadSchema
      );

      logger.info('Authenticated with inventory API', { environment: this.config.environment });
      return payload.sessionid;
    } catch (error) {
      if (error instanceof SemanticRemoteError) {
        throw new AuthError(error.message, { remoteCode: error.remoteCode });
      }
      throw error;
    }
  }

  async splitInventory(token: SessionToken, items: SplitRequestItem[]): Promise<string[]> {
    const accepted = this.filterUnitIds('inventory_split', items, (item) => item.sourceUnitId);

    const data: SplitLine[] = accepted.map((item) => {
      const barcodeid = normalizeUnitId(item.sourceUnitId);
      return { barcodeid, remove_quantity: formatQuantity(item.quantity, barcodeid) };
    });

    const payload = await this.call('inventory_split', token, { data }, splitPayloadSchema);

    logger.info('Inventory split created sub-units', {
      requested: data.length,
      created: payload.barcode_id.length,
    });
    return payload.barcode_id;
  }

  async moveInventory(token: SessionToken, moves: MoveRequestItem[]): Promise<MoveAck> {
    const accepted = this.filterUnitIds('inventory_move', moves, (move) => move.unitId);

    const data: MoveLine[] = accepted.map((move) => ({
      barcodeid: normalizeUnitId(move.unitId),
      room: move.targetRoom,
    }));

    const payload = await this.call('inventory_move', token, { data }, movePayloadSchema);

    logger.info('Inventory moved', { units: data.length });
    return {
      transactionId: payload.transactionid ?? null,
      unitIds: data.map((line) => line.barcodeid),
    };
  }

  async createManifest(token: SessionToken, request: ManifestRequest): Promise<string> {
    const unitIds = this.filterUnitIds('inventory_manifest', request.unitIds, (unitId) => unitId)
      .map(normalizeUnitId);

    const stopOverview: StopOverview = {
      approximate_departure: String(toUnixSeconds(request.departureTime)),
      approximate_arrival: String(toUnixSeconds(request.arrivalTime)),
      approximate_route: request.route,
      stop_number: String(request.stopNumber),
      vendor_license: request.counterpartLicense,
      barcodeid: unitIds,
    };

    const payload = await this.call(
      'inventory_manifest',
      token,
      {
        location: this.config.location,
        stop_overview: stopOverview,
        employee_id: request.employeeId,
        employee_id_2: request.employeeId2,
        vehicle_id: request.vehicleId,
      },
      manifestPayloadSchema
    );

    logger.info('Manifest created', {
      manifestId: payload.barcode_id,
      stopNumber: request.stopNumber,
      units: unitIds.length,
    });
    return payload.barcode_id;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private filterUnitIds<T>(action: InventoryAction, items: readonly T[], getId: (item: T) => unknown): T[] {
    const { valid, invalid } = partitionUnitIds(items, getId);

    for (const item of invalid) {
      logger.warn('Excluding malformed unit id', { action, unitId: getId(item) });
    }

    if (valid.length === 0) {
      throw new ValidationError(`No valid unit ids for ${action}`);
    }

    return valid;
  }

  private async call<T>(
    action: InventoryAction,
    sessionId: SessionToken | undefined,
    fields: Record<string, unknown>,
    payloadSchema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const envelope: RequestEnvelope = {
      API: INVENTORY_API_VERSION,
      action,
      training: this.trainingFlag,
    };
    if (sessionId !== undefined) {
      envelope.sessionid = sessionId;
    }
    const body = { ...envelope, ...fields };

    return this.retryPolicy.execute(async (attempt) => {
      logHelpers.remoteCall(action, attempt);

      let response: HttpResponse;
      try {
        response = await this.http.post(this.config.apiUrl, body, { timeout: this.config.timeoutMs });
      } catch (error) {
        throw toRemoteError(error, this.config.timeoutMs);
      }

      return this.parseResponse(action, response.data, payloadSchema);
    }, action);
  }

  private parseResponse<T>(
    action: InventoryAction,
    data: unknown,
    payloadSchema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): T {
    const envelope = envelopeSchema.safeParse(data);

    if (!envelope.success) {
      throw new ProtocolError(`Malformed ${action} response: missing success flag`, envelope.error.errors);
    }

    if (!isSuccessFlag(envelope.data.success)) {
      const { error, errorcode } = envelope.data;
      const message = typeof error === 'string' && error.length > 0 ? error : 'Unknown inventory API error';
      const remoteCode = errorcode === undefined || errorcode === null ? 'UNKNOWN' : String(errorcode);

      logger.warn('Inventory API rejected request', { action, remoteCode, error: message });
      throw new SemanticRemoteError(message, remoteCode);
    }

    const payload = payloadSchema.safeParse(data);

    if (!payload.success) {
      throw new ProtocolError(`Malformed ${action} response: unexpected payload`, payload.error.errors);
    }

    return payload.data;
  }
}
