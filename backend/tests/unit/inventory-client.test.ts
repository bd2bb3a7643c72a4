/**
 * Inventory API client tests
 *
 * The HTTP transport is replaced by a jest mock; retries sleep for 0 ms.
 *
 * Coverage:
 *   1. Request envelopes (login, split, move, manifest)
 *   2. Unit id filtering before any request
 *   3. Response classification (semantic, protocol, transport)
 *   4. Retry behaviour of transient failures
 *   5. axios transport
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import axios, { AxiosError, AxiosHeaders } from 'axios';
import {
  HttpPoster,
  HttpResponse,
  InventoryClient,
  InventoryClientConfig,
  createAxiosPoster,
  toRemoteError,
} from '../../src/clients/inventory.client';
import {
  AuthError,
  ProtocolError,
  SemanticRemoteError,
  TransientRemoteError,
  ValidationError,
} from '../../src/models/errors/api-error';
import { RetryPolicy } from '../../src/services/retry.service';
import { VALID_UNIT_A, VALID_UNIT_B } from '../helpers/fixtures';

const CONFIG: InventoryClientConfig = {
  apiUrl: 'https://inventory.test/api',
  username: 'test-user',
  password: 'test-secret',
  license: 'LIC-TEST',
  location: 'LOC-1',
  environment: 'training',
  timeoutMs: 30000,
};

const SESSION = 'test-session';

function httpError(status: number): AxiosError {
  return new AxiosError('Request failed', 'ERR_BAD_RESPONSE', undefined, undefined, {
    status,
    statusText: 'error',
    headers: {},
    config: { headers: new AxiosHeaders() },
    data: {},
  });
}

function ok(data: unknown): HttpResponse {
  return { status: 200, data };
}

describe('InventoryClient', () => {
  let post: jest.Mock<HttpPoster['post']>;
  let client: InventoryClient;

  beforeEach(() => {
    post = jest.fn<HttpPoster['post']>();
    client = new InventoryClient(CONFIG, new RetryPolicy({ sleep: async () => undefined }), { post });
  });

  // ==========================================================================
  // 1. Request envelopes
  // ==========================================================================

  describe('authenticate()', () => {
    it('posts credentials with the training flag and returns the session id', async () => {
      post.mockResolvedValue(ok({ success: '1', sessionid: SESSION }));

      await expect(client.authenticate()).resolves.toBe(SESSION);
      expect(post).toHaveBeenCalledWith(
        CONFIG.apiUrl,
        {
          API: '4.0',
          action: 'login',
          training: '1',
          username: 'test-user',
          password: 'test-secret',
          license_number: 'LIC-TEST',
        },
        { timeout: 30000 }
      );
    });

    it('sends training 0 in production', async () => {
      const production = new InventoryClient(
        { ...CONFIG, environment: 'production' },
        new RetryPolicy({ sleep: async () => undefined }),
        { post }
      );
      post.mockResolvedValue(ok({ success: 1, sessionid: SESSION }));

      await production.authenticate();

      expect(post.mock.calls[0][1]).toMatchObject({ training: '0' });
    });

    it('turns a rejected login into an AuthError', async () => {
      post.mockResolvedValue(ok({ success: '0', error: 'Invalid credentials', errorcode: 'AUTH01' }));

      const error = await client.authenticate().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ message: 'Invalid credentials', details: { remoteCode: 'AUTH01' } });
      expect(post).toHaveBeenCalledTimes(1);
    });
  });

  describe('splitInventory()', () => {
    it('sends quantities with two decimals and returns the new ids as strings', async () => {
      post.mockResolvedValue(ok({ success: '1', barcode_id: ['7000000000000001', 7000000000000002] }));

      const ids = await client.splitInventory(SESSION, [
        { sourceUnitId: VALID_UNIT_A, quantity: 5 },
        { sourceUnitId: VALID_UNIT_B, quantity: 0.5 },
      ]);

      expect(ids).toEqual(['7000000000000001', '7000000000000002']);
      expect(post.mock.calls[0][1]).toEqual({
        API: '4.0',
        action: 'inventory_split',
        sessionid: SESSION,
        training: '1',
        data: [
          { barcodeid: VALID_UNIT_A, remove_quantity: '5.00' },
          { barcodeid: VALID_UNIT_B, remove_quantity: '0.50' },
        ],
      });
    });

    it('rejects a non-positive quantity without calling the API', async () => {
      await expect(client.splitInventory(SESSION, [{ sourceUnitId: VALID_UNIT_A, quantity: 0 }])).rejects.toThrow(
        `Invalid quantity for unit ${VALID_UNIT_A}: must be a positive number`
      );
      expect(post).not.toHaveBeenCalled();
    });

    it('rejects a quantity that rounds to zero', async () => {
      const error = await client
        .splitInventory(SESSION, [{ sourceUnitId: VALID_UNIT_A, quantity: 0.004 }])
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message: `Invalid quantity for unit ${VALID_UNIT_A}: must be a positive number` });
      expect(post).not.toHaveBeenCalled();
    });

    it('rejects a numeric id beyond the safe integer range', async () => {
      post.mockResolvedValue(ok({ success: '1', barcode_id: [9999999999999999] }));

      const error = await client
        .splitInventory(SESSION, [{ sourceUnitId: VALID_UNIT_A, quantity: 1 }])
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({ message: 'Malformed inventory_split response: unexpected payload' });
      expect(post).toHaveBeenCalledTimes(1);
    });
  });

  describe('moveInventory()', () => {
    it('moves each unit to its room', async () => {
      post.mockResolvedValue(ok({ success: '1', transactionid: 991 }));

      const ack = await client.moveInventory(SESSION, [{ unitId: VALID_UNIT_A, targetRoom: 'Room-7' }]);

      expect(ack).toEqual({ transactionId: '991', unitIds: [VALID_UNIT_A] });
      expect(post.mock.calls[0][1]).toMatchObject({
        action: 'inventory_move',
        data: [{ barcodeid: VALID_UNIT_A, room: 'Room-7' }],
      });
    });
  });

  describe('createManifest()', () => {
    it('builds the stop overview with Unix-second timestamps', async () => {
      post.mockResolvedValue(ok({ success: '1', barcode_id: 'MANIFEST-77' }));

      const manifestId = await client.createManifest(SESSION, {
        stopNumber: 2,
        counterpartLicense: 'LIC-100',
        unitIds: [VALID_UNIT_A, 'bad-id'],
        departureTime: new Date('2026-03-02T08:30:00Z'),
        arrivalTime: new Date('2026-03-02T08:45:00Z'),
        route: 'Main St',
        employeeId: 'EMP-1',
        employeeId2: 'EMP-2',
        vehicleId: 'VEH-1',
      });

      expect(manifestId).toBe('MANIFEST-77');
      expect(post.mock.calls[0][1]).toEqual({
        API: '4.0',
        action: 'inventory_manifest',
        sessionid: SESSION,
        training: '1',
        location: 'LOC-1',
        stop_overview: {
          approximate_departure: '1772440200',
          approximate_arrival: '1772441100',
          approximate_route: 'Main St',
          stop_number: '2',
          vendor_license: 'LIC-100',
          barcodeid: [VALID_UNIT_A],
        },
        employee_id: 'EMP-1',
        employee_id_2: 'EMP-2',
        vehicle_id: 'VEH-1',
      });
    });
  });

  // ==========================================================================
  // 2. Unit id filtering
  // ==========================================================================

  describe('unit id filtering', () => {
    it('drops malformed ids and sends the rest', async () => {
      post.mockResolvedValue(ok({ success: '1', barcode_id: ['7000000000000001'] }));

      await client.splitInventory(SESSION, [
        { sourceUnitId: 'bad-id', quantity: 1 },
        { sourceUnitId: VALID_UNIT_A, quantity: 2 },
      ]);

      expect(post.mock.calls[0][1]).toMatchObject({
        data: [{ barcodeid: VALID_UNIT_A, remove_quantity: '2.00' }],
      });
    });

    it('fails locally when no id is valid', async () => {
      const error = await client
        .moveInventory(SESSION, [{ unitId: '12345', targetRoom: 'Room-7' }])
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message: 'No valid unit ids for inventory_move' });
      expect(post).not.toHaveBeenCalled();
    });
  });

  // ==========================================================================
  // 3. Response classification
  // ==========================================================================

  describe('response classification', () => {
    it('raises the remote error text and code on success=0 without retrying', async () => {
      post.mockResolvedValue(ok({ success: '0', error: 'Barcode is not active', errorcode: 17 }));

      const error = await client
        .splitInventory(SESSION, [{ sourceUnitId: VALID_UNIT_A, quantity: 1 }])
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SemanticRemoteError);
      expect(error).toMatchObject({ message: 'Barcode is not active', remoteCode: '17' });
      expect(post).toHaveBeenCalledTimes(1);
    });

    it('falls back to a generic message when the rejection has no text', async () => {
      post.mockResolvedValue(ok({ success: false }));

      await expect(
        client.splitInventory(SESSION, [{ sourceUnitId: VALID_UNIT_A, quantity: 1 }])
      ).rejects.toMatchObject({ message: 'Unknown inventory API error', remoteCode: 'UNKNOWN' });
    });

    it('treats a body without a success flag as a protocol error', async () => {
      post.mockResolvedValue(ok({ barcode_id: ['7000000000000001'] }));

      const error = await client
        .splitInventory(SESSION, [{ sourceUnitId: VALID_UNIT_A, quantity: 1 }])
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({ message: 'Malformed inventory_split response: missing success flag' });
      expect(post).toHaveBeenCalledTimes(1);
    });

    it('treats a success without the expected payload as a protocol error', async () => {
      post.mockResolvedValue(ok({ success: '1' }));

      await expect(client.createManifest(SESSION, {
        stopNumber: 1,
        counterpartLicense: 'LIC-100',
        unitIds: [VALID_UNIT_A],
        departureTime: new Date('2026-03-02T08:00:00Z'),
        arrivalTime: new Date('2026-03-02T08:15:00Z'),
        route: 'Main St',
        employeeId: 'EMP-1',
        employeeId2: 'EMP-2',
        vehicleId: 'VEH-1',
      })).rejects.toThrow('Malformed inventory_manifest response: unexpected payload');
    });

    it('does not retry a 4xx response', async () => {
      post.mockRejectedValue(httpError(400));

      await expect(client.authenticate()).rejects.toMatchObject({
        message: 'Inventory API responded with HTTP 400',
        details: { remoteCode: 'HTTP_400' },
      });
      expect(post).toHaveBeenCalledTimes(1);
    });
  });

  // ==========================================================================
  // 4. Retries
  // ==========================================================================

  describe('retries', () => {
    it('logs in after two timeouts', async () => {
      post
        .mockRejectedValueOnce(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'))
        .mockRejectedValueOnce(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'))
        .mockResolvedValueOnce(ok({ success: '1', sessionid: SESSION }));

      await expect(client.authenticate()).resolves.toBe(SESSION);
      expect(post).toHaveBeenCalledTimes(3);
    });

    it('gives up after three 5xx responses', async () => {
      post.mockRejectedValue(httpError(503));

      const error = await client.authenticate().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransientRemoteError);
      expect(error).toMatchObject({ message: 'Inventory API responded with HTTP 503' });
      expect(post).toHaveBeenCalledTimes(3);
    });
  });
});

describe('toRemoteError()', () => {
  it('maps timeouts, unreachable hosts and status codes', () => {
    expect(toRemoteError(new AxiosError('timeout', 'ECONNABORTED'), 5000)).toMatchObject({
      message: 'Inventory API request timed out after 5000ms',
      code: 'REMOTE_TRANSIENT_ERROR',
    });
    expect(toRemoteError(new AxiosError('getaddrinfo ENOTFOUND inventory.test', 'ENOTFOUND'), 5000)).toMatchObject({
      message: 'Inventory API unreachable: getaddrinfo ENOTFOUND inventory.test',
      code: 'REMOTE_TRANSIENT_ERROR',
    });
    expect(toRemoteError(httpError(429), 5000)).toBeInstanceOf(TransientRemoteError);
    expect(toRemoteError(httpError(404), 5000)).toBeInstanceOf(SemanticRemoteError);
  });

  it('passes other errors through', () => {
    const error = new Error('unexpected');
    expect(toRemoteError(error, 5000)).toBe(error);
  });
});

// ============================================================================
// 5. axios transport
// ============================================================================

describe('createAxiosPoster()', () => {
  it('posts the body as JSON with the per-call timeout', async () => {
    const seen: { url?: string; body?: unknown; timeout?: number } = {};
    const instance = axios.create({
      adapter: async (config) => {
        seen.url = config.url;
        seen.body = config.data;
        seen.timeout = config.timeout;
        return { data: { success: '1', sessionid: SESSION }, status: 200, statusText: 'OK', headers: {}, config };
      },
    });

    const response = await createAxiosPoster(instance).post(CONFIG.apiUrl, { action: 'login' }, { timeout: 1234 });

    expect(response).toEqual({ status: 200, data: { success: '1', sessionid: SESSION } });
    expect(seen).toEqual({ url: CONFIG.apiUrl, body: '{"action":"login"}', timeout: 1234 });
  });
});
