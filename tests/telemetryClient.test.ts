import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { VehicleIdentity } from '../src/models/telemetry';
import { AuthSession, type AccessToken } from '../src/services/authSession.service';
import {
  PING_PATH,
  TelemetryClient,
  type TelemetryClientOptions,
} from '../src/services/telemetryClient.service';
import { MockVinfastUpstream } from '../src/simulation/vinfastUpstream.mock';
import { UpstreamError } from '../src/utils/errors';
import type { FetchLike } from '../src/utils/http';

const vehicle: VehicleIdentity = { vin: 'TESTVIN0000000001', userId: 'user-1' };

const loginAgainst = (upstream: MockVinfastUpstream): Promise<AccessToken> =>
  new AuthSession({
    domain: upstream.authDomain,
    clientId: 'test-client',
    audience: `https://${upstream.authDomain}/api/v2/`,
    credentials: { email: 'driver@example.test', password: 'test-secret' },
    safetyWindowMs: 60_000,
    timeoutMs: 1_000,
    fetch: upstream.fetch,
  }).getValidToken();

describe('TelemetryClient', () => {
  let upstream: MockVinfastUpstream;
  let token: AccessToken;

  const createClient = (overrides: Partial<TelemetryClientOptions> = {}) =>
    new TelemetryClient({
      baseUrl: upstream.apiBase,
      timeoutMs: 1_000,
      maxRetries: 2,
      backoffMs: 0,
      fetch: upstream.fetch,
      ...overrides,
    });

  beforeEach(async () => {
    upstream = new MockVinfastUpstream();
    token = await loginAgainst(upstream);
  });

  describe('fetchVehicleInfo', () => {
    it('returns the first vehicle on the account', async () => {
      await expect(createClient().fetchVehicleInfo(token)).resolves.toEqual({
        vin: 'TESTVIN0000000001',
        userId: 'user-1',
        name: 'Family Car',
        model: 'VF8 Plus',
        year: 2023,
        color: 'Crimson Red',
        odometerKm: 12000,
      });
    });

    it('retries dropped connections', async () => {
      upstream.failNext('vehicle_info', 'network');

      await expect(createClient().fetchVehicleInfo(token)).resolves.toMatchObject({
        vin: 'TESTVIN0000000001',
      });
      expect(upstream.calls.vehicle_info).toBe(2);
    });

    it('retries a request that exceeds its timeout', async () => {
      upstream.failNext('vehicle_info', 'hang');

      await expect(createClient({ timeoutMs: 20 }).fetchVehicleInfo(token)).resolves.toMatchObject({
        vin: 'TESTVIN0000000001',
      });
      expect(upstream.calls.vehicle_info).toBe(2);
    });

    it('asks for re-authentication on 401 without retrying', async () => {
      upstream.revokeTokens();

      const error = await createClient()
        .fetchVehicleInfo(token)
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ reauth: true, transient: false, status: 401 });
      expect(upstream.calls.vehicle_info).toBe(1);
    });

    it('does not retry an unparseable body', async () => {
      upstream.failNext('vehicle_info', 'malformed');

      await expect(createClient().fetchVehicleInfo(token)).rejects.toMatchObject({
        endpoint: 'vehicle_info',
        transient: false,
      });
      expect(upstream.calls.vehicle_info).toBe(1);
    });

    it('does not retry client errors', async () => {
      upstream.failNext('vehicle_info', 404);

      await expect(createClient().fetchVehicleInfo(token)).rejects.toMatchObject({
        transient: false,
        status: 404,
      });
      expect(upstream.calls.vehicle_info).toBe(1);
    });

    it('rejects an envelope carrying a vendor error code', async () => {
      const fetchImpl: FetchLike = async () =>
        new Response(JSON.stringify({ code: 401001, message: 'Vehicle not found', data: null }), {
          status: 200,
        });

      await expect(
        createClient({ fetch: fetchImpl }).fetchVehicleInfo(token),
      ).rejects.toThrow('VinFast API error 401001: Vehicle not found');
    });

    it('rejects an account without vehicles', async () => {
      const fetchImpl: FetchLike = async () =>
        new Response(JSON.stringify({ code: 200000, data: [] }), { status: 200 });

      await expect(
        createClient({ fetch: fetchImpl }).fetchVehicleInfo(token),
      ).rejects.toThrow('Vehicle-info payload failed validation');
    });

    it('ignores a second vehicle without a VIN', async () => {
      upstream.extraVehicles = [{ vinCode: null, vehicleName: 'pending' }];

      await expect(createClient().fetchVehicleInfo(token)).resolves.toMatchObject({
        vin: 'TESTVIN0000000001',
        name: 'Family Car',
      });
    });

    it('takes the first vehicle that has a VIN', async () => {
      const fetchImpl: FetchLike = async () =>
        new Response(
          JSON.stringify({
            code: 200000,
            data: [{ vehicleName: 'pending' }, { vinCode: 'TESTVIN0000000002', userId: 7 }],
          }),
          { status: 200 },
        );

      await expect(
        createClient({ fetch: fetchImpl }).fetchVehicleInfo(token),
      ).resolves.toMatchObject({ vin: 'TESTVIN0000000002', userId: '7' });
    });

    it('rejects an account where no vehicle has a VIN', async () => {
      const fetchImpl: FetchLike = async () =>
        new Response(JSON.stringify({ code: 200000, data: [{ vinCode: '' }] }), { status: 200 });

      await expect(
        createClient({ fetch: fetchImpl }).fetchVehicleInfo(token),
      ).rejects.toThrow('Vehicle-info payload failed validation');
    });
  });

  describe('fetchRealtime', () => {
    it('maps the ping response through the alias catalog', async () => {
      const telemetry = await createClient().fetchRealtime(token, vehicle);

      expect(telemetry).toMatchObject({
        batteryLevel: 80,
        range: 300,
        odometer: 12345.5,
        chargingStatus: 0,
        gear: 1,
        lock: 1,
        lowVoltageBattery: 12.6,
        latitude: 37.5,
        longitude: -122.25,
        heading: 90,
      });
      expect(telemetry.timeToFull).toBeUndefined();
    });

    it('returns no values while the vehicle is asleep', async () => {
      upstream.asleep = true;

      await expect(createClient().fetchRealtime(token, vehicle)).resolves.toEqual({});
      expect(upstream.calls.realtime).toBe(1);
    });

    it('loads the alias catalog once', async () => {
      const client = createClient();

      await client.fetchRealtime(token, vehicle);
      await client.fetchRealtime(token, vehicle);

      expect(upstream.calls.alias_catalog).toBe(1);
      expect(upstream.calls.realtime).toBe(2);
    });

    it('addresses the vehicle in request headers', async () => {
      const fetchSpy = vi.fn(upstream.fetch);

      await createClient({ fetch: fetchSpy }).fetchRealtime(token, vehicle);

      const ping = fetchSpy.mock.calls.find(([url]) => url.endsWith(PING_PATH));
      const headers = new Headers(ping?.[1]?.headers);
      expect(ping?.[1]?.method).toBe('POST');
      expect(headers.get('x-vin-code')).toBe('TESTVIN0000000001');
      expect(headers.get('x-player-identifier')).toBe('user-1');
      expect(headers.get('authorization')).toBe(`Bearer ${token.value}`);
    });

    it('uses the fallback resources while the catalog is unavailable', async () => {
      const client = createClient();
      upstream.failNext('alias_catalog', 500, 500, 500);

      await expect(client.fetchRealtime(token, vehicle)).resolves.toEqual({});
      expect(upstream.calls.alias_catalog).toBe(3);

      await expect(client.fetchRealtime(token, vehicle)).resolves.toMatchObject({ batteryLevel: 80 });
      expect(upstream.calls.alias_catalog).toBe(4);
    });

    it('retries 5xx responses up to the retry limit', async () => {
      upstream.failNext('realtime', 503, 503);

      await expect(createClient().fetchRealtime(token, vehicle)).resolves.toMatchObject({
        batteryLevel: 80,
      });
      expect(upstream.calls.realtime).toBe(3);
    });

    it('gives up once retries are exhausted', async () => {
      upstream.failNext('realtime', 503, 503, 503);

      await expect(createClient().fetchRealtime(token, vehicle)).rejects.toMatchObject({
        endpoint: 'realtime',
        transient: true,
        status: 503,
      });
      expect(upstream.calls.realtime).toBe(3);
    });

    it('stops without retrying once the caller aborts', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        createClient().fetchRealtime(token, vehicle, controller.signal),
      ).rejects.toBeInstanceOf(UpstreamError);
      expect(upstream.calls.realtime).toBe(0);
    });
  });
});
