import { z } from 'zod';

import { TELEMETRY_ALIASES } from '../integrations/vinfast/aliasCatalog';
import { ALIAS_PATH, PING_PATH, VEHICLE_INFO_PATH } from '../services/telemetryClient.service';
import type { VinfastConfig } from '../config/vinfastConfig';
import type { FetchLike } from '../utils/http';
import type { UnitSystem } from '../utils/units';

export type MockRoute = 'token' | 'vehicle_info' | 'alias_catalog' | 'realtime';

/** HTTP status, a dropped connection, a non-JSON body, or a request that never answers. */
export type MockFault = number | 'network' | 'malformed' | 'hang';

export type MockVehicle = {
  vinCode: string;
  userId: string;
  vehicleName: string;
  customizedVehicleName?: string;
  vehicleType: string;
  vehicleVariant: string;
  yearOfProduct: number;
  exteriorColor: string;
  odometer?: string | number;
};

export type MockUpstreamOptions = {
  authDomain?: string;
  apiBase?: string;
  tokenLifetimeSeconds?: number;
  vehicle?: Partial<MockVehicle>;
  telemetry?: Record<string, string | number>;
};

export const DEFAULT_VEHICLE: MockVehicle = {
  vinCode: 'TESTVIN0000000001',
  userId: 'user-1',
  vehicleName: 'VF 8',
  customizedVehicleName: 'Family Car',
  vehicleType: 'VF8',
  vehicleVariant: 'Plus',
  yearOfProduct: 2023,
  exteriorColor: 'Crimson Red',
  odometer: '12000',
};

/** Vendor-shaped realtime values keyed by alias; strings like the real endpoint sends. */
export const DEFAULT_TELEMETRY: Record<string, string | number> = {
  VEHICLE_STATUS_HV_BATTERY_SOC: '80',
  VEHICLE_STATUS_REMAINING_DISTANCE: '300',
  VEHICLE_STATUS_ODOMETER: '12345.5',
  CHARGING_STATUS_CHARGING_STATUS: '0',
  CHARGE_CONTROL_CURRENT_TARGET_SOC: '90',
  VEHICLE_STATUS_IGNITION_STATUS: '0',
  VEHICLE_STATUS_GEAR_POSITION: '1',
  VEHICLE_STATUS_VEHICLE_SPEED: '0',
  VEHICLE_STATUS_AMBIENT_TEMPERATURE: '20',
  CLIMATE_INFORMATION_DRIVER_TEMPERATURE: '22',
  VEHICLE_STATUS_FRONT_LEFT_TIRE_PRESSURE: '250',
  VEHICLE_STATUS_FRONT_RIGHT_TIRE_PRESSURE: '250',
  VEHICLE_STATUS_REAR_LEFT_TIRE_PRESSURE: '240',
  VEHICLE_STATUS_REAR_RIGHT_TIRE_PRESSURE: '240',
  DOOR_AJAR_FRONT_LEFT_DOOR_STATUS: '0',
  DOOR_AJAR_FRONT_RIGHT_DOOR_STATUS: '0',
  DOOR_AJAR_REAR_LEFT_DOOR_STATUS: '0',
  DOOR_AJAR_REAR_RIGHT_DOOR_STATUS: '0',
  DOOR_TRUNK_DOOR_STATUS: '0',
  REMOTE_CONTROL_DOOR_STATUS: '1',
  REMOTE_CONTROL_BONNET_CONTROL_STATUS: '0',
  REMOTE_CONTROL_WINDOW_STATUS: '0',
  REMOTE_CONTROL_CHARGE_PORT_STATUS: '0',
  VEHICLE_STATUS_LV_BATTERY_VOLTAGE: '12.6',
  LOCATION_LATITUDE: '37.5',
  LOCATION_LONGITUDE: '-122.25',
  VEHICLE_BEARING_DEGREE: '90',
};

const ALIASES = Object.keys(TELEMETRY_ALIASES);

const pingRequestSchema = z.array(
  z.object({
    objectId: z.coerce.string(),
    instanceId: z.coerce.string(),
    resourceId: z.coerce.string(),
  }),
);

const objectIdFor = (alias: string): string => String(34100 + ALIASES.indexOf(alias));

const pad = (value: string): string => value.padStart(5, '0');

const json = (status: number, body: unknown): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

const hang = (signal: AbortSignal | null | undefined): Promise<never> =>
  new Promise<never>((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });

/**
 * In-process stand-in for the VinFast identity provider and connected-car API. Counts calls
 * per route and replays queued faults before answering normally.
 */
export class MockVinfastUpstream {
  readonly authDomain: string;

  readonly apiBase: string;

  readonly calls: Record<MockRoute, number> = {
    token: 0,
    vehicle_info: 0,
    alias_catalog: 0,
    realtime: 0,
  };

  readonly grants: string[] = [];

  vehicle: MockVehicle;

  telemetry: Record<string, string | number>;

  /** Entries listed after `vehicle`, such as a car still pending transfer. */
  extraVehicles: unknown[] = [];

  /** The ping answers with `data: null`, the way a sleeping vehicle does. */
  asleep = false;

  rejectCredentials = false;

  private readonly tokenLifetimeSeconds: number;

  private readonly faults: Record<MockRoute, MockFault[]> = {
    token: [],
    vehicle_info: [],
    alias_catalog: [],
    realtime: [],
  };

  private readonly validTokens = new Set<string>();

  private issued = 0;

  constructor(options: MockUpstreamOptions = {}) {
    this.authDomain = options.authDomain ?? 'auth.test.local';
    this.apiBase = options.apiBase ?? 'https://api.test.local';
    this.tokenLifetimeSeconds = options.tokenLifetimeSeconds ?? 3600;
    this.vehicle = { ...DEFAULT_VEHICLE, ...options.vehicle };
    this.telemetry = { ...DEFAULT_TELEMETRY, ...options.telemetry };
  }

  /** Queues faults that the next requests on `route` receive, in order. */
  failNext(route: MockRoute, ...faults: MockFault[]): void {
    this.faults[route].push(...faults);
  }

  /** Every token issued so far stops working, as if the account session was revoked. */
  revokeTokens(): void {
    this.validTokens.clear();
  }

  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const route = this.routeOf(url);
    if (!route) {
      return json(404, { code: 404, message: `no route for ${url.pathname}` });
    }

    this.calls[route] += 1;
    const fault = this.faults[route].shift();
    if (fault === 'network') {
      throw new TypeError('fetch failed');
    }
    if (fault === 'hang') {
      return hang(init?.signal);
    }
    if (fault === 'malformed') {
      return new Response('<html>maintenance</html>', { status: 200 });
    }
    if (typeof fault === 'number') {
      return json(fault, { code: fault, message: 'injected failure' });
    }

    if (route === 'token') {
      return this.handleToken(init);
    }

    if (!this.isAuthorized(init)) {
      return json(401, { code: 401, message: 'Unauthorized' });
    }

    if (route === 'vehicle_info') {
      return json(200, { code: 200000, message: 'OK', data: [this.vehicle, ...this.extraVehicles] });
    }

    if (route === 'alias_catalog') {
      return json(200, {
        code: 200000,
        data: {
          resources: ALIASES.map((alias) => ({
            alias,
            devObjID: objectIdFor(alias),
            devObjInstID: '1',
            devRsrcID: '3',
            name: alias.toLowerCase(),
          })),
        },
      });
    }

    return this.handlePing(init);
  };

  private routeOf(url: URL): MockRoute | null {
    if (url.host === this.authDomain && url.pathname === '/oauth/token') {
      return 'token';
    }

    if (`${url.protocol}//${url.host}` !== this.apiBase) {
      return null;
    }

    switch (url.pathname) {
      case VEHICLE_INFO_PATH:
        return 'vehicle_info';
      case ALIAS_PATH:
        return 'alias_catalog';
      case PING_PATH:
        return 'realtime';
      default:
        return null;
    }
  }

  private readBody(init: RequestInit | undefined): unknown {
    return typeof init?.body === 'string' ? JSON.parse(init.body) : null;
  }

  private isAuthorized(init: RequestInit | undefined): boolean {
    const headers = new Headers(init?.headers);
    const header = headers.get('authorization') ?? '';
    return this.validTokens.has(header.replace(/^Bearer\s+/i, ''));
  }

  private handleToken(init: RequestInit | undefined): Response {
    const body = this.readBody(init);
    const grant =
      body && typeof body === 'object' && 'grant_type' in body ? String(body.grant_type) : 'unknown';
    this.grants.push(grant);

    if (grant === 'password' && this.rejectCredentials) {
      return json(403, { error: 'invalid_grant', error_description: 'Wrong email or password.' });
    }

    this.issued += 1;
    const accessToken = `test-access-${this.issued}`;
    this.validTokens.add(accessToken);

    return json(200, {
      access_token: accessToken,
      refresh_token: `test-refresh-${this.issued}`,
      expires_in: this.tokenLifetimeSeconds,
      token_type: 'Bearer',
    });
  }

  private handlePing(init: RequestInit | undefined): Response {
    if (this.asleep) {
      return json(200, { code: 200000, message: 'OK', data: null });
    }

    const parsed = pingRequestSchema.safeParse(this.readBody(init));
    if (!parsed.success) {
      return json(400, { code: 400, message: 'ping body must be a resource list' });
    }

    const data = parsed.data.flatMap((ref) => {
      const alias = ALIASES.find((candidate) => objectIdFor(candidate) === ref.objectId);
      const value = alias ? this.telemetry[alias] : undefined;
      if (value === undefined) {
        return [];
      }

      return [
        {
          objectId: Number(ref.objectId),
          instanceId: Number(ref.instanceId),
          resourceId: Number(ref.resourceId),
          deviceKey: `${ref.objectId}_${pad(ref.instanceId)}_${pad(ref.resourceId)}`,
          value: String(value),
          lastUpdateTime: '2024-05-01T12:00:00Z',
        },
      ];
    });

    return json(200, { code: 200000, message: 'OK', data });
  }
}

/** A complete configuration pointing at `upstream`, with short timings suited to local runs. */
export const createMockConfig = (
  upstream: MockVinfastUpstream,
  overrides: { unitSystem?: UnitSystem; failureThreshold?: number; cycleBudgetMs?: number } = {},
): VinfastConfig => ({
  credentials: { email: 'driver@example.test', password: 'test-secret' },
  auth: {
    domain: upstream.authDomain,
    clientId: 'test-client',
    audience: `https://${upstream.authDomain}/api/v2/`,
    safetyWindowMs: 60_000,
  },
  api: {
    baseUrl: upstream.apiBase,
    timeoutMs: 1_000,
    maxRetries: 2,
    backoffMs: 0,
  },
  polling: {
    intervalMs: 300_000,
    chargingIntervalMs: 60_000,
    cycleBudgetMs: overrides.cycleBudgetMs ?? 5_000,
    failureThreshold: overrides.failureThreshold ?? 3,
  },
  unitSystem: overrides.unitSystem ?? 'imperial',
});
