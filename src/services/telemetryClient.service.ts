import { setTimeout as delay } from 'timers/promises';

import {
  buildPingPlan,
  parseAliasCatalog,
  type AliasCatalog,
} from '../integrations/vinfast/aliasCatalog';
import {
  mapPingItemsToRawTelemetry,
  mapVehiclePayloadToRawInfo,
} from '../integrations/vinfast/telemetryMapper';
import {
  SUCCESS_CODES,
  apiEnvelopeSchema,
  pingResponseDataSchema,
  vehicleListSchema,
  vehicleSchema,
  type ApiEnvelope,
  type RawTelemetry,
  type RawVehicleInfo,
  type VehicleIdentity,
} from '../models/telemetry';
import { UpstreamError, type UpstreamEndpoint } from '../utils/errors';
import {
  fetchText,
  parseJson,
  RequestFailure,
  type FetchLike,
  type TextResponse,
} from '../utils/http';
import { logger } from '../utils/logger';
import type { AccessToken } from './authSession.service';

export const VEHICLE_INFO_PATH = '/ccarusermgnt/api/v1/user-vehicle';
export const PING_PATH = '/ccaraccessmgmt/api/v1/telemetry/app/ping';
export const ALIAS_PATH = '/modelmgmt/api/v2/vehicle-model/mobile-app/vehicle/get-alias';

const APP_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
  'x-service-name': 'CAPP',
  'x-app-version': '1.10.3',
  'x-device-platform': 'HomeAutomation',
  'x-device-family': 'Integration',
  'x-device-os-version': '1.0',
  'x-device-locale': 'en-US',
  'x-device-identifier': 'vinfast-telemetry-bridge',
};

export type TelemetryClientOptions = {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
  aliasVersion?: string;
  fetch?: FetchLike;
};

type RequestPlan = {
  endpoint: UpstreamEndpoint;
  method: 'GET' | 'POST';
  path: string;
  token: AccessToken;
  vehicle?: VehicleIdentity;
  body?: unknown;
  signal?: AbortSignal;
};

const isTransientStatus = (status: number): boolean => status >= 500 || status === 429;

const isReauthStatus = (status: number): boolean => status === 401 || status === 403;

export class TelemetryClient {
  private readonly options: TelemetryClientOptions;

  private readonly fetchImpl: FetchLike;

  private readonly aliasVersion: string;

  private aliasCatalog: AliasCatalog | null = null;

  constructor(options: TelemetryClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.aliasVersion = options.aliasVersion ?? '1.0';
  }

  async fetchVehicleInfo(token: AccessToken, signal?: AbortSignal): Promise<RawVehicleInfo> {
    const envelope = this.expectEnvelope(
      'vehicle_info',
      await this.send({ endpoint: 'vehicle_info', method: 'GET', path: VEHICLE_INFO_PATH, token, signal }),
    );

    const vehicles = vehicleListSchema.safeParse(envelope.data);
    if (!vehicles.success) {
      logger.error({ endpoint: 'vehicle_info' }, 'vehicle-info payload has no vehicle list');
      throw new UpstreamError('vehicle_info', 'Vehicle-info payload failed validation', {
        transient: false,
      });
    }

    for (const [index, entry] of vehicles.data.entries()) {
      const vehicle = vehicleSchema.safeParse(entry);
      if (vehicle.success) {
        if (index > 0) {
          logger.warn({ skipped: index }, 'skipped vehicle entries without a usable VIN');
        }
        return mapVehiclePayloadToRawInfo(vehicle.data);
      }
    }

    logger.error(
      { endpoint: 'vehicle_info', vehicles: vehicles.data.length },
      'no vehicle on the account passed validation',
    );
    throw new UpstreamError('vehicle_info', 'Vehicle-info payload failed validation', {
      transient: false,
    });
  }

  async fetchRealtime(
    token: AccessToken,
    vehicle: VehicleIdentity,
    signal?: AbortSignal,
  ): Promise<RawTelemetry> {
    const plan = buildPingPlan(await this.loadAliasCatalog(token, vehicle, signal));
    if (plan.usedFallback) {
      logger.debug({ resources: plan.request.length }, 'telemetry ping using fallback resources');
    }

    const envelope = this.expectEnvelope(
      'realtime',
      await this.send({
        endpoint: 'realtime',
        method: 'POST',
        path: PING_PATH,
        token,
        vehicle,
        body: plan.request,
        signal,
      }),
    );

    if (envelope.data === null || envelope.data === undefined) {
      logger.debug('telemetry ping returned no data; vehicle is likely asleep');
      return {};
    }

    const items = pingResponseDataSchema.safeParse(envelope.data);
    if (!items.success) {
      throw new UpstreamError('realtime', 'Telemetry ping response has no value list', {
        transient: false,
      });
    }

    const telemetry = mapPingItemsToRawTelemetry(items.data, plan.fieldsByPath);
    logger.debug(
      { received: items.data.length, mapped: Object.keys(telemetry).length },
      'telemetry ping parsed',
    );
    return telemetry;
  }

  private async loadAliasCatalog(
    token: AccessToken,
    vehicle: VehicleIdentity,
    signal?: AbortSignal,
  ): Promise<AliasCatalog | null> {
    if (this.aliasCatalog) {
      return this.aliasCatalog;
    }

    try {
      const payload = await this.send({
        endpoint: 'alias_catalog',
        method: 'GET',
        path: `${ALIAS_PATH}?version=${encodeURIComponent(this.aliasVersion)}`,
        token,
        vehicle,
        signal,
      });
      const catalog = parseAliasCatalog(payload);
      if (catalog.size === 0) {
        logger.warn({ version: this.aliasVersion }, 'alias catalog empty; using fallback resources');
        return null;
      }

      this.aliasCatalog = catalog;
      logger.debug({ aliases: catalog.size, version: this.aliasVersion }, 'alias catalog loaded');
      return catalog;
    } catch (error) {
      if (error instanceof UpstreamError && !error.reauth && !signal?.aborted) {
        logger.warn(
          { endpoint: error.endpoint, status: error.status, err: error.message },
          'alias catalog unavailable; using fallback resources',
        );
        return null;
      }

      throw error;
    }
  }

  private expectEnvelope(endpoint: UpstreamEndpoint, payload: unknown): ApiEnvelope {
    const envelope = apiEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new UpstreamError(endpoint, 'Response is not a VinFast API envelope', {
        transient: false,
      });
    }

    const { code } = envelope.data;
    if (code !== undefined && !SUCCESS_CODES.includes(code)) {
      logger.warn({ endpoint, code }, 'vinfast api returned an error code');
      throw new UpstreamError(
        endpoint,
        `VinFast API error ${String(code)}: ${envelope.data.message ?? 'unknown error'}`,
        { transient: false },
      );
    }

    return envelope.data;
  }

  private async send(plan: RequestPlan): Promise<unknown> {
    const { maxRetries, backoffMs } = this.options;

    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.attempt(plan, attempt);
      } catch (error) {
        if (
          !(error instanceof UpstreamError) ||
          !error.transient ||
          attempt > maxRetries ||
          plan.signal?.aborted
        ) {
          throw error;
        }

        logger.warn(
          { endpoint: plan.endpoint, attempt, status: error.status, err: error.message },
          'vinfast request failed; retrying',
        );
        await delay(backoffMs * attempt, undefined, { signal: plan.signal });
      }
    }
  }

  private async attempt(plan: RequestPlan, attempt: number): Promise<unknown> {
    const { endpoint, method, path, token, vehicle, body, signal } = plan;
    const headers: Record<string, string> = {
      ...APP_HEADERS,
      Authorization: `Bearer ${token.value}`,
    };
    if (vehicle) {
      headers['x-vin-code'] = vehicle.vin;
      if (vehicle.userId) {
        headers['x-player-identifier'] = vehicle.userId;
      }
    }

    let response: TextResponse;
    try {
      response = await fetchText(
        this.fetchImpl,
        `${this.options.baseUrl}${path}`,
        { method, headers, body: body === undefined ? undefined : JSON.stringify(body) },
        { timeoutMs: this.options.timeoutMs, signal },
      );
    } catch (error) {
      const failure = error instanceof RequestFailure ? error : null;
      throw new UpstreamError(endpoint, failure?.message ?? String(error), {
        transient: !failure?.aborted,
      });
    }

    logger.debug({ endpoint, method, status: response.status, attempt }, 'vinfast response received');

    if (isReauthStatus(response.status)) {
      throw new UpstreamError(endpoint, `VinFast rejected the access token (HTTP ${response.status})`, {
        transient: false,
        reauth: true,
        status: response.status,
      });
    }

    if (!response.ok) {
      throw new UpstreamError(endpoint, `VinFast responded with HTTP ${response.status}`, {
        transient: isTransientStatus(response.status),
        status: response.status,
      });
    }

    const json = parseJson(response.text);
    if (!json.ok) {
      throw new UpstreamError(endpoint, `VinFast returned unparseable JSON (HTTP ${response.status})`, {
        transient: false,
        status: response.status,
      });
    }

    return json.value;
  }
}
