import { aliasResourceSchema, type TelemetryField } from '../../models/telemetry';

export type ResourceRef = {
  objectId: string;
  instanceId: string;
  resourceId: string;
};

/** Vendor alias → field of RawTelemetry. Aliases are the names the mobile app uses. */
export const TELEMETRY_ALIASES: Readonly<Record<string, TelemetryField>> = {
  VEHICLE_STATUS_HV_BATTERY_SOC: 'batteryLevel',
  VEHICLE_STATUS_REMAINING_DISTANCE: 'range',
  VEHICLE_STATUS_ODOMETER: 'odometer',
  CHARGING_STATUS_CHARGING_STATUS: 'chargingStatus',
  CHARGING_STATUS_CHARGING_REMAINING_TIME: 'timeToFull',
  CHARGE_CONTROL_CURRENT_TARGET_SOC: 'chargeLimit',
  CHARGE_CONTROL_SAMPLE_CHARGE_STATUS: 'sampleChargeStatus',
  VEHICLE_STATUS_IGNITION_STATUS: 'ignition',
  VEHICLE_STATUS_GEAR_POSITION: 'gear',
  VEHICLE_STATUS_VEHICLE_SPEED: 'speed',
  VEHICLE_STATUS_HANDBRAKE_STATUS: 'handbrake',
  VEHICLE_STATUS_AMBIENT_TEMPERATURE: 'outsideTemperature',
  CLIMATE_INFORMATION_DRIVER_TEMPERATURE: 'insideTemperature',
  CLIMATE_INFORMATION_STATUS: 'climateStatus',
  VEHICLE_STATUS_FRONT_LEFT_TIRE_PRESSURE: 'tirePressureFrontLeft',
  VEHICLE_STATUS_FRONT_RIGHT_TIRE_PRESSURE: 'tirePressureFrontRight',
  VEHICLE_STATUS_REAR_LEFT_TIRE_PRESSURE: 'tirePressureRearLeft',
  VEHICLE_STATUS_REAR_RIGHT_TIRE_PRESSURE: 'tirePressureRearRight',
  DOOR_AJAR_FRONT_LEFT_DOOR_STATUS: 'doorFrontLeft',
  DOOR_AJAR_FRONT_RIGHT_DOOR_STATUS: 'doorFrontRight',
  DOOR_AJAR_REAR_LEFT_DOOR_STATUS: 'doorRearLeft',
  DOOR_AJAR_REAR_RIGHT_DOOR_STATUS: 'doorRearRight',
  DOOR_TRUNK_DOOR_STATUS: 'trunk',
  REMOTE_CONTROL_DOOR_STATUS: 'lock',
  REMOTE_CONTROL_BONNET_CONTROL_STATUS: 'hood',
  REMOTE_CONTROL_WINDOW_STATUS: 'window',
  REMOTE_CONTROL_CHARGE_PORT_STATUS: 'chargePort',
  VEHICLE_STATUS_LV_BATTERY_VOLTAGE: 'lowVoltageBattery',
  LOCATION_LATITUDE: 'latitude',
  LOCATION_LONGITUDE: 'longitude',
  VEHICLE_BEARING_DEGREE: 'heading',
};

// Used when get-alias is unavailable.
const FALLBACK_RESOURCES: ReadonlyArray<readonly [string, TelemetryField]> = [
  ['/34196/0/0', 'batteryLevel'],
  ['/34196/0/1', 'range'],
  ['/34197/0/0', 'chargingStatus'],
  ['/34197/0/2', 'timeToFull'],
  ['/34193/0/0', 'chargeLimit'],
  ['/34200/0/0', 'latitude'],
  ['/34200/0/1', 'longitude'],
  ['/34201/0/0', 'lock'],
];

export type AliasCatalog = ReadonlyMap<string, ResourceRef>;

export type PingPlan = {
  request: ResourceRef[];
  fieldsByPath: ReadonlyMap<string, TelemetryField>;
  usedFallback: boolean;
};

const normalizeSegment = (value: string | number | undefined): string => {
  if (value === undefined || value === '') {
    return '0';
  }

  const parsed = Number.parseInt(String(value), 10);
  return Number.isNaN(parsed) ? String(value) : String(parsed);
};

export const resourcePath = (ref: ResourceRef): string =>
  `/${ref.objectId}/${ref.instanceId}/${ref.resourceId}`;

const refFromPath = (path: string): ResourceRef => {
  const [objectId, instanceId, resourceId] = path.replace(/^\/+/, '').split('/');
  return {
    objectId: normalizeSegment(objectId),
    instanceId: normalizeSegment(instanceId),
    resourceId: normalizeSegment(resourceId),
  };
};

/** `34183_00001_00003` → `/34183/1/3`. Keys in any other shape are returned unchanged. */
export const deviceKeyToPath = (deviceKey: string): string => {
  const parts = deviceKey.split('_');
  if (parts.length !== 3 || parts.some((part) => !/^\d+$/.test(part))) {
    return deviceKey;
  }

  const [objectId, instanceId, resourceId] = parts.map((part) => normalizeSegment(part));
  return resourcePath({ objectId, instanceId, resourceId });
};

const extractResourceList = (payload: unknown): unknown[] => {
  if (Array.isArray(payload)) {
    return payload;
  }

  if (!payload || typeof payload !== 'object') {
    return [];
  }

  const data = 'data' in payload ? payload.data : undefined;
  if (Array.isArray(data)) {
    return data;
  }

  if (data && typeof data === 'object' && 'resources' in data && Array.isArray(data.resources)) {
    return data.resources;
  }

  return 'resources' in payload && Array.isArray(payload.resources) ? payload.resources : [];
};

/**
 * Reads the get-alias response. The endpoint has been seen returning the resource list at
 * `data.resources`, at `data`, at `resources` and as a bare array.
 */
export const parseAliasCatalog = (payload: unknown): AliasCatalog => {
  const catalog = new Map<string, ResourceRef>();

  extractResourceList(payload).forEach((entry) => {
    const parsed = aliasResourceSchema.safeParse(entry);
    if (!parsed.success) {
      return;
    }

    const resource = parsed.data;
    catalog.set(resource.alias, {
      objectId: normalizeSegment(resource.devObjID),
      instanceId: normalizeSegment(resource.devObjInstID),
      resourceId: normalizeSegment(resource.devRsrcID),
    });
  });

  return catalog;
};

export const buildPingPlan = (catalog: AliasCatalog | null): PingPlan => {
  const fieldsByPath = new Map<string, TelemetryField>();
  const request: ResourceRef[] = [];

  if (catalog && catalog.size > 0) {
    Object.entries(TELEMETRY_ALIASES).forEach(([alias, field]) => {
      const ref = catalog.get(alias);
      if (!ref) {
        return;
      }

      request.push(ref);
      fieldsByPath.set(resourcePath(ref), field);
    });

    if (request.length > 0) {
      return { request, fieldsByPath, usedFallback: false };
    }
  }

  FALLBACK_RESOURCES.forEach(([path, field]) => {
    const ref = refFromPath(path);
    request.push(ref);
    fieldsByPath.set(resourcePath(ref), field);
  });

  return { request, fieldsByPath, usedFallback: true };
};
