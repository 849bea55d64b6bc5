import {
  pingItemSchema,
  type RawTelemetry,
  type RawVehicleInfo,
  type TelemetryField,
  type VehiclePayload,
} from '../../models/telemetry';
import { deviceKeyToPath } from './aliasCatalog';

const toNumber = (value: string | number | boolean | null | undefined): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
};

const toText = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

/**
 * Maps ping items back to telemetry fields through the paths that were requested.
 * Items for paths nobody asked for, non-numeric values and malformed entries are skipped.
 */
export const mapPingItemsToRawTelemetry = (
  items: readonly unknown[],
  fieldsByPath: ReadonlyMap<string, TelemetryField>,
): RawTelemetry => {
  const telemetry: Partial<Record<TelemetryField, number>> = {};

  items.forEach((item) => {
    const parsed = pingItemSchema.safeParse(item);
    if (!parsed.success) {
      return;
    }

    const field = fieldsByPath.get(deviceKeyToPath(parsed.data.deviceKey));
    const value = toNumber(parsed.data.value);
    if (field && value !== null) {
      telemetry[field] = value;
    }
  });

  return Object.freeze(telemetry);
};

export const mapVehiclePayloadToRawInfo = (vehicle: VehiclePayload): RawVehicleInfo => {
  const model = [toText(vehicle.vehicleType), toText(vehicle.vehicleVariant)]
    .filter((part): part is string => part !== null)
    .join(' ');
  const year = toNumber(vehicle.yearOfProduct);
  const userId = vehicle.userId === null || vehicle.userId === undefined ? null : String(vehicle.userId);

  return Object.freeze({
    vin: vehicle.vinCode.trim(),
    userId,
    name: toText(vehicle.customizedVehicleName) ?? toText(vehicle.vehicleName),
    model: model.length > 0 ? model : null,
    year: year !== null ? Math.trunc(year) : null,
    color: toText(vehicle.exteriorColor),
    odometerKm: toNumber(vehicle.odometer),
  });
};
