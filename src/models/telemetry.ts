import { z } from 'zod';

const numberLike = z.union([z.number(), z.string()]);

/** `code` values the vehicle cloud uses for success. */
export const SUCCESS_CODES: ReadonlyArray<number | string> = [0, 200000, '0', '200000'];

export const apiEnvelopeSchema = z
  .object({
    code: numberLike.optional(),
    message: z.string().nullish(),
    data: z.unknown(),
  })
  .passthrough();

export type ApiEnvelope = z.infer<typeof apiEnvelopeSchema>;

export const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1).nullish(),
    expires_in: z.number().positive().nullish(),
  })
  .passthrough();

export const pingItemSchema = z
  .object({
    deviceKey: z.string().min(1),
    value: z.union([z.string(), z.number(), z.boolean()]).nullish(),
    lastUpdateTime: numberLike.nullish(),
  })
  .passthrough();

export const pingResponseDataSchema = z.array(z.unknown());

export const aliasResourceSchema = z
  .object({
    alias: z.string().min(1),
    devObjID: numberLike,
    devObjInstID: numberLike.optional(),
    devRsrcID: numberLike.optional(),
    name: z.string().nullish(),
    units: z.string().nullish(),
  })
  .passthrough();

export const vehicleSchema = z
  .object({
    vinCode: z.string().min(1),
    userId: numberLike.nullish(),
    vehicleName: z.string().nullish(),
    customizedVehicleName: z.string().nullish(),
    vehicleType: z.string().nullish(),
    vehicleVariant: z.string().nullish(),
    yearOfProduct: numberLike.nullish(),
    exteriorColor: z.string().nullish(),
    odometer: numberLike.nullish(),
  })
  .passthrough();

export type VehiclePayload = z.infer<typeof vehicleSchema>;

/** Entries are checked one by one; a pending or transferred car may lack its VIN. */
export const vehicleListSchema = z.array(z.unknown()).min(1, 'account has no vehicles');

export const TELEMETRY_FIELDS = [
  'batteryLevel',
  'range',
  'odometer',
  'chargingStatus',
  'timeToFull',
  'chargeLimit',
  'sampleChargeStatus',
  'ignition',
  'gear',
  'speed',
  'handbrake',
  'outsideTemperature',
  'insideTemperature',
  'climateStatus',
  'tirePressureFrontLeft',
  'tirePressureFrontRight',
  'tirePressureRearLeft',
  'tirePressureRearRight',
  'doorFrontLeft',
  'doorFrontRight',
  'doorRearLeft',
  'doorRearRight',
  'trunk',
  'hood',
  'window',
  'lock',
  'chargePort',
  'lowVoltageBattery',
  'latitude',
  'longitude',
  'heading',
] as const;

export type TelemetryField = (typeof TELEMETRY_FIELDS)[number];

/**
 * Values from the realtime endpoint, in the vendor's metric units and raw status codes.
 * A field is absent when the vehicle did not report it.
 */
export type RawTelemetry = Readonly<Partial<Record<TelemetryField, number>>>;

export type RawVehicleInfo = {
  readonly vin: string;
  readonly userId: string | null;
  readonly name: string | null;
  readonly model: string | null;
  readonly year: number | null;
  readonly color: string | null;
  readonly odometerKm: number | null;
};

/** What the realtime endpoint needs to address the vehicle. */
export type VehicleIdentity = {
  readonly vin: string;
  readonly userId: string | null;
};
