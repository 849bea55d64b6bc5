import {
  UNKNOWN,
  freezeSnapshot,
  known,
  type ChargingState,
  type Gear,
  type OdometerSource,
  type Reading,
  type Snapshot,
} from '../../models/snapshot';
import type { RawTelemetry, RawVehicleInfo, TelemetryField } from '../../models/telemetry';
import { displayUnitsFor, toDisplay, type Quantity, type UnitSystem } from '../../utils/units';

const GEAR_CODES: Readonly<Record<number, Gear>> = { 0: 'OFF', 1: 'P', 2: 'R', 3: 'N', 4: 'D' };

const CHARGING_CODES: Readonly<Record<number, ChargingState>> = {
  0: 'not_charging',
  1: 'charging',
  2: 'complete',
  3: 'scheduled',
  4: 'error',
};

export type MergeInput = {
  telemetry: RawTelemetry | null;
  vehicleInfo: RawVehicleInfo | null;
  unitSystem: UnitSystem;
  sequence: number;
  fetchedAt: string;
};

const fromNullable = <T>(value: T | null | undefined): Reading<T> =>
  value === null || value === undefined ? UNKNOWN : known(value);

/**
 * Realtime odometer wins when it reports a positive distance; the vehicle-info figure is
 * the account's odometer of record and may lag behind.
 */
export const selectOdometer = (
  telemetry: RawTelemetry | null,
  vehicleInfo: RawVehicleInfo | null,
): { km: number | null; source: OdometerSource } => {
  const realtime = telemetry?.odometer;
  if (realtime !== undefined && realtime > 0) {
    return { km: realtime, source: 'telemetry' };
  }

  const recorded = vehicleInfo?.odometerKm;
  if (recorded !== null && recorded !== undefined && recorded >= 0) {
    return { km: recorded, source: 'vehicle_info' };
  }

  return { km: null, source: 'none' };
};

export const mergeSnapshot = ({
  telemetry,
  vehicleInfo,
  unitSystem,
  sequence,
  fetchedAt,
}: MergeInput): Snapshot => {
  const raw = (field: TelemetryField): number | undefined => telemetry?.[field];

  const measured = (field: TelemetryField): Reading<number> => fromNullable(raw(field));

  const converted = (field: TelemetryField, quantity: Quantity): Reading<number> => {
    const value = raw(field);
    return value === undefined ? UNKNOWN : known(toDisplay(quantity, value, unitSystem));
  };

  const flag = (field: TelemetryField, test: (code: number) => boolean): Reading<boolean> => {
    const value = raw(field);
    return value === undefined ? UNKNOWN : known(test(value));
  };

  const isOne = (code: number): boolean => Math.trunc(code) === 1;

  const coded = <T>(field: TelemetryField, table: Readonly<Record<number, T>>): Reading<T> => {
    const value = raw(field);
    return value === undefined ? UNKNOWN : fromNullable(table[Math.trunc(value)]);
  };

  const chargingStatus = raw('chargingStatus');
  const chargePort = raw('chargePort');
  let pluggedIn: Reading<boolean> = UNKNOWN;
  if (chargePort !== undefined) {
    pluggedIn = known(isOne(chargePort));
  } else if (chargingStatus !== undefined) {
    pluggedIn = known(Math.trunc(chargingStatus) > 0);
  }

  const doors = {
    frontLeft: flag('doorFrontLeft', isOne),
    frontRight: flag('doorFrontRight', isOne),
    rearLeft: flag('doorRearLeft', isOne),
    rearRight: flag('doorRearRight', isOne),
  };
  const knownDoors = Object.values(doors).filter(
    (door): door is { known: true; value: boolean } => door.known,
  );
  const anyDoor: Reading<boolean> =
    knownDoors.length === 0 ? UNKNOWN : known(knownDoors.some((door) => door.value));

  const latitude = raw('latitude');
  const longitude = raw('longitude');
  const odometer = selectOdometer(telemetry, vehicleInfo);

  return freezeSnapshot({
    sequence,
    fetchedAt,
    units: displayUnitsFor(unitSystem),
    sources: { telemetry: telemetry !== null, vehicleInfo: vehicleInfo !== null },
    vehicle: {
      vin: fromNullable(vehicleInfo?.vin),
      name: fromNullable(vehicleInfo?.name),
      model: fromNullable(vehicleInfo?.model),
      year: fromNullable(vehicleInfo?.year),
      color: fromNullable(vehicleInfo?.color),
    },
    odometer:
      odometer.km === null ? UNKNOWN : known(toDisplay('distance', odometer.km, unitSystem)),
    odometerSource: odometer.source,
    batteryLevel: measured('batteryLevel'),
    range: converted('range', 'distance'),
    chargingState: coded('chargingStatus', CHARGING_CODES),
    charging: flag('chargingStatus', isOne),
    pluggedIn,
    timeToFullMinutes: measured('timeToFull'),
    chargeLimit: measured('chargeLimit'),
    ignitionOn: flag('ignition', isOne),
    gear: coded('gear', GEAR_CODES),
    speed: converted('speed', 'speed'),
    handbrakeEngaged: flag('handbrake', isOne),
    outsideTemperature: converted('outsideTemperature', 'temperature'),
    insideTemperature: converted('insideTemperature', 'temperature'),
    tirePressure: {
      frontLeft: converted('tirePressureFrontLeft', 'pressure'),
      frontRight: converted('tirePressureFrontRight', 'pressure'),
      rearLeft: converted('tirePressureRearLeft', 'pressure'),
      rearRight: converted('tirePressureRearRight', 'pressure'),
    },
    doorsOpen: { ...doors, any: anyDoor },
    trunkOpen: flag('trunk', isOne),
    hoodOpen: flag('hood', isOne),
    windowOpen: flag('window', (code) => Math.trunc(code) !== 0),
    locked: flag('lock', isOne),
    lowVoltageBattery: measured('lowVoltageBattery'),
    location:
      latitude === undefined || longitude === undefined
        ? UNKNOWN
        : known({ latitude, longitude, heading: raw('heading') ?? null }),
  });
};
