import { displayUnitsFor, type DisplayUnits, type UnitSystem } from '../utils/units';

export type Reading<T> = { readonly known: true; readonly value: T } | { readonly known: false };

export const known = <T>(value: T): Reading<T> => ({ known: true, value });

export const UNKNOWN: Reading<never> = Object.freeze({ known: false });

export type Gear = 'OFF' | 'P' | 'R' | 'N' | 'D';

export type ChargingState = 'not_charging' | 'charging' | 'complete' | 'scheduled' | 'error';

export type OdometerSource = 'telemetry' | 'vehicle_info' | 'none';

export type TirePressures = {
  readonly frontLeft: Reading<number>;
  readonly frontRight: Reading<number>;
  readonly rearLeft: Reading<number>;
  readonly rearRight: Reading<number>;
};

export type DoorStates = {
  readonly frontLeft: Reading<boolean>;
  readonly frontRight: Reading<boolean>;
  readonly rearLeft: Reading<boolean>;
  readonly rearRight: Reading<boolean>;
  readonly any: Reading<boolean>;
};

export type Location = {
  readonly latitude: number;
  readonly longitude: number;
  readonly heading: number | null;
};

export type SnapshotVehicle = {
  readonly vin: Reading<string>;
  readonly name: Reading<string>;
  readonly model: Reading<string>;
  readonly year: Reading<number>;
  readonly color: Reading<string>;
};

/**
 * Merged, display-unit view of the vehicle. Published frozen; a new poll cycle produces a
 * new object instead of touching this one.
 */
export type Snapshot = {
  readonly sequence: number;
  readonly fetchedAt: string | null;
  readonly units: DisplayUnits;
  readonly sources: { readonly telemetry: boolean; readonly vehicleInfo: boolean };
  readonly vehicle: SnapshotVehicle;
  readonly odometer: Reading<number>;
  readonly odometerSource: OdometerSource;
  readonly batteryLevel: Reading<number>;
  readonly range: Reading<number>;
  readonly chargingState: Reading<ChargingState>;
  readonly charging: Reading<boolean>;
  readonly pluggedIn: Reading<boolean>;
  readonly timeToFullMinutes: Reading<number>;
  readonly chargeLimit: Reading<number>;
  readonly ignitionOn: Reading<boolean>;
  readonly gear: Reading<Gear>;
  readonly speed: Reading<number>;
  readonly handbrakeEngaged: Reading<boolean>;
  readonly outsideTemperature: Reading<number>;
  readonly insideTemperature: Reading<number>;
  readonly tirePressure: TirePressures;
  readonly doorsOpen: DoorStates;
  readonly trunkOpen: Reading<boolean>;
  readonly hoodOpen: Reading<boolean>;
  readonly windowOpen: Reading<boolean>;
  readonly locked: Reading<boolean>;
  readonly lowVoltageBattery: Reading<number>;
  readonly location: Reading<Location>;
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }

  return value;
};

export const freezeSnapshot = (snapshot: Snapshot): Snapshot => deepFreeze(snapshot);

export const createEmptySnapshot = (unitSystem: UnitSystem): Snapshot =>
  freezeSnapshot({
    sequence: 0,
    fetchedAt: null,
    units: displayUnitsFor(unitSystem),
    sources: { telemetry: false, vehicleInfo: false },
    vehicle: { vin: UNKNOWN, name: UNKNOWN, model: UNKNOWN, year: UNKNOWN, color: UNKNOWN },
    odometer: UNKNOWN,
    odometerSource: 'none',
    batteryLevel: UNKNOWN,
    range: UNKNOWN,
    chargingState: UNKNOWN,
    charging: UNKNOWN,
    pluggedIn: UNKNOWN,
    timeToFullMinutes: UNKNOWN,
    chargeLimit: UNKNOWN,
    ignitionOn: UNKNOWN,
    gear: UNKNOWN,
    speed: UNKNOWN,
    handbrakeEngaged: UNKNOWN,
    outsideTemperature: UNKNOWN,
    insideTemperature: UNKNOWN,
    tirePressure: { frontLeft: UNKNOWN, frontRight: UNKNOWN, rearLeft: UNKNOWN, rearRight: UNKNOWN },
    doorsOpen: {
      frontLeft: UNKNOWN,
      frontRight: UNKNOWN,
      rearLeft: UNKNOWN,
      rearRight: UNKNOWN,
      any: UNKNOWN,
    },
    trunkOpen: UNKNOWN,
    hoodOpen: UNKNOWN,
    windowOpen: UNKNOWN,
    locked: UNKNOWN,
    lowVoltageBattery: UNKNOWN,
    location: UNKNOWN,
  });
