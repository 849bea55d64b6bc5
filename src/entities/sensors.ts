import type { Reading, Snapshot } from '../models/snapshot';
import {
  roundTo,
  type EntityAdapter,
  type EntityDescription,
  type EntityState,
} from './entityAdapter';

type SensorValue = string | number;

export type SensorDescription = EntityDescription<SensorValue> & {
  /** Decimal places shown to the host; the Snapshot itself keeps full precision. */
  precision?: number;
};

const CHARGING_LABELS = {
  not_charging: 'Not Charging',
  charging: 'Charging',
  complete: 'Complete',
  scheduled: 'Scheduled',
  error: 'Error',
} as const;

const label = (reading: Snapshot['chargingState']): Reading<string> =>
  reading.known ? { known: true, value: CHARGING_LABELS[reading.value] } : reading;

export class SensorAdapter implements EntityAdapter {
  readonly platform = 'sensor' as const;

  readonly key: string;

  private readonly description: SensorDescription;

  constructor(description: SensorDescription) {
    this.description = description;
    this.key = description.key;
  }

  render(snapshot: Snapshot, coordinatorAvailable: boolean): EntityState {
    const { name, icon, deviceClass, unit, precision, read } = this.description;
    const reading = read(snapshot);

    let value: SensorValue | null = null;
    if (reading.known) {
      value =
        typeof reading.value === 'number' && precision !== undefined
          ? roundTo(reading.value, precision)
          : reading.value;
    }

    return {
      key: this.key,
      platform: this.platform,
      name,
      icon,
      unit: unit ? unit(snapshot.units) : null,
      deviceClass: deviceClass ?? null,
      available: coordinatorAvailable && reading.known,
      value,
      attributes: {},
    };
  }
}

export const SENSOR_DESCRIPTIONS: readonly SensorDescription[] = [
  {
    key: 'odometer',
    name: 'Odometer',
    icon: 'mdi:counter',
    deviceClass: 'distance',
    unit: (units) => units.distance,
    precision: 1,
    read: (snapshot) => snapshot.odometer,
  },
  {
    key: 'vehicle_name',
    name: 'Vehicle name',
    icon: 'mdi:car',
    read: (snapshot) => snapshot.vehicle.name,
  },
  {
    key: 'model',
    name: 'Model',
    icon: 'mdi:car-info',
    read: (snapshot) => snapshot.vehicle.model,
  },
  {
    key: 'year',
    name: 'Year',
    icon: 'mdi:calendar',
    read: (snapshot) => snapshot.vehicle.year,
  },
  {
    key: 'color',
    name: 'Color',
    icon: 'mdi:palette',
    read: (snapshot) => snapshot.vehicle.color,
  },
  {
    key: 'vin',
    name: 'VIN',
    icon: 'mdi:identifier',
    read: (snapshot) => snapshot.vehicle.vin,
  },
  {
    key: 'battery_level',
    name: 'Battery level',
    icon: 'mdi:battery',
    deviceClass: 'battery',
    unit: () => '%',
    read: (snapshot) => snapshot.batteryLevel,
  },
  {
    key: 'range',
    name: 'Range',
    icon: 'mdi:map-marker-distance',
    deviceClass: 'distance',
    unit: (units) => units.distance,
    precision: 1,
    read: (snapshot) => snapshot.range,
  },
  {
    key: 'time_to_full',
    name: 'Time to full',
    icon: 'mdi:timer',
    deviceClass: 'duration',
    unit: () => 'min',
    read: (snapshot) => snapshot.timeToFullMinutes,
  },
  {
    key: 'charging_status',
    name: 'Charging status',
    icon: 'mdi:ev-station',
    read: (snapshot) => label(snapshot.chargingState),
  },
  {
    key: 'charge_limit',
    name: 'Charge limit',
    icon: 'mdi:battery-charging-high',
    unit: () => '%',
    read: (snapshot) => snapshot.chargeLimit,
  },
  {
    key: 'speed',
    name: 'Speed',
    icon: 'mdi:speedometer',
    deviceClass: 'speed',
    unit: (units) => units.speed,
    precision: 1,
    read: (snapshot) => snapshot.speed,
  },
  {
    key: 'gear',
    name: 'Gear',
    icon: 'mdi:car-shift-pattern',
    read: (snapshot) => snapshot.gear,
  },
  {
    key: 'outside_temp',
    name: 'Outside temperature',
    icon: 'mdi:thermometer',
    deviceClass: 'temperature',
    unit: (units) => units.temperature,
    precision: 1,
    read: (snapshot) => snapshot.outsideTemperature,
  },
  {
    key: 'inside_temp',
    name: 'Inside temperature',
    icon: 'mdi:thermometer',
    deviceClass: 'temperature',
    unit: (units) => units.temperature,
    precision: 1,
    read: (snapshot) => snapshot.insideTemperature,
  },
  {
    key: 'tire_pressure_fl',
    name: 'Tire pressure front left',
    icon: 'mdi:car-tire-alert',
    deviceClass: 'pressure',
    unit: (units) => units.pressure,
    precision: 1,
    read: (snapshot) => snapshot.tirePressure.frontLeft,
  },
  {
    key: 'tire_pressure_fr',
    name: 'Tire pressure front right',
    icon: 'mdi:car-tire-alert',
    deviceClass: 'pressure',
    unit: (units) => units.pressure,
    precision: 1,
    read: (snapshot) => snapshot.tirePressure.frontRight,
  },
  {
    key: 'tire_pressure_rl',
    name: 'Tire pressure rear left',
    icon: 'mdi:car-tire-alert',
    deviceClass: 'pressure',
    unit: (units) => units.pressure,
    precision: 1,
    read: (snapshot) => snapshot.tirePressure.rearLeft,
  },
  {
    key: 'tire_pressure_rr',
    name: 'Tire pressure rear right',
    icon: 'mdi:car-tire-alert',
    deviceClass: 'pressure',
    unit: (units) => units.pressure,
    precision: 1,
    read: (snapshot) => snapshot.tirePressure.rearRight,
  },
  {
    key: 'low_voltage_battery',
    name: '12V battery',
    icon: 'mdi:car-battery',
    deviceClass: 'voltage',
    unit: () => 'V',
    precision: 2,
    read: (snapshot) => snapshot.lowVoltageBattery,
  },
];
