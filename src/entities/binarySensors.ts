import type { Snapshot } from '../models/snapshot';
import type { EntityAdapter, EntityDescription, EntityState } from './entityAdapter';

export type BinarySensorDescription = EntityDescription<boolean>;

export class BinarySensorAdapter implements EntityAdapter {
  readonly platform = 'binary_sensor' as const;

  readonly key: string;

  private readonly description: BinarySensorDescription;

  constructor(description: BinarySensorDescription) {
    this.description = description;
    this.key = description.key;
  }

  render(snapshot: Snapshot, coordinatorAvailable: boolean): EntityState {
    const { name, icon, deviceClass, read } = this.description;
    const reading = read(snapshot);

    return {
      key: this.key,
      platform: this.platform,
      name,
      icon,
      unit: null,
      deviceClass: deviceClass ?? null,
      available: coordinatorAvailable && reading.known,
      value: reading.known ? reading.value : null,
      attributes: {},
    };
  }
}

export const BINARY_SENSOR_DESCRIPTIONS: readonly BinarySensorDescription[] = [
  {
    key: 'locked',
    name: 'Locked',
    icon: 'mdi:car-key',
    deviceClass: 'lock',
    read: (snapshot) => snapshot.locked,
  },
  {
    key: 'ignition',
    name: 'Ignition',
    icon: 'mdi:engine',
    deviceClass: 'power',
    read: (snapshot) => snapshot.ignitionOn,
  },
  {
    key: 'charging',
    name: 'Charging',
    icon: 'mdi:battery-charging',
    deviceClass: 'battery_charging',
    read: (snapshot) => snapshot.charging,
  },
  {
    key: 'plugged_in',
    name: 'Plugged in',
    icon: 'mdi:power-plug',
    deviceClass: 'plug',
    read: (snapshot) => snapshot.pluggedIn,
  },
  {
    key: 'trunk_open',
    name: 'Trunk',
    icon: 'mdi:car-back',
    deviceClass: 'opening',
    read: (snapshot) => snapshot.trunkOpen,
  },
  {
    key: 'hood_open',
    name: 'Hood',
    icon: 'mdi:car',
    deviceClass: 'opening',
    read: (snapshot) => snapshot.hoodOpen,
  },
  {
    key: 'door_open',
    name: 'Doors',
    icon: 'mdi:car-door',
    deviceClass: 'door',
    read: (snapshot) => snapshot.doorsOpen.any,
  },
  {
    key: 'window_open',
    name: 'Windows',
    icon: 'mdi:car-door',
    deviceClass: 'window',
    read: (snapshot) => snapshot.windowOpen,
  },
  {
    key: 'door_front_left',
    name: 'Front left door',
    icon: 'mdi:car-door',
    deviceClass: 'door',
    read: (snapshot) => snapshot.doorsOpen.frontLeft,
  },
  {
    key: 'door_front_right',
    name: 'Front right door',
    icon: 'mdi:car-door',
    deviceClass: 'door',
    read: (snapshot) => snapshot.doorsOpen.frontRight,
  },
  {
    key: 'door_rear_left',
    name: 'Rear left door',
    icon: 'mdi:car-door',
    deviceClass: 'door',
    read: (snapshot) => snapshot.doorsOpen.rearLeft,
  },
  {
    key: 'door_rear_right',
    name: 'Rear right door',
    icon: 'mdi:car-door',
    deviceClass: 'door',
    read: (snapshot) => snapshot.doorsOpen.rearRight,
  },
];
