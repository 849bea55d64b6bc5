import { describe, expect, it } from 'vitest';

import { createEntityAdapters, renderEntities, type EntityState } from '../src/entities';
import { mergeSnapshot } from '../src/integrations/vinfast/snapshotMapper';
import { createEmptySnapshot } from '../src/models/snapshot';

const snapshot = mergeSnapshot({
  telemetry: {
    batteryLevel: 80,
    range: 300,
    odometer: 12345.5,
    chargingStatus: 1,
    gear: 4,
    doorFrontLeft: 0,
    doorRearRight: 1,
    lock: 1,
    lowVoltageBattery: 12.634,
    latitude: 37.5,
    longitude: -122.25,
    heading: 90,
  },
  vehicleInfo: {
    vin: 'TESTVIN0000000001',
    userId: 'user-1',
    name: 'Family Car',
    model: 'VF8 Plus',
    year: 2023,
    color: 'Crimson Red',
    odometerKm: 12000,
  },
  unitSystem: 'imperial',
  sequence: 1,
  fetchedAt: '2024-05-01T12:00:00.000Z',
});

const byKey = (states: EntityState[], key: string): EntityState | undefined =>
  states.find((state) => state.key === key);

describe('entity adapters', () => {
  const adapters = createEntityAdapters();

  it('exposes one adapter per entity key', () => {
    const keys = adapters.map((adapter) => adapter.key);

    expect(adapters).toHaveLength(33);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it('renders sensors in display units with display rounding', () => {
    const states = renderEntities(adapters, snapshot, true);

    expect(byKey(states, 'odometer')).toMatchObject({
      platform: 'sensor',
      value: 7671.1,
      unit: 'mi',
      deviceClass: 'distance',
      available: true,
    });
    expect(byKey(states, 'range')).toMatchObject({ value: 186.4, unit: 'mi' });
    expect(byKey(states, 'battery_level')).toMatchObject({ value: 80, unit: '%' });
    expect(byKey(states, 'low_voltage_battery')).toMatchObject({ value: 12.63, unit: 'V' });
    expect(byKey(states, 'charging_status')?.value).toBe('Charging');
    expect(byKey(states, 'gear')?.value).toBe('D');
    expect(byKey(states, 'model')?.value).toBe('VF8 Plus');
  });

  it('renders binary sensors from decoded flags', () => {
    const states = renderEntities(adapters, snapshot, true);

    expect(byKey(states, 'locked')).toMatchObject({ platform: 'binary_sensor', value: true });
    expect(byKey(states, 'charging')?.value).toBe(true);
    expect(byKey(states, 'door_open')?.value).toBe(true);
    expect(byKey(states, 'door_front_left')?.value).toBe(false);
    expect(byKey(states, 'trunk_open')).toMatchObject({ value: null, available: false });
  });

  it('renders the location tracker', () => {
    const states = renderEntities(adapters, snapshot, true);

    expect(byKey(states, 'location')).toEqual({
      key: 'location',
      platform: 'device_tracker',
      name: 'Location',
      icon: 'mdi:car-connected',
      unit: null,
      deviceClass: null,
      available: true,
      value: '37.5,-122.25',
      attributes: { sourceType: 'gps', latitude: 37.5, longitude: -122.25, heading: 90 },
    });
  });

  it('keeps the last value but reports unavailable when the coordinator is', () => {
    const states = renderEntities(adapters, snapshot, false);

    expect(byKey(states, 'battery_level')).toMatchObject({ value: 80, available: false });
    expect(states.every((state) => !state.available)).toBe(true);
  });

  it('never reports unknown fields as zero', () => {
    const states = renderEntities(adapters, createEmptySnapshot('metric'), true);

    expect(byKey(states, 'battery_level')).toMatchObject({ value: null, available: false, unit: '%' });
    expect(byKey(states, 'speed')).toMatchObject({ value: null, unit: 'km/h' });
    expect(byKey(states, 'location')).toMatchObject({
      value: null,
      attributes: { sourceType: 'gps' },
    });
  });
});
