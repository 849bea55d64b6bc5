import { describe, expect, it } from 'vitest';

import {
  buildPingPlan,
  deviceKeyToPath,
  parseAliasCatalog,
} from '../src/integrations/vinfast/aliasCatalog';
import {
  mapPingItemsToRawTelemetry,
  mapVehiclePayloadToRawInfo,
} from '../src/integrations/vinfast/telemetryMapper';

const socResource = {
  alias: 'VEHICLE_STATUS_HV_BATTERY_SOC',
  devObjID: '34183',
  devObjInstID: '00001',
  devRsrcID: '3',
};

describe('deviceKeyToPath', () => {
  it('turns padded device keys into resource paths', () => {
    expect(deviceKeyToPath('34183_00001_00003')).toBe('/34183/1/3');
    expect(deviceKeyToPath('34196_00000_00000')).toBe('/34196/0/0');
  });

  it('returns keys in other shapes unchanged', () => {
    expect(deviceKeyToPath('/34183/1/3')).toBe('/34183/1/3');
    expect(deviceKeyToPath('abc_1_2')).toBe('abc_1_2');
    expect(deviceKeyToPath('34183_1')).toBe('34183_1');
  });
});

describe('parseAliasCatalog', () => {
  it.each([
    ['data.resources', { data: { resources: [socResource] } }],
    ['data', { data: [socResource] }],
    ['resources', { resources: [socResource] }],
    ['a bare array', [socResource]],
  ])('reads the resource list from %s', (_label, payload) => {
    const catalog = parseAliasCatalog(payload);

    expect(catalog.get('VEHICLE_STATUS_HV_BATTERY_SOC')).toEqual({
      objectId: '34183',
      instanceId: '1',
      resourceId: '3',
    });
  });

  it('defaults missing segments to 0 and skips entries without an alias', () => {
    const catalog = parseAliasCatalog({
      data: [{ alias: 'LOCATION_LATITUDE', devObjID: 34200 }, { devObjID: '1' }, 'junk'],
    });

    expect(catalog.size).toBe(1);
    expect(catalog.get('LOCATION_LATITUDE')).toEqual({
      objectId: '34200',
      instanceId: '0',
      resourceId: '0',
    });
  });

  it('returns an empty catalog for unexpected payloads', () => {
    expect(parseAliasCatalog(null).size).toBe(0);
    expect(parseAliasCatalog({ data: 'nope' }).size).toBe(0);
  });
});

describe('buildPingPlan', () => {
  it('requests only aliases the bridge understands', () => {
    const catalog = parseAliasCatalog([
      socResource,
      { alias: 'SOME_UNMAPPED_ALIAS', devObjID: '1', devObjInstID: '0', devRsrcID: '0' },
    ]);

    const plan = buildPingPlan(catalog);

    expect(plan.usedFallback).toBe(false);
    expect(plan.request).toEqual([{ objectId: '34183', instanceId: '1', resourceId: '3' }]);
    expect(plan.fieldsByPath.get('/34183/1/3')).toBe('batteryLevel');
  });

  it('falls back to the fixed resource set without a catalog', () => {
    const plan = buildPingPlan(null);

    expect(plan.usedFallback).toBe(true);
    expect(plan.request).toHaveLength(8);
    expect(plan.fieldsByPath.get('/34196/0/0')).toBe('batteryLevel');
    expect(plan.fieldsByPath.get('/34201/0/0')).toBe('lock');
  });

  it('falls back when the catalog knows none of the aliases', () => {
    const plan = buildPingPlan(
      parseAliasCatalog([{ alias: 'SOME_UNMAPPED_ALIAS', devObjID: '1' }]),
    );

    expect(plan.usedFallback).toBe(true);
  });
});

describe('mapPingItemsToRawTelemetry', () => {
  it('maps requested paths and coerces vendor values to numbers', () => {
    const { fieldsByPath } = buildPingPlan(null);

    const telemetry = mapPingItemsToRawTelemetry(
      [
        { deviceKey: '34196_00000_00000', value: '80' },
        { deviceKey: '34197_00000_00000', value: 1 },
        { deviceKey: '34201_00000_00000', value: true },
        { deviceKey: '99999_00000_00000', value: '5' },
        { deviceKey: '34196_00000_00001', value: 'n/a' },
        { deviceKey: '34200_00000_00000', value: null },
        { value: '3' },
      ],
      fieldsByPath,
    );

    expect(telemetry).toEqual({ batteryLevel: 80, chargingStatus: 1, lock: 1 });
    expect(Object.isFrozen(telemetry)).toBe(true);
  });
});

describe('mapVehiclePayloadToRawInfo', () => {
  it('normalizes the vehicle-info record', () => {
    expect(
      mapVehiclePayloadToRawInfo({
        vinCode: ' TESTVIN0000000002 ',
        userId: 4567,
        vehicleName: 'VF 8',
        customizedVehicleName: '  ',
        vehicleType: 'VF8',
        vehicleVariant: null,
        yearOfProduct: '2023.0',
        exteriorColor: 'Blue',
        odometer: '1500.5',
      }),
    ).toEqual({
      vin: 'TESTVIN0000000002',
      userId: '4567',
      name: 'VF 8',
      model: 'VF8',
      year: 2023,
      color: 'Blue',
      odometerKm: 1500.5,
    });
  });

  it('prefers the customized name and leaves absent fields null', () => {
    expect(
      mapVehiclePayloadToRawInfo({ vinCode: 'TESTVIN0000000003', customizedVehicleName: 'Road Trip' }),
    ).toEqual({
      vin: 'TESTVIN0000000003',
      userId: null,
      name: 'Road Trip',
      model: null,
      year: null,
      color: null,
      odometerKm: null,
    });
  });
});
