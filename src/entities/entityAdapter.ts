import type { Reading, Snapshot } from '../models/snapshot';
import type { DisplayUnits } from '../utils/units';

export type EntityPlatform = 'sensor' | 'binary_sensor' | 'device_tracker';

export type EntityValue = string | number | boolean | null;

export type EntityState = {
  key: string;
  platform: EntityPlatform;
  name: string;
  icon: string;
  unit: string | null;
  deviceClass: string | null;
  available: boolean;
  value: EntityValue;
  attributes: Record<string, EntityValue>;
};

/** Renders one host entity from a published Snapshot. Adapters never fetch. */
export interface EntityAdapter {
  readonly key: string;
  readonly platform: EntityPlatform;
  render(snapshot: Snapshot, coordinatorAvailable: boolean): EntityState;
}

export type EntityDescription<T> = {
  key: string;
  name: string;
  icon: string;
  deviceClass?: string;
  unit?: (units: DisplayUnits) => string | null;
  read: (snapshot: Snapshot) => Reading<T>;
};

export const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};
