import type { Snapshot } from '../models/snapshot';
import { BINARY_SENSOR_DESCRIPTIONS, BinarySensorAdapter } from './binarySensors';
import { LocationTrackerAdapter } from './deviceTracker';
import type { EntityAdapter, EntityState } from './entityAdapter';
import { SENSOR_DESCRIPTIONS, SensorAdapter } from './sensors';

export type { EntityAdapter, EntityState } from './entityAdapter';

export const createEntityAdapters = (): EntityAdapter[] => [
  ...SENSOR_DESCRIPTIONS.map((description) => new SensorAdapter(description)),
  ...BINARY_SENSOR_DESCRIPTIONS.map((description) => new BinarySensorAdapter(description)),
  new LocationTrackerAdapter(),
];

export const renderEntities = (
  adapters: readonly EntityAdapter[],
  snapshot: Snapshot,
  coordinatorAvailable: boolean,
): EntityState[] => adapters.map((adapter) => adapter.render(snapshot, coordinatorAvailable));
