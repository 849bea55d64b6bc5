import type { Snapshot } from '../models/snapshot';
import type { EntityAdapter, EntityState } from './entityAdapter';

export class LocationTrackerAdapter implements EntityAdapter {
  readonly platform = 'device_tracker' as const;

  readonly key = 'location';

  render(snapshot: Snapshot, coordinatorAvailable: boolean): EntityState {
    const { location } = snapshot;

    return {
      key: this.key,
      platform: this.platform,
      name: 'Location',
      icon: 'mdi:car-connected',
      unit: null,
      deviceClass: null,
      available: coordinatorAvailable && location.known,
      value: location.known ? `${location.value.latitude},${location.value.longitude}` : null,
      attributes: location.known
        ? {
            sourceType: 'gps',
            latitude: location.value.latitude,
            longitude: location.value.longitude,
            heading: location.value.heading,
          }
        : { sourceType: 'gps' },
    };
  }
}
