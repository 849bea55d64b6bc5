import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createBridge, type Bridge } from '../src/bridge';
import { createMockConfig, MockVinfastUpstream } from '../src/simulation/vinfastUpstream.mock';

describe('bridge against the in-process upstream', () => {
  let upstream: MockVinfastUpstream;
  let bridge: Bridge;

  beforeEach(() => {
    upstream = new MockVinfastUpstream();
    bridge = createBridge(createMockConfig(upstream), { fetch: upstream.fetch });
  });

  afterEach(async () => {
    await bridge.coordinator.stop();
  });

  it('renews the token through the refresh grant when realtime answers 401', async () => {
    await bridge.coordinator.refresh();
    const invalidate = vi.spyOn(bridge.session, 'invalidate');
    upstream.failNext('realtime', 401);

    const outcome = await bridge.coordinator.refresh();

    expect(outcome).toMatchObject({ success: true, degraded: false, reauthRequired: false });
    expect(outcome.snapshot.sequence).toBe(2);
    expect(invalidate).toHaveBeenCalledTimes(1);
    expect(upstream.grants).toEqual(['password', 'refresh_token']);
    expect(upstream.calls.realtime).toBe(3);
  });

  it('publishes on the first cycle when another vehicle on the account has no VIN', async () => {
    upstream.extraVehicles = [{ vinCode: null, vehicleName: 'pending' }];

    const outcome = await bridge.coordinator.refresh();

    expect(outcome).toMatchObject({ success: true, degraded: false });
    expect(outcome.snapshot.vehicle.vin).toEqual({ known: true, value: 'TESTVIN0000000001' });
    expect(outcome.snapshot.batteryLevel).toEqual({ known: true, value: 80 });
  });

  it('publishes without an error while the vehicle is asleep', async () => {
    upstream.asleep = true;

    const outcome = await bridge.coordinator.refresh();

    expect(outcome).toMatchObject({ success: true, degraded: false, error: null });
    expect(outcome.snapshot.batteryLevel).toEqual({ known: false });
    expect(outcome.snapshot.vehicle.name).toEqual({ known: true, value: 'Family Car' });
    expect(bridge.coordinator.getStatus()).toMatchObject({
      lastCycleResult: 'published',
      lastError: null,
    });
  });
});
