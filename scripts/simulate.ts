import { createBridge } from '../src/bridge';
import type { CycleOutcome } from '../src/services/pollingCoordinator.service';
import {
  createMockConfig,
  MockVinfastUpstream,
} from '../src/simulation/vinfastUpstream.mock';

type Scenario = {
  description: string;
  cycles: number;
  /** Called before each cycle to stage the upstream's behaviour. */
  stage: (upstream: MockVinfastUpstream, cycle: number) => void;
};

const SCENARIOS: Record<string, Scenario> = {
  healthy: {
    description: 'every request succeeds',
    cycles: 3,
    stage: (upstream, cycle) => {
      upstream.telemetry.VEHICLE_STATUS_HV_BATTERY_SOC = String(80 - cycle * 2);
    },
  },
  flaky: {
    description: 'realtime answers 503 twice before succeeding; the client retries',
    cycles: 2,
    stage: (upstream, cycle) => {
      if (cycle === 1) {
        upstream.failNext('realtime', 503, 503);
      }
    },
  },
  revoked: {
    description: 'the access token is revoked between cycles; the coordinator re-authenticates',
    cycles: 2,
    stage: (upstream, cycle) => {
      if (cycle === 1) {
        upstream.revokeTokens();
      }
    },
  },
  outage: {
    description: 'both endpoints fail; data goes unavailable at the failure threshold',
    cycles: 4,
    stage: (upstream, cycle) => {
      if (cycle > 0) {
        upstream.failNext('realtime', 'network', 'network', 'network');
        upstream.failNext('vehicle_info', 'network', 'network', 'network');
      }
    },
  },
};

const parseArgs = () => {
  const args = process.argv.slice(2);
  return args.reduce<{ scenario?: string }>((accumulator, arg) => {
    if (arg.startsWith('--scenario=')) {
      return { ...accumulator, scenario: arg.split('=')[1] };
    }

    return accumulator;
  }, {});
};

const summarize = (cycle: number, outcome: CycleOutcome) => ({
  cycle,
  success: outcome.success,
  degraded: outcome.degraded,
  available: outcome.available,
  consecutiveFailures: outcome.consecutiveFailures,
  sequence: outcome.snapshot.sequence,
  batteryLevel: outcome.snapshot.batteryLevel,
  error: outcome.error,
});

const run = async () => {
  const { scenario = 'healthy' } = parseArgs();
  const selected = SCENARIOS[scenario];
  if (!selected) {
    throw new Error(
      `Unknown scenario "${scenario}". Available: ${Object.keys(SCENARIOS).join(', ')}`,
    );
  }

  const upstream = new MockVinfastUpstream();
  const bridge = createBridge(createMockConfig(upstream), { fetch: upstream.fetch });

  const cycles: ReturnType<typeof summarize>[] = [];
  for (let cycle = 0; cycle < selected.cycles; cycle += 1) {
    selected.stage(upstream, cycle);
    // Cycles run one after another, as the timer would fire them.
    // eslint-disable-next-line no-await-in-loop
    const outcome = await bridge.coordinator.refresh('timer');
    cycles.push(summarize(cycle, outcome));
  }
  await bridge.coordinator.stop();

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        scenario,
        description: selected.description,
        upstreamCalls: upstream.calls,
        grants: upstream.grants,
        cycles,
      },
      null,
      2,
    ),
  );
};

run().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
