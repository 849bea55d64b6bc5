import dotenvFlow from 'dotenv-flow';

import { createBridge } from '../src/bridge';
import { getVinfastConfig } from '../src/config/vinfastConfig';
import { renderEntities } from '../src/entities';
import type { UnitSystem } from '../src/utils/units';

dotenvFlow.config();

const parseArgs = () => {
  const args = process.argv.slice(2);
  return args.reduce<{ units?: UnitSystem; entities?: boolean }>((accumulator, arg) => {
    if (arg === '--units=metric' || arg === '--units=imperial') {
      return { ...accumulator, units: arg === '--units=metric' ? 'metric' : 'imperial' };
    }

    if (arg === '--entities') {
      return { ...accumulator, entities: true };
    }

    return accumulator;
  }, {});
};

const run = async () => {
  const args = parseArgs();
  const config = getVinfastConfig();
  const bridge = createBridge({ ...config, unitSystem: args.units ?? config.unitSystem });

  const outcome = await bridge.coordinator.refresh('manual');
  await bridge.coordinator.stop();

  if (!outcome.success) {
    throw new Error(`Poll failed: ${outcome.error ?? 'unknown error'}`);
  }

  const output = args.entities
    ? renderEntities(bridge.adapters, outcome.snapshot, outcome.available)
    : { snapshot: outcome.snapshot, degraded: outcome.degraded, error: outcome.error };

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(output, null, 2));
};

run().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
