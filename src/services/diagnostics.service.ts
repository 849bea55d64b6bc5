import type { Snapshot } from '../models/snapshot';
import type { CoordinatorStatus } from './pollingCoordinator.service';

export const REDACTED = '**REDACTED**';

export const DIAGNOSTICS_REDACT_KEYS: ReadonlySet<string> = new Set([
  'vin',
  'userId',
  'latitude',
  'longitude',
  'email',
  'password',
  'accessToken',
  'refreshToken',
]);

/** Copies `data`, replacing the value of every key named in `keys` at any depth. */
export const redactData = (data: unknown, keys: ReadonlySet<string> = DIAGNOSTICS_REDACT_KEYS): unknown => {
  if (Array.isArray(data)) {
    return data.map((item: unknown) => redactData(item, keys));
  }

  if (!data || typeof data !== 'object') {
    return data;
  }

  return Object.fromEntries(
    Object.entries(data).map(([key, value]) => [
      key,
      keys.has(key) ? REDACTED : redactData(value, keys),
    ]),
  );
};

export type DiagnosticsSource = {
  getSnapshot(): Snapshot;
  getStatus(): CoordinatorStatus;
};

export type DiagnosticsReport = {
  generatedAt: string;
  config: {
    unitSystem: string;
    authDomain: string;
    apiBaseUrl: string;
    email: string;
  };
  auth: { tokenExpiresAt: string | null };
  coordinator: CoordinatorStatus;
  snapshot: unknown;
};

export const buildDiagnostics = (input: {
  coordinator: DiagnosticsSource;
  tokenExpiresAt: string | null;
  config: { unitSystem: string; authDomain: string; apiBaseUrl: string; email: string };
  now?: () => number;
}): DiagnosticsReport => {
  const { coordinator, tokenExpiresAt, config } = input;
  const now = input.now ?? Date.now;

  return {
    generatedAt: new Date(now()).toISOString(),
    config: { ...config, email: REDACTED },
    auth: { tokenExpiresAt },
    coordinator: coordinator.getStatus(),
    snapshot: redactData(coordinator.getSnapshot()),
  };
};
