import type { VinfastConfig } from './config/vinfastConfig';
import { createEntityAdapters, type EntityAdapter } from './entities';
import { AuthSession } from './services/authSession.service';
import { buildDiagnostics, type DiagnosticsReport } from './services/diagnostics.service';
import { PollingCoordinator } from './services/pollingCoordinator.service';
import { TelemetryClient } from './services/telemetryClient.service';
import type { FetchLike } from './utils/http';

export type Bridge = {
  session: AuthSession;
  client: TelemetryClient;
  coordinator: PollingCoordinator;
  adapters: readonly EntityAdapter[];
  diagnostics: () => DiagnosticsReport;
};

export type BridgeOverrides = {
  fetch?: FetchLike;
  now?: () => number;
};

/** Wires one vehicle account: session → client → coordinator, plus the entity adapters over it. */
export const createBridge = (config: VinfastConfig, overrides: BridgeOverrides = {}): Bridge => {
  const session = new AuthSession({
    ...config.auth,
    credentials: config.credentials,
    timeoutMs: config.api.timeoutMs,
    fetch: overrides.fetch,
    now: overrides.now,
  });

  const client = new TelemetryClient({ ...config.api, fetch: overrides.fetch });

  const coordinator = new PollingCoordinator({
    ...config.polling,
    session,
    client,
    unitSystem: config.unitSystem,
    now: overrides.now,
  });

  return {
    session,
    client,
    coordinator,
    adapters: createEntityAdapters(),
    diagnostics: () =>
      buildDiagnostics({
        coordinator,
        tokenExpiresAt: session.tokenExpiresAt,
        config: {
          unitSystem: config.unitSystem,
          authDomain: config.auth.domain,
          apiBaseUrl: config.api.baseUrl,
          email: config.credentials.email,
        },
        now: overrides.now,
      }),
  };
};
