import { parseInteger } from './appConfig';
import type { UnitSystem } from '../utils/units';

const DEFAULT_AUTH_DOMAIN = 'vinfast-us-prod.us.auth0.com';
const DEFAULT_API_BASE = 'https://mobile.connected-car.vinfastauto.us';

const FIVE_MINUTES_MS = 5 * 60_000;

/** Floor for poll intervals and the cycle budget. */
const MIN_TIMING_MS = 1_000;

const parseTiming = (value: string | undefined, fallback: number): number =>
  Math.max(MIN_TIMING_MS, parseInteger(value, fallback));

const parseUnitSystem = (value: string | undefined): UnitSystem =>
  (value || 'imperial').toLowerCase() === 'metric' ? 'metric' : 'imperial';

export const getVinfastConfig = () => {
  const email = process.env.VINFAST_EMAIL;
  const password = process.env.VINFAST_PASSWORD;
  const clientId = process.env.VINFAST_CLIENT_ID;

  if (!email || !password || !clientId) {
    throw new Error(
      'VinFast configuration is incomplete. Set VINFAST_EMAIL, VINFAST_PASSWORD, and VINFAST_CLIENT_ID.',
    );
  }

  const authDomain = process.env.VINFAST_AUTH_DOMAIN || DEFAULT_AUTH_DOMAIN;

  return {
    credentials: { email, password },
    auth: {
      domain: authDomain,
      clientId,
      audience: process.env.VINFAST_AUDIENCE || `https://${authDomain}/api/v2/`,
      safetyWindowMs: parseInteger(process.env.TOKEN_SAFETY_WINDOW_MS, 60_000),
    },
    api: {
      baseUrl: (process.env.VINFAST_API_BASE || DEFAULT_API_BASE).replace(/\/+$/, ''),
      timeoutMs: parseInteger(process.env.REQUEST_TIMEOUT_MS, 30_000),
      maxRetries: Math.max(0, parseInteger(process.env.REQUEST_MAX_RETRIES, 2)),
      backoffMs: parseInteger(process.env.REQUEST_BACKOFF_MS, 500),
    },
    polling: {
      intervalMs: parseTiming(process.env.POLL_INTERVAL_MS, FIVE_MINUTES_MS),
      chargingIntervalMs: parseTiming(process.env.CHARGING_POLL_INTERVAL_MS, FIVE_MINUTES_MS),
      cycleBudgetMs: parseTiming(process.env.CYCLE_BUDGET_MS, 60_000),
      failureThreshold: Math.max(1, parseInteger(process.env.FAILURE_THRESHOLD, 3)),
    },
    unitSystem: parseUnitSystem(process.env.UNIT_SYSTEM),
  };
};

export type VinfastConfig = ReturnType<typeof getVinfastConfig>;
