import { mergeSnapshot } from '../integrations/vinfast/snapshotMapper';
import { createEmptySnapshot, type Snapshot } from '../models/snapshot';
import type { RawTelemetry, RawVehicleInfo, VehicleIdentity } from '../models/telemetry';
import {
  AuthError,
  CycleTimeoutError,
  UpstreamError,
  describeError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import type { UnitSystem } from '../utils/units';
import type { AccessToken } from './authSession.service';

export type CyclePhase = 'idle' | 'fetching' | 'merging' | 'published' | 'failed';

export type CycleTrigger = 'timer' | 'manual' | 'charging';

export type CycleResult = 'published' | 'degraded' | 'failed';

export interface TokenProvider {
  getValidToken(): Promise<AccessToken>;
  invalidate(): void;
}

export interface TelemetrySource {
  fetchRealtime(token: AccessToken, vehicle: VehicleIdentity, signal?: AbortSignal): Promise<RawTelemetry>;
  fetchVehicleInfo(token: AccessToken, signal?: AbortSignal): Promise<RawVehicleInfo>;
}

export type CycleOutcome = {
  readonly trigger: CycleTrigger;
  readonly success: boolean;
  readonly snapshot: Snapshot;
  readonly consecutiveFailures: number;
  readonly available: boolean;
  readonly degraded: boolean;
  readonly reauthRequired: boolean;
  readonly error: string | null;
  readonly completedAt: string;
};

export type CycleListener = (outcome: CycleOutcome) => void;

export type CoordinatorStatus = {
  phase: CyclePhase;
  running: boolean;
  available: boolean;
  consecutiveFailures: number;
  failureThreshold: number;
  lastUpdatedAt: string | null;
  lastCycleAt: string | null;
  lastError: string | null;
  lastCycleResult: CycleResult | null;
  reauthRequired: boolean;
  chargingHint: boolean;
  intervalMs: number;
};

export type PollingCoordinatorOptions = {
  session: TokenProvider;
  client: TelemetrySource;
  unitSystem: UnitSystem;
  intervalMs: number;
  chargingIntervalMs: number;
  cycleBudgetMs: number;
  failureThreshold: number;
  now?: () => number;
};

type SourceResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

type FetchResult = {
  telemetry: RawTelemetry | null;
  vehicleInfo: RawVehicleInfo | null;
  errors: unknown[];
};

const settle = async <T>(promise: Promise<T>): Promise<SourceResult<T>> => {
  try {
    return { ok: true, value: await promise };
  } catch (error) {
    return { ok: false, error };
  }
};

const wantsReauth = (error: unknown): boolean => error instanceof UpstreamError && error.reauth;

const summarize = (errors: unknown[]): string => errors.map(describeError).join('; ');

/** Abort reason `stop()` hands to the running cycle. */
const STOPPED = Symbol('polling stopped');

/**
 * Owns the poll cadence and the published Snapshot. At most one cycle runs at a time; timer
 * ticks that land during a cycle are dropped and manual refreshes join the running cycle.
 */
export class PollingCoordinator {
  private readonly options: PollingCoordinatorOptions;

  private readonly now: () => number;

  private readonly listeners = new Set<CycleListener>();

  private snapshot: Snapshot;

  private phase: CyclePhase = 'idle';

  private identity: VehicleIdentity | null = null;

  private inFlight: Promise<CycleOutcome> | null = null;

  private cycleController: AbortController | null = null;

  private timer: NodeJS.Timeout | null = null;

  private chargingHint = false;

  private consecutiveFailures = 0;

  private lastUpdatedAt: string | null = null;

  private lastCycleAt: string | null = null;

  private lastError: string | null = null;

  private lastCycleResult: CycleResult | null = null;

  private reauthRequired = false;

  constructor(options: PollingCoordinatorOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.snapshot = createEmptySnapshot(options.unitSystem);
  }

  getSnapshot(): Snapshot {
    return this.snapshot;
  }

  isAvailable(): boolean {
    return this.consecutiveFailures < this.options.failureThreshold;
  }

  getStatus(): CoordinatorStatus {
    return {
      phase: this.phase,
      running: this.timer !== null,
      available: this.isAvailable(),
      consecutiveFailures: this.consecutiveFailures,
      failureThreshold: this.options.failureThreshold,
      lastUpdatedAt: this.lastUpdatedAt,
      lastCycleAt: this.lastCycleAt,
      lastError: this.lastError,
      lastCycleResult: this.lastCycleResult,
      reauthRequired: this.reauthRequired,
      chargingHint: this.chargingHint,
      intervalMs: this.currentIntervalMs(),
    };
  }

  subscribe(listener: CycleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.armTimer();
    logger.info({ intervalMs: this.currentIntervalMs() }, 'polling started');
  }

  /**
   * Stops the timer and aborts a running cycle; resolves once that cycle has settled. The
   * aborted cycle leaves the failure count and the last error as they were.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const running = this.inFlight;
    this.cycleController?.abort(STOPPED);
    if (running) {
      await running;
    }

    this.listeners.clear();
    logger.info('polling stopped');
  }

  /** Runs a cycle now, or returns the one already running. */
  refresh(trigger: CycleTrigger = 'manual'): Promise<CycleOutcome> {
    if (this.inFlight) {
      logger.debug({ trigger }, 'refresh joined running cycle');
      return this.inFlight;
    }

    const cycle = this.runCycle(trigger).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  /**
   * Forwards the home charger's state. Charging switches to the charging interval and polls
   * immediately so the charge session shows up without waiting for the idle cadence.
   */
  setChargingHint(charging: boolean): void {
    if (charging === this.chargingHint) {
      return;
    }

    this.chargingHint = charging;
    logger.info(
      { charging, intervalMs: this.currentIntervalMs() },
      'charger state changed; polling interval updated',
    );

    if (this.timer) {
      clearInterval(this.timer);
      this.armTimer();
    }

    if (charging) {
      this.refresh('charging').catch((error: unknown) => {
        logger.error({ err: describeError(error) }, 'charging-triggered refresh crashed');
      });
    }
  }

  private currentIntervalMs(): number {
    return this.chargingHint ? this.options.chargingIntervalMs : this.options.intervalMs;
  }

  private armTimer(): void {
    this.timer = setInterval(() => this.tick(), this.currentIntervalMs());
    this.timer.unref();
  }

  private tick(): void {
    if (this.inFlight) {
      logger.debug('poll tick skipped; previous cycle still running');
      return;
    }

    this.refresh('timer').catch((error: unknown) => {
      logger.error({ err: describeError(error) }, 'scheduled refresh crashed');
    });
  }

  private async runCycle(trigger: CycleTrigger): Promise<CycleOutcome> {
    const { cycleBudgetMs } = this.options;
    const controller = new AbortController();
    this.cycleController = controller;
    this.phase = 'fetching';
    logger.debug({ trigger }, 'poll cycle started');

    let budgetTimer: NodeJS.Timeout | undefined;
    const budget = new Promise<never>((_resolve, reject) => {
      budgetTimer = setTimeout(() => {
        const timeout = new CycleTimeoutError(cycleBudgetMs);
        controller.abort(timeout);
        reject(timeout);
      }, cycleBudgetMs);
    });

    let outcome: CycleOutcome;
    try {
      const fetched = await Promise.race([this.fetchSources(controller.signal), budget]);
      if (controller.signal.reason === STOPPED) {
        outcome = this.cancelled(trigger);
      } else if (fetched.telemetry || fetched.vehicleInfo) {
        outcome = this.publish(trigger, fetched);
      } else {
        outcome = this.recordFailure(trigger, summarize(fetched.errors), this.needsOperator(fetched.errors));
      }
    } catch (error) {
      outcome =
        controller.signal.reason === STOPPED
          ? this.cancelled(trigger)
          : this.recordFailure(trigger, describeError(error), this.needsOperator([error]));
    } finally {
      clearTimeout(budgetTimer);
      this.cycleController = null;
    }

    this.phase = 'idle';
    if (controller.signal.reason !== STOPPED) {
      this.notify(outcome);
    }
    return outcome;
  }

  private async fetchSources(signal: AbortSignal): Promise<FetchResult> {
    const first = await this.fetchOnce(signal);
    if (!first.errors.some(wantsReauth) || signal.aborted) {
      return first;
    }

    logger.warn('upstream rejected the access token; invalidating and retrying once');
    this.options.session.invalidate();
    return this.fetchOnce(signal);
  }

  private async fetchOnce(signal: AbortSignal): Promise<FetchResult> {
    const { session, client } = this.options;
    const token = await session.getValidToken();

    const known = this.identity;
    if (!known) {
      const info = await settle(client.fetchVehicleInfo(token, signal));
      if (!info.ok) {
        return { telemetry: null, vehicleInfo: null, errors: [info.error] };
      }

      this.rememberIdentity(info.value);
      const realtime = await settle(client.fetchRealtime(token, this.identityOf(info.value), signal));
      return realtime.ok
        ? { telemetry: realtime.value, vehicleInfo: info.value, errors: [] }
        : { telemetry: null, vehicleInfo: info.value, errors: [realtime.error] };
    }

    const [realtime, info] = await Promise.all([
      settle(client.fetchRealtime(token, known, signal)),
      settle(client.fetchVehicleInfo(token, signal)),
    ]);

    const errors: unknown[] = [];
    if (!realtime.ok) {
      errors.push(realtime.error);
    }
    if (info.ok) {
      this.rememberIdentity(info.value);
    } else {
      errors.push(info.error);
    }

    return {
      telemetry: realtime.ok ? realtime.value : null,
      vehicleInfo: info.ok ? info.value : null,
      errors,
    };
  }

  private identityOf(info: RawVehicleInfo): VehicleIdentity {
    return { vin: info.vin, userId: info.userId };
  }

  private rememberIdentity(info: RawVehicleInfo): void {
    if (this.identity?.vin !== info.vin) {
      logger.info({ hasUserId: info.userId !== null }, 'vehicle identity resolved');
    }
    this.identity = this.identityOf(info);
  }

  private needsOperator(errors: unknown[]): boolean {
    return errors.some(
      (error) =>
        (error instanceof AuthError && error.reason === 'invalid_credentials') || wantsReauth(error),
    );
  }

  private publish(trigger: CycleTrigger, fetched: FetchResult): CycleOutcome {
    this.phase = 'merging';
    const completedAt = new Date(this.now()).toISOString();
    const snapshot = mergeSnapshot({
      telemetry: fetched.telemetry,
      vehicleInfo: fetched.vehicleInfo,
      unitSystem: this.options.unitSystem,
      sequence: this.snapshot.sequence + 1,
      fetchedAt: completedAt,
    });

    const degraded = fetched.errors.length > 0;
    this.snapshot = snapshot;
    this.phase = 'published';
    this.consecutiveFailures = 0;
    this.reauthRequired = false;
    this.lastUpdatedAt = completedAt;
    this.lastCycleAt = completedAt;
    this.lastError = degraded ? summarize(fetched.errors) : null;
    this.lastCycleResult = degraded ? 'degraded' : 'published';

    if (degraded) {
      logger.warn(
        {
          trigger,
          sequence: snapshot.sequence,
          telemetry: snapshot.sources.telemetry,
          vehicleInfo: snapshot.sources.vehicleInfo,
          err: this.lastError,
        },
        'snapshot published with partial data',
      );
    } else {
      logger.info(
        { trigger, sequence: snapshot.sequence, odometerSource: snapshot.odometerSource },
        'snapshot published',
      );
    }

    return {
      trigger,
      success: true,
      snapshot,
      consecutiveFailures: 0,
      available: true,
      degraded,
      reauthRequired: false,
      error: this.lastError,
      completedAt,
    };
  }

  private recordFailure(trigger: CycleTrigger, message: string, reauthRequired: boolean): CycleOutcome {
    this.phase = 'failed';
    const completedAt = new Date(this.now()).toISOString();
    this.consecutiveFailures += 1;
    this.lastCycleAt = completedAt;
    this.lastError = message;
    this.lastCycleResult = 'failed';
    this.reauthRequired = this.reauthRequired || reauthRequired;

    const available = this.isAvailable();
    const logFields = {
      trigger,
      consecutiveFailures: this.consecutiveFailures,
      failureThreshold: this.options.failureThreshold,
      reauthRequired: this.reauthRequired,
      err: message,
    };
    if (this.consecutiveFailures === this.options.failureThreshold) {
      logger.error(logFields, 'vehicle data unavailable after consecutive failed cycles');
    } else {
      logger.warn(logFields, 'poll cycle failed; keeping previous snapshot');
    }

    return {
      trigger,
      success: false,
      snapshot: this.snapshot,
      consecutiveFailures: this.consecutiveFailures,
      available,
      degraded: false,
      reauthRequired: this.reauthRequired,
      error: message,
      completedAt,
    };
  }

  private cancelled(trigger: CycleTrigger): CycleOutcome {
    logger.info({ trigger }, 'poll cycle cancelled by stop');
    return {
      trigger,
      success: false,
      snapshot: this.snapshot,
      consecutiveFailures: this.consecutiveFailures,
      available: this.isAvailable(),
      degraded: false,
      reauthRequired: this.reauthRequired,
      error: 'poll cycle cancelled',
      completedAt: new Date(this.now()).toISOString(),
    };
  }

  private notify(outcome: CycleOutcome): void {
    this.listeners.forEach((listener) => {
      try {
        listener(outcome);
      } catch (error) {
        logger.error({ err: describeError(error) }, 'cycle listener threw');
      }
    });
  }
}
