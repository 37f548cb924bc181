/**
 * Skyhand Agent — Telemetry Poller
 *
 * Background loop that refreshes a cached telemetry snapshot at a fixed
 * interval. Readers take a copy and never wait on the loop; a reader
 * that needs fresher data than the cache holds pulls it directly.
 *
 * State transitions are recorded as they are observed. A poll failure
 * is logged and the loop carries on with the next tick.
 */

import type { VehicleBackend } from '../backends/backend.js';
import type { TelemetryReader } from '../commands/command.js';
import { delay } from '../core/async.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { CancellationError, toErrorMessage } from '../types/errors.js';
import type { Telemetry } from '../types/models.js';
import { StateTracker, type StateChange } from '../types/state-machine.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface TelemetryPollerConfig {
  /** Poll interval (ms). */
  intervalMs: number;
}

export const DEFAULT_TELEMETRY_POLLER_CONFIG: TelemetryPollerConfig = {
  intervalMs: 1_000,
};

// ---------------------------------------------------------------------------
// TelemetryPoller
// ---------------------------------------------------------------------------

export class TelemetryPoller implements TelemetryReader {
  readonly config: TelemetryPollerConfig;
  readonly tracker = new StateTracker();
  private readonly backend: VehicleBackend;
  private readonly logger: Logger;
  private _snapshot: Telemetry | null = null;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private _polls = 0;
  private _failures = 0;

  /** Called on every observed state change. */
  onStateChange?: (change: StateChange) => void;

  constructor(backend: VehicleBackend, config: Partial<TelemetryPollerConfig> = {}, logger: Logger = silentLogger) {
    this.backend = backend;
    this.config = { ...DEFAULT_TELEMETRY_POLLER_CONFIG, ...config };
    this.logger = logger;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /** Completed and failed poll counts. */
  get stats(): { polls: number; failures: number } {
    return { polls: this._polls, failures: this._failures };
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.logger.info('telemetry_poller_started', { intervalMs: this.config.intervalMs });
  }

  /** Stop the loop and wait for it to exit. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    await loop;
    this.loop = null;
    this.controller = null;
    this.logger.info('telemetry_poller_stopped', this.stats);
  }

  /** Copy of the latest snapshot, or null before the first poll. */
  snapshot(): Telemetry | null {
    return this._snapshot ? structuredClone(this._snapshot) : null;
  }

  /** Snapshot no older than `maxAgeMs`, refreshed from the backend otherwise. */
  async read(maxAgeMs: number = this.config.intervalMs): Promise<Telemetry> {
    const cached = this._snapshot;
    if (cached && Date.now() - cached.timestamp < maxAgeMs) {
      return structuredClone(cached);
    }
    return structuredClone(await this.refresh());
  }

  /** Pull telemetry now and update the cache. */
  async refresh(): Promise<Telemetry> {
    const telemetry = await this.backend.getTelemetry();
    this.record(telemetry);
    return telemetry;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private record(telemetry: Telemetry): void {
    // A slower concurrent read must not replace a newer snapshot.
    if (this._snapshot && this._snapshot.timestamp > telemetry.timestamp) return;
    this._snapshot = telemetry;

    const change = this.tracker.observe(telemetry.state, telemetry.timestamp);
    if (!change) return;
    if (change.valid) {
      this.logger.info('state_changed', { from: change.from, to: change.to });
    } else {
      this.logger.warn('unexpected_state_transition', { from: change.from, to: change.to });
    }
    this.onStateChange?.(change);
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.refresh();
        this._polls++;
      } catch (err) {
        this._failures++;
        this.logger.warn('telemetry_poll_failed', { error: toErrorMessage(err) });
      }
      try {
        await delay(this.config.intervalMs, signal);
      } catch (err) {
        if (err instanceof CancellationError) return;
        throw err;
      }
    }
  }
}
