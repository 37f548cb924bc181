/**
 * Skyhand Agent — Setpoint Streamer
 *
 * Offboard control needs a steady stream of position targets; the
 * autopilot falls back to a failsafe mode when the stream stops. The
 * streamer resends the latest target at a fixed rate until stopped.
 */

import { delay } from '../core/async.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { CancellationError, toErrorMessage } from '../types/errors.js';
import type { NedPoint } from '../types/geo.js';

export interface PositionSetpoint {
  target: NedPoint;
  /** Degrees; omitted means keep the current heading */
  yaw?: number;
}

export type SetpointSender = (setpoint: PositionSetpoint) => Promise<void>;

export class SetpointStreamer {
  private setpoint: PositionSetpoint | null = null;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private _sent = 0;

  constructor(
    private readonly send: SetpointSender,
    private readonly rateHz: number,
    private readonly logger: Logger = silentLogger,
  ) {}

  get active(): boolean {
    return this.loop !== null;
  }

  /** Setpoints sent since construction. Exposed for testing. */
  get sent(): number {
    return this._sent;
  }

  get current(): PositionSetpoint | null {
    return this.setpoint;
  }

  /**
   * Send `setpoint` once, then keep resending it in the background.
   * When already streaming, only the target changes.
   */
  async start(setpoint: PositionSetpoint): Promise<void> {
    this.setpoint = setpoint;
    if (this.loop) return;
    // The loop is registered before the first send so a stop() arriving
    // mid-send still ends it.
    const controller = new AbortController();
    const first = this.emit(setpoint);
    this.controller = controller;
    this.loop = first.then(() => this.run(controller.signal));
    this.logger.debug('setpoint_stream_started', { rate_hz: this.rateHz });
    await first;
  }

  update(setpoint: PositionSetpoint): void {
    this.setpoint = setpoint;
  }

  /** Stop streaming and wait for the background loop to exit. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    this.controller = null;
    this.loop = null;
    this.setpoint = null;
    await loop;
    this.logger.debug('setpoint_stream_stopped', { sent: this._sent });
  }

  private async run(signal: AbortSignal): Promise<void> {
    const periodMs = 1000 / Math.max(this.rateHz, 0.1);
    while (!signal.aborted) {
      try {
        await delay(periodMs, signal);
      } catch (err) {
        if (err instanceof CancellationError) return;
        throw err;
      }
      const setpoint = this.setpoint;
      if (setpoint) await this.emit(setpoint);
    }
  }

  private async emit(setpoint: PositionSetpoint): Promise<void> {
    try {
      await this.send(setpoint);
      this._sent++;
    } catch (err) {
      this.logger.warn('setpoint_send_failed', { error: toErrorMessage(err) });
    }
  }
}
