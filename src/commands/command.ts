/**
 * Skyhand Agent — Command Base
 *
 * A command is one bounded async operation against the vehicle backend.
 * It always settles with a CommandResult: soft failures are returned,
 * and agent errors thrown inside execute() are mapped to results here.
 * Anything else (a programming fault) escapes to the runner, which
 * records it as a failed attempt.
 *
 * Cancellation is cooperative. Every loop sleeps through pause(), which
 * rejects as soon as the context signal aborts.
 */

import { delay } from '../core/async.js';
import type { CommandTiming } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import type { VehicleBackend } from '../backends/backend.js';
import { CancellationError, ExecutionError, SkyhandError, TimeoutError } from '../types/errors.js';
import {
  failed,
  type CommandParams,
  type CommandResult,
  type FailureCode,
  type Telemetry,
} from '../types/models.js';

// ---------------------------------------------------------------------------
// Names
// ---------------------------------------------------------------------------

export const COMMAND_NAMES = ['takeoff', 'land', 'rtl', 'wait', 'goto', 'orbit'] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export interface TelemetryReader {
  /** Snapshot no older than `maxAgeMs`; refreshed from the backend otherwise. */
  read(maxAgeMs?: number): Promise<Telemetry>;
}

export interface CommandContext {
  backend: VehicleBackend;
  telemetry: TelemetryReader;
  /** Aborted on cancel and on the runner's per-attempt deadline */
  signal: AbortSignal;
  logger: Logger;
  timing: CommandTiming;
}

export interface DroneCommand {
  readonly name: CommandName;
  readonly params: CommandParams;
  run(ctx: CommandContext): Promise<CommandResult>;
}

export type CommandFactory = (params: CommandParams) => DroneCommand;

// ---------------------------------------------------------------------------
// Parameter access
// ---------------------------------------------------------------------------

// Parameters arrive validated against the catalog; these only narrow the union.

export function numberParam(params: CommandParams, key: string, fallback?: number): number {
  const value = params[key];
  if (typeof value === 'number') return value;
  if (fallback !== undefined) return fallback;
  throw new ExecutionError(`parameter ${key} is missing`);
}

export function optionalNumber(params: CommandParams, key: string): number | undefined {
  const value = params[key];
  return typeof value === 'number' ? value : undefined;
}

export function boolParam(params: CommandParams, key: string, fallback: boolean): boolean {
  const value = params[key];
  return typeof value === 'boolean' ? value : fallback;
}

export function stringParam(params: CommandParams, key: string, fallback: string): string {
  const value = params[key];
  return typeof value === 'string' ? value : fallback;
}

const CODE_FOR_ERROR: Record<SkyhandError['code'], FailureCode> = {
  connection: 'connection',
  validation: 'validation',
  backend: 'backend',
  execution: 'execution',
  cancelled: 'cancelled',
  timeout: 'timeout',
  configuration: 'execution',
};

// ---------------------------------------------------------------------------
// BaseCommand
// ---------------------------------------------------------------------------

export abstract class BaseCommand implements DroneCommand {
  abstract readonly name: CommandName;
  readonly params: CommandParams;

  constructor(params: CommandParams) {
    this.params = params;
  }

  async run(ctx: CommandContext): Promise<CommandResult> {
    const startedAt = Date.now();
    let result: CommandResult;
    try {
      result = await this.execute(ctx);
    } catch (err) {
      result = this.fromError(err, ctx);
    }
    return { ...result, durationMs: Date.now() - startedAt };
  }

  protected abstract execute(ctx: CommandContext): Promise<CommandResult>;

  /** Agent errors become results; anything else propagates. */
  protected fromError(err: unknown, ctx: CommandContext): CommandResult {
    if (err instanceof CancellationError) {
      if (ctx.signal.reason instanceof TimeoutError) {
        return failed('timeout', `${this.name} exceeded its time limit`, { error: ctx.signal.reason.message });
      }
      ctx.logger.info('command_cancelled', { command: this.name });
      return failed('cancelled', `${this.name} was cancelled`, { error: err.message });
    }
    if (err instanceof SkyhandError) {
      ctx.logger.warn('command_error', { command: this.name, error: err.message });
      return failed(CODE_FOR_ERROR[err.code], `${this.name} failed: ${err.message}`, { error: err.message });
    }
    throw err;
  }

  // -----------------------------------------------------------------------
  // Loop helpers
  // -----------------------------------------------------------------------

  /** Sleep one poll interval (or `ms`); rejects with CancellationError on abort. */
  protected pause(ctx: CommandContext, ms: number = ctx.timing.pollIntervalMs): Promise<void> {
    return delay(ms, ctx.signal);
  }

  protected checkCancelled(ctx: CommandContext): void {
    if (ctx.signal.aborted) throw new CancellationError();
  }

  /** Telemetry no older than one poll interval. */
  protected telemetry(ctx: CommandContext): Promise<Telemetry> {
    return ctx.telemetry.read(ctx.timing.pollIntervalMs);
  }
}
