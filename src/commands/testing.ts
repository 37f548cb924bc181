/**
 * Skyhand Agent — Command Test Harness
 *
 * A connected SessionBackend over an in-process SimFlightSession, plus a
 * CommandContext with short timings. Shared by the command tests.
 */

import { SessionBackend } from '../backends/session.js';
import { SimFlightSession, type SimSessionConfig } from '../backends/sim-session.js';
import { DEFAULT_COMMAND_TIMING, type CommandTiming } from '../core/config.js';
import { silentLogger } from '../core/logger.js';
import type { CommandContext } from './command.js';

export const FAST_COMMAND_TIMING: CommandTiming = {
  ...DEFAULT_COMMAND_TIMING,
  pollIntervalMs: 10,
  takeoffGraceMs: 5_000,
  movementWindowMs: 100,
};

export interface CommandHarness {
  sim: SimFlightSession;
  backend: SessionBackend;
  controller: AbortController;
  ctx: CommandContext;
}

/** Vertical moves finish within one poll, so altitudes are exact. */
export async function makeCommandHarness(
  sim: Partial<SimSessionConfig> = {},
  timing: Partial<CommandTiming> = {},
): Promise<CommandHarness> {
  const session = new SimFlightSession({ climbRate: 1_000, descentRate: 1_000, cruiseSpeed: 50, ...sim });
  const backend = new SessionBackend(session, { droneId: 'test-drone' });
  await backend.connect('sim://');
  const controller = new AbortController();
  const ctx: CommandContext = {
    backend,
    telemetry: { read: () => backend.getTelemetry() },
    signal: controller.signal,
    logger: silentLogger,
    timing: { ...FAST_COMMAND_TIMING, ...timing },
  };
  return { sim: session, backend, controller, ctx };
}

/** Armed and hovering at `altitude` metres above the arm point. */
export function airborneAt(altitude: number, north = 0, east = 0): Partial<SimSessionConfig> {
  return {
    initial: { armed: true, inAir: true, mode: 'hold', position: { north, east, down: -altitude } },
  };
}
