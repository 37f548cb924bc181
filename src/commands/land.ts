/**
 * Skyhand Agent — Land
 *
 * No-op on the ground. Otherwise issue land and poll until the vehicle
 * reports a grounded state.
 */

import { isGrounded } from '../types/state-machine.js';
import { failed, relativeAltitudeOf, succeeded, type CommandResult, type Telemetry } from '../types/models.js';
import { BaseCommand, numberParam, type CommandContext } from './command.js';

/** Grounded, or latched in emergency while no longer airborne. */
export function isOnGround(telemetry: Telemetry): boolean {
  if (isGrounded(telemetry.state)) return true;
  return telemetry.state === 'emergency' && !telemetry.inAir;
}

export class LandCommand extends BaseCommand {
  readonly name = 'land';

  protected async execute(ctx: CommandContext): Promise<CommandResult> {
    const timeoutMs = numberParam(this.params, 'timeout', 60) * 1000;

    const initial = await ctx.telemetry.read(0);
    if (initial.state === 'disconnected') {
      return failed('connection', 'Cannot land: vehicle disconnected');
    }
    if (isOnGround(initial)) {
      return succeeded('Already landed', { alreadyLanded: true });
    }

    await ctx.backend.land();
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      await this.pause(ctx);
      const telemetry = await this.telemetry(ctx);
      if (telemetry.state === 'disconnected') {
        return failed('connection', 'Lost the vehicle while landing');
      }
      if (isOnGround(telemetry)) {
        return succeeded('Landed', { state: telemetry.state });
      }
      if (Date.now() >= deadline) {
        return failed('timeout', `Landing timed out at ${relativeAltitudeOf(telemetry).toFixed(1)}m`, {
          data: { altitude: relativeAltitudeOf(telemetry) },
        });
      }
    }
  }
}
