/**
 * Skyhand Agent — Return to Launch
 *
 * One polling loop, two exit conditions: with `wait_for_landing` off it
 * finishes as soon as the autopilot reports the return mode, otherwise
 * it waits for touchdown.
 */

import { failed, relativeAltitudeOf, succeeded, type CommandResult } from '../types/models.js';
import { BaseCommand, boolParam, numberParam, type CommandContext } from './command.js';
import { isOnGround } from './land.js';

export class ReturnToLaunchCommand extends BaseCommand {
  readonly name = 'rtl';

  protected async execute(ctx: CommandContext): Promise<CommandResult> {
    const timeoutS = numberParam(this.params, 'timeout', 120);
    const waitForLanding = boolParam(this.params, 'wait_for_landing', true);

    const initial = await ctx.telemetry.read(0);
    if (initial.state === 'disconnected') {
      return failed('connection', 'Cannot return to launch: vehicle disconnected');
    }
    if (isOnGround(initial)) {
      return succeeded('Already on the ground; return to launch not needed', { alreadyLanded: true });
    }

    await ctx.backend.returnToLaunch();
    const deadline = Date.now() + timeoutS * 1000;
    let modeSeen = false;

    for (;;) {
      await this.pause(ctx);
      const telemetry = await this.telemetry(ctx);
      if (telemetry.state === 'disconnected') {
        return failed('connection', 'Lost the vehicle during return to launch');
      }
      if (telemetry.flightMode === 'rtl') modeSeen = true;
      if (isOnGround(telemetry)) {
        return succeeded('Returned to launch and landed', { modeActive: modeSeen, landed: true });
      }
      if (!waitForLanding && modeSeen) {
        return succeeded('Return to launch active', { modeActive: true, landed: false });
      }
      if (Date.now() >= deadline) {
        const what = waitForLanding ? 'did not land' : 'mode was not reported';
        return failed('timeout', `Return to launch ${what} within ${timeoutS}s`, {
          data: { modeActive: modeSeen, altitude: relativeAltitudeOf(telemetry) },
        });
      }
    }
  }
}
