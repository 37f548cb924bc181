/**
 * Skyhand Agent — Takeoff
 *
 * Arms if needed (hold first so the autopilot accepts the arm), commands
 * the climb and waits for the altitude. Convergence is lenient:
 *  - reaching `altitude_tolerance` × target counts as done
 *  - after the grace period, a flying vehicle above the soft minimum
 *    counts as a partial success
 */

import { failed, relativeAltitudeOf, succeeded, type CommandResult } from '../types/models.js';
import { BaseCommand, numberParam, type CommandContext } from './command.js';

export class TakeoffCommand extends BaseCommand {
  readonly name = 'takeoff';

  protected async execute(ctx: CommandContext): Promise<CommandResult> {
    const altitude = numberParam(this.params, 'altitude', 10);
    const tolerance = numberParam(this.params, 'altitude_tolerance', 0.9);
    const timeoutMs = numberParam(this.params, 'timeout', 20) * 1000;
    const { backend, logger, timing } = ctx;

    const initial = await ctx.telemetry.read(0);
    if (initial.state === 'disconnected') {
      return failed('connection', 'Cannot take off: vehicle disconnected');
    }
    if (initial.state === 'emergency') {
      return failed('bad_state', 'Cannot take off: emergency latched');
    }
    if (initial.state === 'flying' || initial.state === 'taking_off') {
      return succeeded('Vehicle already airborne', {
        alreadyAirborne: true,
        altitude: relativeAltitudeOf(initial),
      });
    }

    if (!initial.armed) {
      logger.info('arming_for_takeoff');
      await backend.holdPosition();
      await backend.arm();
      this.checkCancelled(ctx);
    }

    logger.info('takeoff_issued', { altitude, tolerance });
    await backend.takeoff(altitude);
    const issuedAt = Date.now();
    const goal = altitude * tolerance;
    let best = relativeAltitudeOf(initial);

    for (;;) {
      await this.pause(ctx);
      const telemetry = await this.telemetry(ctx);
      const current = relativeAltitudeOf(telemetry);
      best = Math.max(best, current);

      if (telemetry.state === 'disconnected' || telemetry.state === 'emergency') {
        return failed('bad_state', `Takeoff aborted: vehicle ${telemetry.state} at ${current.toFixed(1)}m`, {
          data: { targetAltitude: altitude, bestAltitude: best },
        });
      }
      if (current >= goal) {
        return succeeded(`Takeoff complete (reached ${current.toFixed(1)}m of ${altitude}m)`, {
          targetAltitude: altitude,
          altitude: current,
          toleranceMet: true,
        });
      }
      const elapsed = Date.now() - issuedAt;
      if (
        elapsed >= timing.takeoffGraceMs &&
        telemetry.state === 'flying' &&
        current >= timing.takeoffSoftMinAltitude
      ) {
        logger.warn('takeoff_partial', { altitude: current, target: altitude });
        return succeeded(`Takeoff partially complete (reached ${current.toFixed(1)}m of ${altitude}m)`, {
          targetAltitude: altitude,
          altitude: current,
          partial: true,
        });
      }
      if (elapsed >= timeoutMs) {
        return failed('timeout', `Takeoff timed out: reached ${best.toFixed(1)}m of ${altitude}m`, {
          data: { targetAltitude: altitude, bestAltitude: best },
        });
      }
    }
  }
}
