/**
 * Skyhand Agent — Goto (local frame)
 *
 * Absolute targets are NED metres from the arm point; relative targets
 * are added to the position read once at the start. The backend call is
 * issued once, then the loop watches two things:
 *
 *   distance to target     success once ≤ tolerance
 *   displacement from start  if it never reaches the movement threshold
 *                            within the movement window, fail with
 *                            `no_movement` instead of waiting for the timeout
 *
 * Once the goto is issued, every exit (arrival, failure, timeout or
 * cancellation) ends with a hold, which also stops any offboard setpoint
 * stream the backend started for it.
 */

import { toErrorMessage } from '../types/errors.js';
import { addNed, nedDistance, type NedPoint } from '../types/geo.js';
import { failed, localPositionOf, succeeded, type CommandResult } from '../types/models.js';
import {
  BaseCommand,
  boolParam,
  numberParam,
  optionalNumber,
  type CommandContext,
} from './command.js';

const round = (value: number): number => Math.round(value * 100) / 100;

interface GotoGoal {
  mode: 'absolute' | 'relative';
  start: NedPoint;
  target: NedPoint;
  initialDistance: number;
  tolerance: number;
  timeoutS: number;
}

export class GotoCommand extends BaseCommand {
  readonly name = 'goto';

  protected async execute(ctx: CommandContext): Promise<CommandResult> {
    const offset: NedPoint = {
      north: numberParam(this.params, 'north'),
      east: numberParam(this.params, 'east'),
      down: numberParam(this.params, 'down', -5),
    };
    const yaw = optionalNumber(this.params, 'yaw');
    const relative = boolParam(this.params, 'relative', false);
    const tolerance = numberParam(this.params, 'tolerance', 2);
    const maxSpeed = numberParam(this.params, 'max_speed', 2);
    const timeoutS = numberParam(this.params, 'timeout', 60);
    const { timing, logger } = ctx;
    const mode = relative ? 'relative' : 'absolute';

    const initial = await ctx.telemetry.read(0);
    if (initial.state === 'disconnected') {
      return failed('connection', 'Cannot goto: vehicle disconnected');
    }
    // A goto queued straight after a lenient takeoff may still see taking_off.
    if (initial.state !== 'flying' && initial.state !== 'taking_off') {
      return failed('bad_state', `Cannot goto: vehicle is ${initial.state}, not flying`);
    }
    const start = localPositionOf(initial);
    if (!start) {
      return failed('bad_state', 'Cannot goto: local position not available');
    }

    const target = relative ? addNed(start, offset) : offset;
    if (Math.hypot(target.north, target.east) > timing.maxHorizontalDistanceM) {
      return failed(
        'validation',
        `Target too far: N=${target.north.toFixed(1)} E=${target.east.toFixed(1)} is beyond ${timing.maxHorizontalDistanceM}m`,
      );
    }
    if (target.down > 0) {
      return failed('validation', `Target below the arm point: down=${target.down.toFixed(1)}m`);
    }

    const initialDistance = nedDistance(start, target);
    logger.info('goto_issued', { mode, north: target.north, east: target.east, down: target.down, initialDistance });
    try {
      await ctx.backend.gotoPosition(target, yaw, maxSpeed);
      return await this.track(ctx, { mode, start, target, initialDistance, tolerance, timeoutS });
    } finally {
      await this.settle(ctx);
    }
  }

  private async settle(ctx: CommandContext): Promise<void> {
    try {
      await ctx.backend.holdPosition();
    } catch (err) {
      ctx.logger.warn('goto_hold_failed', { error: toErrorMessage(err) });
    }
  }

  private async track(ctx: CommandContext, goal: GotoGoal): Promise<CommandResult> {
    const { mode, start, target, initialDistance, tolerance, timeoutS } = goal;
    const { timing, logger } = ctx;
    const issuedAt = Date.now();
    let distance = initialDistance;
    let maxDisplacement = 0;
    let moving = false;

    const report = () => ({
      mode,
      target,
      initialDistance: round(initialDistance),
      finalDistance: round(distance),
      maxDisplacement: round(maxDisplacement),
      movementDetected: moving,
      tolerance,
    });

    for (;;) {
      await this.pause(ctx);
      const telemetry = await this.telemetry(ctx);
      if (telemetry.state === 'disconnected' || telemetry.state === 'emergency') {
        return failed('bad_state', `Goto aborted: vehicle ${telemetry.state}`, { data: report() });
      }

      const position = localPositionOf(telemetry);
      if (position) {
        distance = nedDistance(position, target);
        maxDisplacement = Math.max(maxDisplacement, nedDistance(position, start));
        if (maxDisplacement >= timing.movementThresholdM) moving = true;
        if (distance <= tolerance) {
          return succeeded(`Goto (${mode}) complete: within ${distance.toFixed(1)}m of target`, report());
        }
      }

      const elapsed = Date.now() - issuedAt;
      if (!moving && elapsed >= timing.movementWindowMs) {
        logger.warn('goto_no_movement', { maxDisplacement, windowMs: timing.movementWindowMs });
        return failed(
          'no_movement',
          `Goto (${mode}) failed: no movement detected (moved ${maxDisplacement.toFixed(2)}m in ${timing.movementWindowMs / 1000}s, ${distance.toFixed(1)}m from target)`,
          { error: 'no movement detected', data: report() },
        );
      }
      if (elapsed >= timeoutS * 1000) {
        return failed(
          'timeout',
          `Goto (${mode}) timed out ${distance.toFixed(1)}m from target (tolerance ${tolerance}m)`,
          { data: report() },
        );
      }
    }
  }
}
