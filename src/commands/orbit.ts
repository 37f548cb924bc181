/**
 * Skyhand Agent — Orbit
 *
 * Circle a centre point. The centre comes from `center_north/center_east`
 * (local), `center_lat/center_lon` (global) or, with neither, the current
 * position; it is converted to whichever frame the backend takes, using
 * the current fix as reference. Length is set by exactly one of
 * `duration`, `loops` or `continuous`, or the default duration.
 *
 * Completed loops are estimated from elapsed time:
 *   loops = elapsed / (2πr / |v|)
 */

import { ORBIT_YAW_BEHAVIORS, type OrbitCenter, type OrbitYawBehavior } from '../backends/backend.js';
import { geodeticToNed, nedToGeodetic, type GeoPoint, type NedPoint } from '../types/geo.js';
import {
  failed,
  localPositionOf,
  relativeAltitudeOf,
  succeeded,
  type CommandResult,
  type Telemetry,
} from '../types/models.js';
import {
  BaseCommand,
  boolParam,
  numberParam,
  optionalNumber,
  stringParam,
  type CommandContext,
} from './command.js';

const MIN_ORBIT_SPEED = 0.1;

type CentreSource =
  | { kind: 'local'; north: number; east: number }
  | { kind: 'global'; latitude: number; longitude: number }
  | { kind: 'current' };

/** Duration control: seconds, loops, or until the timeout. */
type Length = { kind: 'duration'; seconds: number } | { kind: 'loops'; loops: number } | { kind: 'continuous' };

interface Fix {
  /** Current global position */
  here: GeoPoint;
  /** Geodetic position of the arm point, when the local position is known */
  origin: GeoPoint | null;
  /** Arm point altitude above mean sea level */
  homeAltitudeMsl: number;
}

function fixOf(telemetry: Telemetry): Fix | null {
  const { latitude, longitude, altitudeMsl, altitudeRelative } = telemetry.position;
  if (latitude === undefined || longitude === undefined || altitudeMsl === undefined) return null;
  const here: GeoPoint = { latitude, longitude, altitude: altitudeMsl };
  const local = localPositionOf(telemetry);
  const origin = local ? nedToGeodetic({ north: -local.north, east: -local.east, down: -local.down }, here) : null;
  const homeAltitudeMsl = altitudeRelative !== undefined ? altitudeMsl - altitudeRelative : (origin?.altitude ?? altitudeMsl);
  return { here, origin, homeAltitudeMsl };
}

export function orbitPeriodS(radius: number, velocity: number): number {
  return (2 * Math.PI * radius) / Math.abs(velocity);
}

export class OrbitCommand extends BaseCommand {
  readonly name = 'orbit';

  protected async execute(ctx: CommandContext): Promise<CommandResult> {
    const radius = numberParam(this.params, 'radius', 10);
    const velocity = numberParam(this.params, 'velocity', 2);
    const timeoutS = numberParam(this.params, 'timeout', 120);
    const yawName = stringParam(this.params, 'yaw_behavior', 'face_center');
    const yawBehavior: OrbitYawBehavior | undefined = ORBIT_YAW_BEHAVIORS.find((b) => b === yawName);

    // Everything below is checked before the vehicle is touched.
    if (!yawBehavior) return failed('validation', `Invalid yaw behaviour: ${yawName}`);
    if (radius <= 0) return failed('validation', `Orbit radius must be positive, got ${radius}m`);
    if (Math.abs(velocity) < MIN_ORBIT_SPEED) {
      return failed('validation', `Orbit velocity too slow: ${velocity}m/s (min ${MIN_ORBIT_SPEED})`);
    }
    const length = this.lengthOf(ctx);
    if ('issue' in length) return failed('validation', length.issue);
    const source = this.centreSource();
    if ('issue' in source) return failed('validation', source.issue);

    const period = orbitPeriodS(radius, velocity);
    const expectedS = this.expectedSeconds(length.value, period);
    if (expectedS !== null && expectedS > timeoutS) {
      return failed('validation', `Orbit needs ${expectedS.toFixed(0)}s but the timeout is ${timeoutS}s`);
    }

    const initial = await ctx.telemetry.read(0);
    if (initial.state === 'disconnected') {
      return failed('connection', 'Cannot orbit: vehicle disconnected');
    }
    if (initial.state !== 'flying') {
      return failed('bad_state', `Cannot orbit: vehicle is ${initial.state}, not flying`);
    }

    const altitude = optionalNumber(this.params, 'altitude') ?? relativeAltitudeOf(initial);
    const center = this.resolveCentre(source.value, initial, altitude, ctx.backend.requiresGlobalOrbitCenter);
    if ('issue' in center) return failed('bad_state', center.issue);

    ctx.logger.info('orbit_issued', {
      frame: center.value.frame,
      radius,
      velocity,
      yaw: yawBehavior,
      length: length.value.kind,
      expectedS,
    });
    await ctx.backend.orbit({ center: center.value, radius, velocity, yawBehavior });

    const startedAt = Date.now();
    const deadline = startedAt + timeoutS * 1000;
    const progress = () => {
      const elapsedS = (Date.now() - startedAt) / 1000;
      return { elapsedS, loopsCompleted: Math.round((elapsedS / period) * 100) / 100, expectedS, center: center.value };
    };

    for (;;) {
      await this.pause(ctx);
      const telemetry = await this.telemetry(ctx);
      if (telemetry.state === 'disconnected' || telemetry.state === 'emergency') {
        return failed('bad_state', `Orbit aborted: vehicle ${telemetry.state}`, { data: progress() });
      }
      const data = progress();
      if (expectedS !== null && data.elapsedS >= expectedS) {
        await ctx.backend.holdPosition();
        return succeeded(`Orbit complete (${this.describe(length.value)})`, data);
      }
      if (Date.now() >= deadline) {
        if (length.value.kind === 'continuous') {
          await ctx.backend.holdPosition();
          return succeeded(`Continuous orbit ended after ${timeoutS}s`, data);
        }
        return failed('timeout', `Orbit timed out after ${timeoutS}s`, { data });
      }
    }
  }

  // -----------------------------------------------------------------------
  // Parameters
  // -----------------------------------------------------------------------

  private lengthOf(ctx: CommandContext): { value: Length } | { issue: string } {
    const duration = optionalNumber(this.params, 'duration');
    const loops = optionalNumber(this.params, 'loops');
    const continuous = boolParam(this.params, 'continuous', false);
    const given = [duration !== undefined, loops !== undefined, continuous].filter(Boolean).length;
    if (given > 1) return { issue: 'Only one of duration, loops or continuous may be given' };
    if (duration !== undefined) return { value: { kind: 'duration', seconds: duration } };
    if (loops !== undefined) return { value: { kind: 'loops', loops } };
    if (continuous) return { value: { kind: 'continuous' } };
    return { value: { kind: 'duration', seconds: ctx.timing.defaultOrbitDurationS } };
  }

  private centreSource(): { value: CentreSource } | { issue: string } {
    const north = optionalNumber(this.params, 'center_north');
    const east = optionalNumber(this.params, 'center_east');
    const latitude = optionalNumber(this.params, 'center_lat');
    const longitude = optionalNumber(this.params, 'center_lon');
    const hasLocal = north !== undefined || east !== undefined;
    const hasGlobal = latitude !== undefined || longitude !== undefined;

    if (hasLocal && hasGlobal) return { issue: 'Give the orbit centre in one frame only' };
    if (hasLocal) {
      if (north === undefined || east === undefined) {
        return { issue: 'center_north and center_east must be given together' };
      }
      return { value: { kind: 'local', north, east } };
    }
    if (hasGlobal) {
      if (latitude === undefined || longitude === undefined) {
        return { issue: 'center_lat and center_lon must be given together' };
      }
      return { value: { kind: 'global', latitude, longitude } };
    }
    return { value: { kind: 'current' } };
  }

  private expectedSeconds(length: Length, period: number): number | null {
    switch (length.kind) {
      case 'duration':
        return length.seconds;
      case 'loops':
        return length.loops * period;
      case 'continuous':
        return null;
    }
  }

  private describe(length: Length): string {
    switch (length.kind) {
      case 'duration':
        return `${length.seconds}s elapsed`;
      case 'loops':
        return `${length.loops} loops`;
      case 'continuous':
        return 'continuous';
    }
  }

  // -----------------------------------------------------------------------
  // Centre
  // -----------------------------------------------------------------------

  /** Put the centre in the frame the backend takes, `altitude` metres above the arm point. */
  private resolveCentre(
    source: CentreSource,
    telemetry: Telemetry,
    altitude: number,
    requiresGlobal: boolean,
  ): { value: OrbitCenter } | { issue: string } {
    const fix = fixOf(telemetry);
    const local = localPositionOf(telemetry);
    const noFix = { issue: 'Cannot place the orbit centre: no global position fix' };
    const noLocal = { issue: 'Cannot place the orbit centre: local position not available' };

    if (requiresGlobal) {
      if (!fix) return noFix;
      const altitudeMsl = fix.homeAltitudeMsl + altitude;
      switch (source.kind) {
        case 'global': {
          const point: GeoPoint = { latitude: source.latitude, longitude: source.longitude, altitude: altitudeMsl };
          return { value: { frame: 'global', point } };
        }
        case 'current':
          return { value: { frame: 'global', point: { ...fix.here, altitude: altitudeMsl } } };
        case 'local': {
          if (!fix.origin) return noLocal;
          const point = nedToGeodetic({ north: source.north, east: source.east, down: -altitude }, fix.origin);
          return { value: { frame: 'global', point } };
        }
      }
    }

    switch (source.kind) {
      case 'local':
        return { value: { frame: 'local', point: { north: source.north, east: source.east, down: -altitude } } };
      case 'current': {
        if (!local) return noLocal;
        return { value: { frame: 'local', point: { north: local.north, east: local.east, down: -altitude } } };
      }
      case 'global': {
        if (!fix) return noFix;
        const origin = fix.origin;
        if (!origin) return noLocal;
        const point: NedPoint = geodeticToNed(
          { latitude: source.latitude, longitude: source.longitude, altitude: origin.altitude + altitude },
          origin,
        );
        return { value: { frame: 'local', point } };
      }
    }
  }
}
