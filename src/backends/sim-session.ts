/**
 * Skyhand Agent — Simulated Flight Session
 *
 * In-process FlightSession: a point-mass vehicle that climbs, descends and
 * translates at fixed rates. No external simulator needed. Kinematics are
 * integrated lazily from wall-clock time whenever the session is called,
 * so there is no background timer to manage.
 *
 * Test hooks: altitude ceiling, frozen position, per-action failure
 * injection and call counters.
 */

import { geodeticToNed, nedToGeodetic, type GeoPoint, type NedPoint } from '../types/geo.js';
import type { FlightMode } from '../types/models.js';
import type { OrbitRequest } from './backend.js';
import type { FlightSession, SessionStatus } from './session.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type SimAction =
  | 'arm'
  | 'disarm'
  | 'takeoff'
  | 'land'
  | 'returnToLaunch'
  | 'hold'
  | 'gotoLocal'
  | 'orbit'
  | 'setMode';

export interface SimVehicle {
  armed: boolean;
  mode: FlightMode;
  inAir: boolean;
  position: NedPoint;
  /** Translation target in offboard mode */
  target: NedPoint | null;
  /** Altitude the current takeoff stops at */
  takeoffAltitude: number;
  speedLimit: number;
  orbit: { center: NedPoint; radius: number; velocity: number; angle: number } | null;
  /** 0–100 */
  battery: number;
  velocity: NedPoint;
}

export interface SimSessionConfig {
  /** Geodetic position of the arm point */
  home: GeoPoint;
  /** m/s */
  climbRate: number;
  /** m/s */
  descentRate: number;
  /** m/s, horizontal */
  cruiseSpeed: number;
  /** Highest altitude the vehicle can reach (m), null for none */
  altitudeCeiling: number | null;
  /** Position never changes */
  frozen: boolean;
  /** Disarm on touchdown */
  autoDisarm: boolean;
  /** Actions that throw with the given message */
  failures: Partial<Record<SimAction, string>>;
  requiresGlobalOrbitCenter: boolean;
  /** Starting vehicle state */
  initial: Partial<SimVehicle>;
  /** Percent per second while armed */
  batteryDrainRate: number;
}

export const DEFAULT_SIM_CONFIG: SimSessionConfig = {
  home: { latitude: 47.397742, longitude: 8.545594, altitude: 488.0 },
  climbRate: 2.5,
  descentRate: 1.5,
  cruiseSpeed: 5,
  altitudeCeiling: null,
  frozen: false,
  autoDisarm: true,
  failures: {},
  requiresGlobalOrbitCenter: true,
  initial: {},
  batteryDrainRate: 0.05,
};

const ARRIVAL_EPSILON = 0.05;

function moveToward(from: NedPoint, to: NedPoint, maxStep: number): NedPoint {
  const dn = to.north - from.north;
  const de = to.east - from.east;
  const dd = to.down - from.down;
  const dist = Math.hypot(dn, de, dd);
  if (dist <= maxStep || dist === 0) return { ...to };
  const k = maxStep / dist;
  return { north: from.north + dn * k, east: from.east + de * k, down: from.down + dd * k };
}

// ---------------------------------------------------------------------------
// SimFlightSession
// ---------------------------------------------------------------------------

export class SimFlightSession implements FlightSession {
  readonly config: SimSessionConfig;
  private _open = false;
  private _vehicle: SimVehicle;
  private _lastStep = Date.now();
  private _calls: Record<SimAction, number> = {
    arm: 0,
    disarm: 0,
    takeoff: 0,
    land: 0,
    returnToLaunch: 0,
    hold: 0,
    gotoLocal: 0,
    orbit: 0,
    setMode: 0,
  };

  constructor(config: Partial<SimSessionConfig> = {}) {
    this.config = { ...DEFAULT_SIM_CONFIG, ...config, failures: { ...config.failures } };
    this._vehicle = {
      armed: false,
      mode: 'hold',
      inAir: false,
      position: { north: 0, east: 0, down: 0 },
      target: null,
      takeoffAltitude: 0,
      speedLimit: this.config.cruiseSpeed,
      orbit: null,
      battery: 100,
      velocity: { north: 0, east: 0, down: 0 },
      ...this.config.initial,
    };
  }

  get isOpen(): boolean {
    return this._open;
  }

  get requiresGlobalOrbitCenter(): boolean {
    return this.config.requiresGlobalOrbitCenter;
  }

  /** Live vehicle state, for test inspection and manipulation. */
  get vehicle(): SimVehicle {
    this.step();
    return this._vehicle;
  }

  /** How many times each action was invoked. */
  get calls(): Readonly<Record<SimAction, number>> {
    return this._calls;
  }

  setFrozen(frozen: boolean): void {
    this.step();
    this.config.frozen = frozen;
  }

  setFailure(action: SimAction, message: string | null): void {
    if (message === null) {
      delete this.config.failures[action];
    } else {
      this.config.failures[action] = message;
    }
  }

  // -----------------------------------------------------------------------
  // FlightSession
  // -----------------------------------------------------------------------

  async open(_address: string): Promise<void> {
    this._open = true;
    this._lastStep = Date.now();
  }

  async close(): Promise<void> {
    this.step();
    this._open = false;
  }

  async arm(): Promise<void> {
    this.begin('arm');
    this._vehicle.armed = true;
  }

  async disarm(): Promise<void> {
    this.begin('disarm');
    if (this._vehicle.inAir) throw new Error('refusing to disarm in the air');
    this._vehicle.armed = false;
  }

  async takeoff(altitude: number): Promise<void> {
    this.begin('takeoff');
    if (!this._vehicle.armed) throw new Error('vehicle not armed');
    const ceiling = this.config.altitudeCeiling ?? Number.POSITIVE_INFINITY;
    this._vehicle.takeoffAltitude = Math.min(altitude, ceiling);
    this.enterMode('takeoff');
  }

  async land(): Promise<void> {
    this.begin('land');
    this.enterMode('land');
  }

  async returnToLaunch(): Promise<void> {
    this.begin('returnToLaunch');
    this.enterMode('rtl');
  }

  async hold(): Promise<void> {
    this.begin('hold');
    this.enterMode('hold');
  }

  async gotoLocal(target: NedPoint, _yaw?: number, maxSpeed?: number): Promise<void> {
    this.begin('gotoLocal');
    if (!this._vehicle.armed) throw new Error('vehicle not armed');
    this.enterMode('offboard');
    this._vehicle.target = { ...target };
    this._vehicle.speedLimit = Math.min(maxSpeed ?? this.config.cruiseSpeed, this.config.cruiseSpeed);
  }

  async orbit(request: OrbitRequest): Promise<void> {
    this.begin('orbit');
    if (!this._vehicle.inAir) throw new Error('orbit requires the vehicle to be airborne');
    const center =
      request.center.frame === 'local'
        ? request.center.point
        : geodeticToNed(request.center.point, this.config.home);
    const here = this._vehicle.position;
    this.enterMode('orbit');
    this._vehicle.orbit = {
      center,
      radius: request.radius,
      velocity: request.velocity,
      angle: Math.atan2(here.east - center.east, here.north - center.north),
    };
  }

  async setMode(mode: FlightMode): Promise<void> {
    this.begin('setMode');
    this.enterMode(mode);
  }

  async status(): Promise<SessionStatus> {
    if (!this._open) throw new Error('session not open');
    this.step();
    const v = this._vehicle;
    const geo = nedToGeodetic(v.position, this.config.home);
    return {
      armed: v.armed,
      flightMode: v.mode,
      inAir: v.inAir,
      position: {
        latitude: geo.latitude,
        longitude: geo.longitude,
        altitudeMsl: this.config.home.altitude - v.position.down,
        altitudeRelative: -v.position.down,
        north: v.position.north,
        east: v.position.east,
        down: v.position.down,
      },
      attitude: { roll: 0, pitch: 0, yaw: 0 },
      velocity: {
        ...v.velocity,
        groundSpeed: Math.hypot(v.velocity.north, v.velocity.east),
      },
      battery: { voltage: 12.6 + (v.battery / 100) * 4.2, remainingPercent: v.battery },
      gps: { fixType: 3, satellitesVisible: 12, hdop: 0.8, vdop: 1.1 },
      healthy: true,
    };
  }

  // -----------------------------------------------------------------------
  // Kinematics
  // -----------------------------------------------------------------------

  private begin(action: SimAction): void {
    if (!this._open) throw new Error('session not open');
    this._calls[action]++;
    const failure = this.config.failures[action];
    if (failure !== undefined) throw new Error(failure);
    this.step();
  }

  private enterMode(mode: FlightMode): void {
    const v = this._vehicle;
    v.mode = mode;
    if (mode !== 'offboard') v.target = null;
    if (mode !== 'orbit') v.orbit = null;
  }

  /** Integrate from the last step to now. */
  private step(now: number = Date.now()): void {
    const dt = Math.max(0, (now - this._lastStep) / 1000);
    this._lastStep = now;
    const v = this._vehicle;
    const before = { ...v.position };

    if (v.armed) v.battery = Math.max(0, v.battery - this.config.batteryDrainRate * dt);
    if (!this.config.frozen && v.armed && dt > 0) this.integrate(v, dt);

    v.velocity =
      dt > 0
        ? {
            north: (v.position.north - before.north) / dt,
            east: (v.position.east - before.east) / dt,
            down: (v.position.down - before.down) / dt,
          }
        : v.velocity;
  }

  private integrate(v: SimVehicle, dt: number): void {
    switch (v.mode) {
      case 'takeoff': {
        const goal = { ...v.position, down: -v.takeoffAltitude };
        v.position = moveToward(v.position, goal, this.config.climbRate * dt);
        if (Math.abs(v.position.down - goal.down) < ARRIVAL_EPSILON) v.mode = 'hold';
        break;
      }
      case 'land':
        this.descend(v, dt);
        break;
      case 'rtl': {
        const overHome = { north: 0, east: 0, down: v.position.down };
        if (Math.hypot(v.position.north, v.position.east) > ARRIVAL_EPSILON) {
          v.position = moveToward(v.position, overHome, this.config.cruiseSpeed * dt);
        } else {
          this.descend(v, dt);
        }
        break;
      }
      case 'offboard':
        if (v.target) v.position = moveToward(v.position, v.target, v.speedLimit * dt);
        break;
      case 'orbit':
        if (v.orbit && v.orbit.radius > 0) {
          v.orbit.angle += (v.orbit.velocity / v.orbit.radius) * dt;
          v.position = {
            north: v.orbit.center.north + v.orbit.radius * Math.cos(v.orbit.angle),
            east: v.orbit.center.east + v.orbit.radius * Math.sin(v.orbit.angle),
            down: v.position.down,
          };
        }
        break;
      default:
        break;
    }
    v.inAir = v.position.down < -0.1;
  }

  private descend(v: SimVehicle, dt: number): void {
    v.position = { ...v.position, down: Math.min(0, v.position.down + this.config.descentRate * dt) };
    if (v.position.down >= 0 && this.config.autoDisarm) {
      v.armed = false;
    }
  }
}
