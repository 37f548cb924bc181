/**
 * Skyhand Agent — Vehicle Backend Interface
 *
 * One capability contract, three interchangeable protocol adapters:
 *   SessionBackend    — managed session object, calls return when done
 *   MavlinkBackend    — raw frames with a COMMAND_LONG / COMMAND_ACK handshake
 *   RestBridgeBackend — the same handshake over a JSON REST bridge
 *
 * The command runner and the commands don't care which is in use.
 * BaseBackend holds what they share: state derivation, the emergency
 * latch, and the time bound plus error mapping around every mutating call.
 */

import type { BackendKind, ProtocolTiming } from '../core/config.js';
import { DEFAULT_PROTOCOL_TIMING } from '../core/config.js';
import { withTimeout } from '../core/async.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { BackendError, ConnectionError, SkyhandError, TimeoutError, toErrorMessage } from '../types/errors.js';
import type { GeoPoint, NedPoint } from '../types/geo.js';
import type {
  Attitude,
  Battery,
  DroneState,
  FlightMode,
  GpsInfo,
  HealthFlags,
  Position,
  Telemetry,
  Velocity,
} from '../types/models.js';
import { deriveDroneState } from '../types/state-machine.js';

// ---------------------------------------------------------------------------
// Orbit request
// ---------------------------------------------------------------------------

export const ORBIT_YAW_BEHAVIORS = [
  'face_center',
  'hold_heading',
  'uncontrolled',
  'face_tangent',
  'rc_controlled',
] as const;

export type OrbitYawBehavior = (typeof ORBIT_YAW_BEHAVIORS)[number];

export type OrbitCenter =
  | { frame: 'global'; point: GeoPoint }
  | { frame: 'local'; point: NedPoint };

export interface OrbitRequest {
  center: OrbitCenter;
  /** Metres */
  radius: number;
  /** Tangential speed (m/s); positive is clockwise seen from above */
  velocity: number;
  yawBehavior: OrbitYawBehavior;
}

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export interface VehicleBackend {
  readonly kind: BackendKind;
  readonly droneId: string;
  /** Link up and not timed out */
  readonly connected: boolean;
  /** Orbit centres must be given as latitude/longitude */
  readonly requiresGlobalOrbitCenter: boolean;
  /** Reason the emergency latch was set, or null */
  readonly emergencyReason: string | null;

  connect(connectionString: string): Promise<void>;
  disconnect(): Promise<void>;

  arm(): Promise<void>;
  /** Safe to repeat */
  disarm(): Promise<void>;
  /** @param altitude metres above the takeoff point */
  takeoff(altitude: number): Promise<void>;
  land(): Promise<void>;
  /** Safe to repeat */
  returnToLaunch(): Promise<void>;
  /** Safe to repeat. Also stops any setpoint stream. */
  holdPosition(): Promise<void>;
  /** Fly to a local NED target. Yaw in degrees, speed in m/s. */
  gotoPosition(target: NedPoint, yaw?: number, maxSpeed?: number): Promise<void>;
  orbit(request: OrbitRequest): Promise<void>;
  setFlightMode(mode: FlightMode): Promise<void>;

  getState(): Promise<DroneState>;
  isArmed(): Promise<boolean>;
  getFlightMode(): Promise<FlightMode>;
  getTelemetry(): Promise<Telemetry>;

  /** Default: latch the emergency flag and hold position. */
  emergencyStop(): Promise<void>;
  latchEmergency(reason: string): void;
  clearEmergency(): void;
}

// ---------------------------------------------------------------------------
// Adapter-side telemetry
// ---------------------------------------------------------------------------

/** What an adapter reports; the base adds id, timestamp and derived state. */
export interface TelemetryFrame {
  connected: boolean;
  /** At least one vehicle status report received */
  statusReceived: boolean;
  armed: boolean;
  flightMode: FlightMode;
  inAir: boolean;
  position: Position;
  attitude?: Attitude;
  velocity?: Velocity;
  battery?: Battery;
  gps?: GpsInfo;
  health: HealthFlags;
}

export const DISCONNECTED_FRAME: TelemetryFrame = {
  connected: false,
  statusReceived: false,
  armed: false,
  flightMode: 'unknown',
  inAir: false,
  position: {},
  health: { telemetryOk: false, gpsOk: false },
};

export interface BackendOptions {
  droneId: string;
  timing?: Partial<ProtocolTiming>;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// BaseBackend
// ---------------------------------------------------------------------------

export abstract class BaseBackend implements VehicleBackend {
  abstract readonly kind: BackendKind;
  readonly droneId: string;
  protected readonly timing: ProtocolTiming;
  protected readonly logger: Logger;
  private _emergencyReason: string | null = null;

  constructor(options: BackendOptions) {
    this.droneId = options.droneId;
    this.timing = { ...DEFAULT_PROTOCOL_TIMING, ...options.timing };
    this.logger = options.logger ?? silentLogger;
  }

  abstract get connected(): boolean;
  abstract get requiresGlobalOrbitCenter(): boolean;

  // -----------------------------------------------------------------------
  // Adapter hooks
  // -----------------------------------------------------------------------

  /** Open the link and wait until the vehicle is heard from. */
  protected abstract openLink(connectionString: string): Promise<void>;
  /** Stop every adapter-owned task, then release the link. */
  protected abstract closeLink(): Promise<void>;
  protected abstract doArm(): Promise<void>;
  protected abstract doDisarm(): Promise<void>;
  protected abstract doTakeoff(altitude: number): Promise<void>;
  protected abstract doLand(): Promise<void>;
  protected abstract doReturnToLaunch(): Promise<void>;
  protected abstract doHold(): Promise<void>;
  protected abstract doGoto(target: NedPoint, yaw?: number, maxSpeed?: number): Promise<void>;
  protected abstract doOrbit(request: OrbitRequest): Promise<void>;
  protected abstract doSetFlightMode(mode: FlightMode): Promise<void>;
  protected abstract readFrame(): Promise<TelemetryFrame>;

  /** Pull fresh vehicle data before a query. Push-fed adapters have nothing to pull. */
  protected refresh(): Promise<void> {
    return Promise.resolve();
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  async connect(connectionString: string): Promise<void> {
    if (this.connected) return;
    this.logger.info('backend_connecting', { kind: this.kind, connection: connectionString });
    try {
      await this.openLink(connectionString);
    } catch (err) {
      this.logger.error('backend_connect_failed', { kind: this.kind, error: toErrorMessage(err) });
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(`cannot connect to ${connectionString}: ${toErrorMessage(err)}`, { cause: err });
    }
    this.logger.info('backend_connected', { kind: this.kind });
  }

  async disconnect(): Promise<void> {
    await this.closeLink();
    this.logger.info('backend_disconnected', { kind: this.kind });
  }

  // -----------------------------------------------------------------------
  // Mutating calls
  // -----------------------------------------------------------------------

  arm(): Promise<void> {
    return this.action('arm', () => this.doArm());
  }

  disarm(): Promise<void> {
    return this.action('disarm', () => this.doDisarm());
  }

  takeoff(altitude: number): Promise<void> {
    return this.action('takeoff', () => this.doTakeoff(altitude));
  }

  land(): Promise<void> {
    return this.action('land', () => this.doLand());
  }

  returnToLaunch(): Promise<void> {
    return this.action('return_to_launch', () => this.doReturnToLaunch());
  }

  holdPosition(): Promise<void> {
    return this.action('hold', () => this.doHold());
  }

  gotoPosition(target: NedPoint, yaw?: number, maxSpeed?: number): Promise<void> {
    return this.action('goto', () => this.doGoto(target, yaw, maxSpeed));
  }

  orbit(request: OrbitRequest): Promise<void> {
    return this.action('orbit', () => this.doOrbit(request));
  }

  setFlightMode(mode: FlightMode): Promise<void> {
    return this.action(`set_mode(${mode})`, () => this.doSetFlightMode(mode));
  }

  async emergencyStop(): Promise<void> {
    this.latchEmergency('emergency stop requested');
    await this.holdPosition();
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  async getState(): Promise<DroneState> {
    return (await this.getTelemetry()).state;
  }

  async isArmed(): Promise<boolean> {
    await this.refresh();
    if (!this.connected) return false;
    return (await this.readFrame()).armed;
  }

  async getFlightMode(): Promise<FlightMode> {
    await this.refresh();
    if (!this.connected) return 'unknown';
    return (await this.readFrame()).flightMode;
  }

  async getTelemetry(): Promise<Telemetry> {
    await this.refresh();
    const frame = this.connected ? await this.readFrame() : DISCONNECTED_FRAME;
    const { statusReceived, ...rest } = frame;
    return {
      ...rest,
      droneId: this.droneId,
      timestamp: Date.now(),
      state: deriveDroneState({
        connected: frame.connected,
        statusReceived,
        armed: frame.armed,
        flightMode: frame.flightMode,
        inAir: frame.inAir,
        emergency: this._emergencyReason !== null,
      }),
    };
  }

  // -----------------------------------------------------------------------
  // Emergency latch
  // -----------------------------------------------------------------------

  get emergencyReason(): string | null {
    return this._emergencyReason;
  }

  latchEmergency(reason: string): void {
    if (this._emergencyReason === null) {
      this.logger.error('emergency_latched', { reason });
    }
    this._emergencyReason = reason;
  }

  clearEmergency(): void {
    if (this._emergencyReason !== null) {
      this.logger.warn('emergency_cleared', { reason: this._emergencyReason });
    }
    this._emergencyReason = null;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Bound a mutating call by the action timeout and map its failure to BackendError. */
  protected async action(label: string, fn: () => Promise<void>): Promise<void> {
    if (!this.connected) {
      throw new ConnectionError(`${label}: vehicle not connected`);
    }
    this.logger.debug('backend_action', { action: label });
    try {
      await withTimeout(fn(), this.timing.actionTimeoutMs, label);
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new BackendError(`${label} did not complete within ${this.timing.actionTimeoutMs}ms`);
      }
      if (err instanceof SkyhandError) throw err;
      throw new BackendError(`${label} failed: ${toErrorMessage(err)}`, { cause: err });
    }
  }
}
