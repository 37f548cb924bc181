/**
 * Skyhand Agent — Session Backend (native-SDK adapter)
 *
 * Delegates to a managed FlightSession: each session call returns once
 * the vehicle has accepted the action, so no acknowledgment handshake is
 * needed here. SimFlightSession is the in-process implementation used for
 * sim:// connections and tests; a native autopilot SDK binding implements
 * the same interface.
 */

import type { BackendKind } from '../core/config.js';
import type { NedPoint } from '../types/geo.js';
import type { Attitude, Battery, FlightMode, GpsInfo, Position, Velocity } from '../types/models.js';
import { BaseBackend, type BackendOptions, type OrbitRequest, type TelemetryFrame } from './backend.js';

// ---------------------------------------------------------------------------
// FlightSession
// ---------------------------------------------------------------------------

export interface SessionStatus {
  armed: boolean;
  flightMode: FlightMode;
  inAir: boolean;
  position: Position;
  attitude?: Attitude;
  velocity?: Velocity;
  battery?: Battery;
  gps?: GpsInfo;
  /** Session-level health: sensors calibrated, estimator converged */
  healthy: boolean;
}

export interface FlightSession {
  readonly isOpen: boolean;
  readonly requiresGlobalOrbitCenter: boolean;
  open(address: string): Promise<void>;
  close(): Promise<void>;
  arm(): Promise<void>;
  disarm(): Promise<void>;
  takeoff(altitude: number): Promise<void>;
  land(): Promise<void>;
  returnToLaunch(): Promise<void>;
  hold(): Promise<void>;
  gotoLocal(target: NedPoint, yaw?: number, maxSpeed?: number): Promise<void>;
  orbit(request: OrbitRequest): Promise<void>;
  setMode(mode: FlightMode): Promise<void>;
  status(): Promise<SessionStatus>;
}

// ---------------------------------------------------------------------------
// SessionBackend
// ---------------------------------------------------------------------------

export class SessionBackend extends BaseBackend {
  readonly kind: BackendKind = 'session';
  private readonly session: FlightSession;

  constructor(session: FlightSession, options: BackendOptions) {
    super(options);
    this.session = session;
  }

  get connected(): boolean {
    return this.session.isOpen;
  }

  get requiresGlobalOrbitCenter(): boolean {
    return this.session.requiresGlobalOrbitCenter;
  }

  protected async openLink(connectionString: string): Promise<void> {
    await this.session.open(connectionString);
  }

  protected async closeLink(): Promise<void> {
    if (this.session.isOpen) await this.session.close();
  }

  protected doArm(): Promise<void> {
    return this.session.arm();
  }

  protected doDisarm(): Promise<void> {
    return this.session.disarm();
  }

  protected doTakeoff(altitude: number): Promise<void> {
    return this.session.takeoff(altitude);
  }

  protected doLand(): Promise<void> {
    return this.session.land();
  }

  protected doReturnToLaunch(): Promise<void> {
    return this.session.returnToLaunch();
  }

  protected doHold(): Promise<void> {
    return this.session.hold();
  }

  protected doGoto(target: NedPoint, yaw?: number, maxSpeed?: number): Promise<void> {
    return this.session.gotoLocal(target, yaw, maxSpeed);
  }

  protected doOrbit(request: OrbitRequest): Promise<void> {
    return this.session.orbit(request);
  }

  protected doSetFlightMode(mode: FlightMode): Promise<void> {
    return this.session.setMode(mode);
  }

  protected async readFrame(): Promise<TelemetryFrame> {
    const status = await this.session.status();
    const gpsOk = (status.gps?.fixType ?? 0) >= 3;
    return {
      connected: this.session.isOpen,
      statusReceived: true,
      armed: status.armed,
      flightMode: status.flightMode,
      inAir: status.inAir,
      position: status.position,
      attitude: status.attitude,
      velocity: status.velocity,
      battery: status.battery,
      gps: status.gps,
      health: { telemetryOk: status.healthy, gpsOk },
    };
  }
}
