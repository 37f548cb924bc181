/**
 * Skyhand Agent — Data Model
 *
 * Shared value types: vehicle states and flight modes, positions and
 * telemetry, command requests, per-command executions and results.
 *
 * Positions carry two optional frames side by side:
 *  - global: WGS-84 latitude/longitude plus altitude above sea level and
 *    above the takeoff point
 *  - local: NED metres from the arm point ("down" grows toward the ground)
 */

import type { NedPoint } from './geo.js';

// ---------------------------------------------------------------------------
// Vehicle state and flight mode
// ---------------------------------------------------------------------------

/** Coarse operational state, derived from backend signals. */
export const DRONE_STATES = [
  'disconnected',
  'connected',
  'disarmed',
  'armed',
  'taking_off',
  'flying',
  'landing',
  'emergency',
] as const;

export type DroneState = (typeof DRONE_STATES)[number];

/** Flight modes the agent reasons about. Autopilot-specific modes map onto these. */
export const FLIGHT_MODES = [
  'manual',
  'stabilized',
  'acro',
  'altitude',
  'position',
  'hold',
  'takeoff',
  'land',
  'rtl',
  'mission',
  'offboard',
  'orbit',
  'unknown',
] as const;

export type FlightMode = (typeof FLIGHT_MODES)[number];

export function isFlightMode(value: string): value is FlightMode {
  return FLIGHT_MODES.some((mode) => mode === value);
}

// ---------------------------------------------------------------------------
// Telemetry
// ---------------------------------------------------------------------------

export interface Position {
  /** Degrees, WGS-84 */
  latitude?: number;
  /** Degrees, WGS-84 */
  longitude?: number;
  /** Metres above mean sea level */
  altitudeMsl?: number;
  /** Metres above the takeoff point */
  altitudeRelative?: number;
  /** Local frame, metres from the arm point */
  north?: number;
  east?: number;
  down?: number;
}

/** Degrees and degrees per second. */
export interface Attitude {
  roll: number;
  pitch: number;
  yaw: number;
  rollRate?: number;
  pitchRate?: number;
  yawRate?: number;
}

/** Metres per second, NED. */
export interface Velocity {
  north: number;
  east: number;
  down: number;
  groundSpeed?: number;
  airSpeed?: number;
}

export interface Battery {
  /** Volts */
  voltage: number;
  /** Amperes, when the vehicle reports it */
  current?: number;
  /** 0–100 */
  remainingPercent?: number;
}

export interface GpsInfo {
  /** 0 no GPS, 1 no fix, 2 2D, 3 3D, 4+ DGPS/RTK */
  fixType: number;
  satellitesVisible: number;
  hdop?: number;
  vdop?: number;
}

export interface HealthFlags {
  /** Vehicle status messages are arriving within the staleness threshold */
  telemetryOk: boolean;
  /** A 3D fix or better */
  gpsOk: boolean;
  /** Milliseconds since the last vehicle status message, when known */
  lastHeartbeatAgeMs?: number;
}

export interface Telemetry {
  droneId: string;
  /** Date.now() at capture */
  timestamp: number;
  state: DroneState;
  flightMode: FlightMode;
  armed: boolean;
  inAir: boolean;
  connected: boolean;
  position: Position;
  attitude?: Attitude;
  velocity?: Velocity;
  battery?: Battery;
  gps?: GpsInfo;
  health: HealthFlags;
}

/** Local position of a telemetry frame, when the vehicle reports all three axes. */
export function localPositionOf(telemetry: Telemetry): NedPoint | null {
  const { north, east, down } = telemetry.position;
  if (north === undefined || east === undefined || down === undefined) return null;
  return { north, east, down };
}

/** Altitude above the takeoff point, from whichever frame is available. */
export function relativeAltitudeOf(telemetry: Telemetry): number {
  if (telemetry.position.altitudeRelative !== undefined) {
    return telemetry.position.altitudeRelative;
  }
  if (telemetry.position.down !== undefined) return -telemetry.position.down;
  return 0;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export type ParamValue = number | boolean | string;

/** Typed, bounds-checked parameters. */
export type CommandParams = Readonly<Record<string, ParamValue>>;

/** A command as submitted by the transport: parameters not yet checked. */
export interface CommandRequest {
  name: string;
  params?: Record<string, unknown>;
}

export interface ValidatedCommand {
  name: string;
  params: CommandParams;
}

/** Machine-readable failure tag carried by a failed CommandResult. */
export const FAILURE_CODES = [
  'cancelled',
  'timeout',
  'no_movement',
  'validation',
  'bad_state',
  'backend',
  'connection',
  'execution',
] as const;

export type FailureCode = (typeof FAILURE_CODES)[number];

export type ResultData = Readonly<Record<string, unknown>>;

export interface CommandResult {
  success: boolean;
  message: string;
  code?: FailureCode;
  error?: string;
  data?: ResultData;
  durationMs?: number;
}

export function succeeded(message: string, data?: ResultData): CommandResult {
  return data === undefined ? { success: true, message } : { success: true, message, data };
}

export function failed(
  code: FailureCode,
  message: string,
  extra: { error?: string; data?: ResultData } = {},
): CommandResult {
  return { success: false, message, code, ...extra };
}

export type ExecutionStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

/** One command of a submitted sequence, tracked from enqueue to completion. */
export interface CommandExecution {
  /** `${sequenceId}-${index}` */
  id: string;
  sequenceId: string;
  /** Position inside the sequence */
  index: number;
  request: CommandRequest;
  status: ExecutionStatus;
  /** Attempts made so far */
  attempts: number;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
  /** Aggregated result after retries */
  result?: CommandResult;
}
