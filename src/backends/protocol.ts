/**
 * Skyhand Agent — MAVLink Protocol Vocabulary
 *
 * Command codes, result codes, PX4 custom-mode encoding and the
 * normalised inbound messages shared by the raw-frame and REST-bridge
 * adapters. Values follow the MAVLink common dialect; units are converted
 * to SI (degrees, metres, volts) when a message is normalised.
 */

import { RAD2DEG } from '../types/geo.js';
import type { FlightMode } from '../types/models.js';

// ---------------------------------------------------------------------------
// Commands and results
// ---------------------------------------------------------------------------

export const MAV_CMD = {
  NAV_RETURN_TO_LAUNCH: 20,
  NAV_LAND: 21,
  NAV_TAKEOFF: 22,
  DO_ORBIT: 34,
  DO_SET_MODE: 176,
  DO_CHANGE_SPEED: 178,
  COMPONENT_ARM_DISARM: 400,
  SET_MESSAGE_INTERVAL: 511,
} as const;

export type MavCmdName = keyof typeof MAV_CMD;

export const MAV_RESULT = {
  ACCEPTED: 0,
  TEMPORARILY_REJECTED: 1,
  DENIED: 2,
  UNSUPPORTED: 3,
  FAILED: 4,
  IN_PROGRESS: 5,
  CANCELLED: 6,
} as const;

export const MAV_LANDED_STATE = {
  UNDEFINED: 0,
  ON_GROUND: 1,
  IN_AIR: 2,
  TAKEOFF: 3,
  LANDING: 4,
} as const;

export const GPS_FIX_TYPE = {
  NO_GPS: 0,
  NO_FIX: 1,
  '2D_FIX': 2,
  '3D_FIX': 3,
  DGPS: 4,
  RTK_FLOAT: 5,
  RTK_FIXED: 6,
} as const;

/** base_mode bits */
export const MAV_MODE_FLAG = {
  CUSTOM_MODE_ENABLED: 1,
  SAFETY_ARMED: 128,
} as const;

/** SET_POSITION_TARGET_LOCAL_NED: use position and yaw, ignore velocity, acceleration and yaw rate. */
export const TYPE_MASK_POSITION_YAW = 0b0000_1001_1111_1000;
/** Same, and ignore yaw. */
export const TYPE_MASK_POSITION = 0b0000_1101_1111_1000;
export const MAV_FRAME_LOCAL_NED = 1;

/** Ids this agent uses on the wire (ground station, mission computer). */
export const GCS_SYSTEM_ID = 255;
export const GCS_COMPONENT_ID = 190;

/** Seven COMMAND_LONG parameter slots. */
export type CommandParams7 = [number, number, number, number, number, number, number];

export function commandName(code: number): string {
  const entry = Object.entries(MAV_CMD).find(([, value]) => value === code);
  return entry ? `MAV_CMD_${entry[0]}` : `MAV_CMD(${code})`;
}

export function resultName(code: number): string {
  const entry = Object.entries(MAV_RESULT).find(([, value]) => value === code);
  return entry ? `MAV_RESULT_${entry[0]}` : `MAV_RESULT(${code})`;
}

/**
 * Resolve a prefixed enum name ("MAV_RESULT_DENIED") against a table.
 * @returns The numeric value, or undefined when the name is not in the table
 */
export function enumValue(table: Readonly<Record<string, number>>, prefix: string, name: string): number | undefined {
  const key = name.startsWith(prefix) ? name.slice(prefix.length) : name;
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

// ---------------------------------------------------------------------------
// PX4 custom mode
// ---------------------------------------------------------------------------

const PX4_MAIN = { MANUAL: 1, ALTCTL: 2, POSCTL: 3, AUTO: 4, ACRO: 5, OFFBOARD: 6, STABILIZED: 7 } as const;
const PX4_AUTO = { TAKEOFF: 2, LOITER: 3, MISSION: 4, RTL: 5, LAND: 6 } as const;
const PX4_POSCTL_ORBIT = 1;

/** Main and sub mode for DO_SET_MODE. */
const PX4_MODES: ReadonlyArray<readonly [FlightMode, number, number]> = [
  ['manual', PX4_MAIN.MANUAL, 0],
  ['altitude', PX4_MAIN.ALTCTL, 0],
  ['position', PX4_MAIN.POSCTL, 0],
  ['orbit', PX4_MAIN.POSCTL, PX4_POSCTL_ORBIT],
  ['acro', PX4_MAIN.ACRO, 0],
  ['offboard', PX4_MAIN.OFFBOARD, 0],
  ['stabilized', PX4_MAIN.STABILIZED, 0],
  ['takeoff', PX4_MAIN.AUTO, PX4_AUTO.TAKEOFF],
  ['hold', PX4_MAIN.AUTO, PX4_AUTO.LOITER],
  ['mission', PX4_MAIN.AUTO, PX4_AUTO.MISSION],
  ['rtl', PX4_MAIN.AUTO, PX4_AUTO.RTL],
  ['land', PX4_MAIN.AUTO, PX4_AUTO.LAND],
];

/** Main modes whose sub mode selects the flight mode. */
const SUB_MODE_SIGNIFICANT: readonly number[] = [PX4_MAIN.AUTO, PX4_MAIN.POSCTL];

/** Decode HEARTBEAT.custom_mode as reported by PX4. */
export function decodePx4Mode(baseMode: number, customMode: number): FlightMode {
  if ((baseMode & MAV_MODE_FLAG.CUSTOM_MODE_ENABLED) === 0) return 'unknown';
  const main = (customMode >>> 16) & 0xff;
  const sub = (customMode >>> 24) & 0xff;
  const subMatters = SUB_MODE_SIGNIFICANT.includes(main);
  const match = PX4_MODES.find(([, m, s]) => m === main && (!subMatters || s === sub));
  if (match) return match[0];
  // Unlisted position sub modes still hold position
  return main === PX4_MAIN.POSCTL ? 'position' : 'unknown';
}

/** Encode a flight mode as a PX4 custom_mode word. */
export function px4CustomMode(mode: FlightMode): number | null {
  const pair = encodePx4Mode(mode);
  return pair ? ((pair[1] << 24) | (pair[0] << 16)) >>> 0 : null;
}

/** @returns [main, sub] for DO_SET_MODE, or null if PX4 has no such mode */
export function encodePx4Mode(mode: FlightMode): [number, number] | null {
  const match = PX4_MODES.find(([name]) => name === mode);
  return match ? [match[1], match[2]] : null;
}

export function isArmedFlag(baseMode: number): boolean {
  return (baseMode & MAV_MODE_FLAG.SAFETY_ARMED) !== 0;
}

// ---------------------------------------------------------------------------
// Normalised inbound messages
// ---------------------------------------------------------------------------

export interface HeartbeatMessage {
  type: 'HEARTBEAT';
  systemId: number;
  componentId: number;
  baseMode: number;
  customMode: number;
}

export interface GlobalPositionMessage {
  type: 'GLOBAL_POSITION_INT';
  latitude: number;
  longitude: number;
  altitudeMsl: number;
  altitudeRelative: number;
  north: number;
  east: number;
  down: number;
}

export interface LocalPositionMessage {
  type: 'LOCAL_POSITION_NED';
  north: number;
  east: number;
  down: number;
  vn: number;
  ve: number;
  vd: number;
}

export interface AttitudeMessage {
  type: 'ATTITUDE';
  roll: number;
  pitch: number;
  yaw: number;
  rollRate: number;
  pitchRate: number;
  yawRate: number;
}

export interface SysStatusMessage {
  type: 'SYS_STATUS';
  voltage: number;
  /** Amperes; undefined when the vehicle does not measure it */
  current?: number;
  remainingPercent?: number;
}

export interface GpsRawMessage {
  type: 'GPS_RAW_INT';
  fixType: number;
  satellitesVisible: number;
  hdop?: number;
  vdop?: number;
}

export interface VfrHudMessage {
  type: 'VFR_HUD';
  groundSpeed: number;
  airSpeed: number;
}

export interface ExtendedSysStateMessage {
  type: 'EXTENDED_SYS_STATE';
  landedState: number;
}

export interface CommandAckMessage {
  type: 'COMMAND_ACK';
  command: number;
  result: number;
}

export type InboundMessage =
  | HeartbeatMessage
  | GlobalPositionMessage
  | LocalPositionMessage
  | AttitudeMessage
  | SysStatusMessage
  | GpsRawMessage
  | VfrHudMessage
  | ExtendedSysStateMessage
  | CommandAckMessage;

export type InboundType = InboundMessage['type'];

/** Telemetry messages polled by the REST bridge (acks are polled separately). */
export const TELEMETRY_MESSAGE_TYPES: readonly InboundType[] = [
  'GLOBAL_POSITION_INT',
  'LOCAL_POSITION_NED',
  'ATTITUDE',
  'SYS_STATUS',
  'GPS_RAW_INT',
  'VFR_HUD',
  'EXTENDED_SYS_STATE',
];

// ---------------------------------------------------------------------------
// Outbound messages
// ---------------------------------------------------------------------------

export interface CommandLongMessage {
  type: 'COMMAND_LONG';
  targetSystem: number;
  targetComponent: number;
  command: number;
  confirmation: number;
  params: CommandParams7;
}

export interface PositionTargetMessage {
  type: 'SET_POSITION_TARGET_LOCAL_NED';
  targetSystem: number;
  targetComponent: number;
  timeBootMs: number;
  typeMask: number;
  north: number;
  east: number;
  down: number;
  /** Radians */
  yaw: number;
}

export interface GcsHeartbeatMessage {
  type: 'HEARTBEAT';
}

export type OutboundMessage = CommandLongMessage | PositionTargetMessage | GcsHeartbeatMessage;

// ---------------------------------------------------------------------------
// Raw field conversion (wire integers to SI)
// ---------------------------------------------------------------------------

export interface RawGlobalPosition {
  lat: number;
  lon: number;
  alt: number;
  relativeAlt: number;
  vx: number;
  vy: number;
  vz: number;
}

export function normalizeGlobalPosition(raw: RawGlobalPosition): GlobalPositionMessage {
  return {
    type: 'GLOBAL_POSITION_INT',
    latitude: raw.lat / 1e7,
    longitude: raw.lon / 1e7,
    altitudeMsl: raw.alt / 1000,
    altitudeRelative: raw.relativeAlt / 1000,
    north: raw.vx / 100,
    east: raw.vy / 100,
    down: raw.vz / 100,
  };
}

export function normalizeAttitude(raw: {
  roll: number;
  pitch: number;
  yaw: number;
  rollspeed: number;
  pitchspeed: number;
  yawspeed: number;
}): AttitudeMessage {
  return {
    type: 'ATTITUDE',
    roll: raw.roll * RAD2DEG,
    pitch: raw.pitch * RAD2DEG,
    yaw: raw.yaw * RAD2DEG,
    rollRate: raw.rollspeed * RAD2DEG,
    pitchRate: raw.pitchspeed * RAD2DEG,
    yawRate: raw.yawspeed * RAD2DEG,
  };
}

export function normalizeSysStatus(raw: {
  voltageBattery: number;
  currentBattery: number;
  batteryRemaining: number;
}): SysStatusMessage {
  return {
    type: 'SYS_STATUS',
    voltage: raw.voltageBattery / 1000,
    current: raw.currentBattery < 0 ? undefined : raw.currentBattery / 100,
    remainingPercent: raw.batteryRemaining < 0 ? undefined : raw.batteryRemaining,
  };
}

/** eph/epv are DOP × 100; 65535 means unknown. */
export function normalizeGpsRaw(raw: {
  fixType: number;
  satellitesVisible: number;
  eph: number;
  epv: number;
}): GpsRawMessage {
  return {
    type: 'GPS_RAW_INT',
    fixType: raw.fixType,
    satellitesVisible: raw.satellitesVisible === 255 ? 0 : raw.satellitesVisible,
    hdop: raw.eph === 65535 ? undefined : raw.eph / 100,
    vdop: raw.epv === 65535 ? undefined : raw.epv / 100,
  };
}
