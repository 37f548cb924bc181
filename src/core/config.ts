/**
 * Skyhand Agent — Configuration
 *
 * Defaults for every tunable, overridable per component with a Partial
 * and for the whole agent through SKYHAND_* environment variables.
 * Invalid values fall back to the default instead of failing startup.
 */

import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isLogLevel, type LogLevel } from './logger.js';

// ---------------------------------------------------------------------------
// Command timing
// ---------------------------------------------------------------------------

export interface CommandTiming {
  /** Interval between convergence checks inside command loops (ms). */
  pollIntervalMs: number;
  /** Time after issuing takeoff before a settled lower altitude counts as success (ms). */
  takeoffGraceMs: number;
  /** Minimum altitude for the soft takeoff success (m). */
  takeoffSoftMinAltitude: number;
  /** Window without displacement after which goto reports no movement (ms). */
  movementWindowMs: number;
  /** Displacement below this counts as not moving (m). */
  movementThresholdM: number;
  /** Horizontal envelope for goto targets, measured from the arm point (m). */
  maxHorizontalDistanceM: number;
  /** Orbit length when no duration mode is given (s). */
  defaultOrbitDurationS: number;
}

export const DEFAULT_COMMAND_TIMING: CommandTiming = {
  pollIntervalMs: 500,
  takeoffGraceMs: 8_000,
  takeoffSoftMinAltitude: 1.0,
  movementWindowMs: 10_000,
  movementThresholdM: 0.5,
  maxHorizontalDistanceM: 1_000,
  defaultOrbitDurationS: 30,
};

// ---------------------------------------------------------------------------
// Protocol timing
// ---------------------------------------------------------------------------

export interface ProtocolTiming {
  /** Upper bound for any single mutating backend call (ms). */
  actionTimeoutMs: number;
  /** Time allowed for a COMMAND_ACK after sending (ms). */
  ackTimeoutMs: number;
  /** Ack polling interval (ms). */
  ackPollIntervalMs: number;
  /** Heartbeat age after which telemetry is marked unhealthy (ms). */
  heartbeatStaleMs: number;
  /** Heartbeat age after which the link counts as lost (ms). */
  connectionLostMs: number;
  /** Time allowed for the first heartbeat after opening the link (ms). */
  connectTimeoutMs: number;
  /** Offboard setpoint stream rate (Hz). */
  setpointRateHz: number;
  /** Outgoing heartbeat rate on raw links (Hz). */
  heartbeatRateHz: number;
  /** Per-request timeout for the REST bridge (ms). */
  requestTimeoutMs: number;
  /** Extra transport-level attempts per REST request. */
  transportRetries: number;
  /** Pause between transport-level attempts (ms). */
  transportRetryDelayMs: number;
  /** Target vehicle ids on the wire. */
  targetSystem: number;
  targetComponent: number;
}

export const DEFAULT_PROTOCOL_TIMING: ProtocolTiming = {
  actionTimeoutMs: 15_000,
  ackTimeoutMs: 5_000,
  ackPollIntervalMs: 50,
  heartbeatStaleMs: 3_000,
  connectionLostMs: 10_000,
  connectTimeoutMs: 10_000,
  setpointRateHz: 10,
  heartbeatRateHz: 1,
  requestTimeoutMs: 2_000,
  transportRetries: 2,
  transportRetryDelayMs: 100,
  targetSystem: 1,
  targetComponent: 1,
};

// ---------------------------------------------------------------------------
// Agent
// ---------------------------------------------------------------------------

export const BACKEND_KINDS = ['session', 'mavlink', 'rest'] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

export interface AgentConfig {
  droneId: string;
  /** udp://, tcp://, serial://, http(s):// or sim:// */
  connectionString: string;
  /** Adapter to use; 'auto' picks it from the connection-string scheme. */
  backend: BackendKind | 'auto';
  /** Directory holding *.command.json records. */
  catalogDir: string;
  logLevel: LogLevel;
  /** Telemetry poll interval (ms). */
  telemetryIntervalMs: number;
  /** Grace added to a command's catalog timeout before the runner gives up (ms). */
  attemptGraceMs: number;
  command: CommandTiming;
  protocol: ProtocolTiming;
}

/** The catalog shipped with the package. */
export const DEFAULT_CATALOG_DIR = resolve(
  join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'catalog', 'commands'),
);

export const DEFAULT_AGENT_CONFIG: AgentConfig = {
  droneId: 'drone-1',
  connectionString: 'udp://:14540',
  backend: 'auto',
  catalogDir: DEFAULT_CATALOG_DIR,
  logLevel: 'info',
  telemetryIntervalMs: 1_000,
  attemptGraceMs: 1_000,
  command: DEFAULT_COMMAND_TIMING,
  protocol: DEFAULT_PROTOCOL_TIMING,
};

export type Env = Record<string, string | undefined>;

export const numberOr = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const booleanOr = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
};

const backendOr = (value: string | undefined, fallback: AgentConfig['backend']): AgentConfig['backend'] => {
  if (value === 'auto') return value;
  return BACKEND_KINDS.find((kind) => kind === value) ?? fallback;
};

/**
 * Build the agent configuration from the environment.
 *
 *   SKYHAND_DRONE_ID, SKYHAND_CONNECTION, SKYHAND_BACKEND, SKYHAND_CATALOG_DIR,
 *   SKYHAND_LOG_LEVEL, SKYHAND_TELEMETRY_INTERVAL_MS, SKYHAND_COMMAND_POLL_MS,
 *   SKYHAND_TAKEOFF_GRACE_MS, SKYHAND_MOVEMENT_WINDOW_MS, SKYHAND_ACK_TIMEOUT_MS,
 *   SKYHAND_HEARTBEAT_STALE_MS, SKYHAND_CONNECT_TIMEOUT_MS, SKYHAND_SETPOINT_RATE_HZ,
 *   SKYHAND_REQUEST_TIMEOUT_MS, SKYHAND_TRANSPORT_RETRIES, SKYHAND_TARGET_SYSTEM
 */
export function loadAgentConfig(env: Env = process.env): AgentConfig {
  const base = DEFAULT_AGENT_CONFIG;
  const level = env.SKYHAND_LOG_LEVEL?.toLowerCase();

  return {
    droneId: env.SKYHAND_DRONE_ID || base.droneId,
    connectionString: env.SKYHAND_CONNECTION || base.connectionString,
    backend: backendOr(env.SKYHAND_BACKEND, base.backend),
    catalogDir: env.SKYHAND_CATALOG_DIR || base.catalogDir,
    logLevel: level && isLogLevel(level) ? level : base.logLevel,
    telemetryIntervalMs: numberOr(env.SKYHAND_TELEMETRY_INTERVAL_MS, base.telemetryIntervalMs),
    attemptGraceMs: base.attemptGraceMs,
    command: {
      ...base.command,
      pollIntervalMs: numberOr(env.SKYHAND_COMMAND_POLL_MS, base.command.pollIntervalMs),
      takeoffGraceMs: numberOr(env.SKYHAND_TAKEOFF_GRACE_MS, base.command.takeoffGraceMs),
      movementWindowMs: numberOr(env.SKYHAND_MOVEMENT_WINDOW_MS, base.command.movementWindowMs),
    },
    protocol: {
      ...base.protocol,
      ackTimeoutMs: numberOr(env.SKYHAND_ACK_TIMEOUT_MS, base.protocol.ackTimeoutMs),
      heartbeatStaleMs: numberOr(env.SKYHAND_HEARTBEAT_STALE_MS, base.protocol.heartbeatStaleMs),
      connectTimeoutMs: numberOr(env.SKYHAND_CONNECT_TIMEOUT_MS, base.protocol.connectTimeoutMs),
      setpointRateHz: numberOr(env.SKYHAND_SETPOINT_RATE_HZ, base.protocol.setpointRateHz),
      requestTimeoutMs: numberOr(env.SKYHAND_REQUEST_TIMEOUT_MS, base.protocol.requestTimeoutMs),
      transportRetries: numberOr(env.SKYHAND_TRANSPORT_RETRIES, base.protocol.transportRetries),
      targetSystem: numberOr(env.SKYHAND_TARGET_SYSTEM, base.protocol.targetSystem),
    },
  };
}
