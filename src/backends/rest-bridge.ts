/**
 * Skyhand Agent — REST Bridge Backend
 *
 * Same acknowledged-command protocol as MavlinkBackend, carried over a
 * mavlink2rest-style JSON bridge:
 *
 *   GET  {base}/{prefix}/messages/{TYPE}  → { message: {...}, status: { time: { counter } } }
 *   POST {base}/mavlink                   ← { header: {...}, message: { type, ... } }
 *
 * The bridge only keeps the latest copy of each message, so freshness
 * (heartbeats, acks) is detected by its receive counter going up. Field
 * names are snake_case; enums arrive as { type: "PREFIX_NAME" } and
 * bitmasks as { bits: n }.
 */

import axios, { type AxiosInstance } from 'axios';
import { delay } from '../core/async.js';
import type { BackendKind } from '../core/config.js';
import { BackendError, ConnectionError, toErrorMessage } from '../types/errors.js';
import { AckProtocolBackend } from './ack-backend.js';
import type { BackendOptions } from './backend.js';
import { parseConnectionString } from './connection-string.js';
import {
  GCS_COMPONENT_ID,
  GCS_SYSTEM_ID,
  GPS_FIX_TYPE,
  MAV_CMD,
  MAV_LANDED_STATE,
  MAV_RESULT,
  TELEMETRY_MESSAGE_TYPES,
  commandName,
  enumValue,
  normalizeAttitude,
  normalizeGlobalPosition,
  normalizeGpsRaw,
  normalizeSysStatus,
  type InboundMessage,
  type InboundType,
  type OutboundMessage,
} from './protocol.js';

// ---------------------------------------------------------------------------
// JSON helpers
// ---------------------------------------------------------------------------

type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(obj: JsonObject, key: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new BackendError(`bridge field ${key} is not a number`);
  }
  return value;
}

/** { type: "MAV_RESULT_ACCEPTED" } → "MAV_RESULT_ACCEPTED" */
function enumName(obj: JsonObject, key: string): string {
  const value = obj[key];
  if (isObject(value) && typeof value.type === 'string') return value.type;
  if (typeof value === 'string') return value;
  throw new BackendError(`bridge field ${key} is not an enum`);
}

/** Bitmask as { bits: n } or a bare number. */
function bits(obj: JsonObject, key: string): number {
  const value = obj[key];
  if (isObject(value) && typeof value.bits === 'number') return value.bits;
  if (typeof value === 'number') return value;
  throw new BackendError(`bridge field ${key} is not a bitmask`);
}

function enumField(obj: JsonObject, key: string, table: Readonly<Record<string, number>>, prefix: string): number {
  const name = enumName(obj, key);
  const value = enumValue(table, prefix, name);
  if (value === undefined) throw new BackendError(`unknown value ${name} in ${key}`);
  return value;
}

/** Turn a bridge message body into a normalised message. Exposed for testing. */
export function parseBridgeMessage(type: InboundType, body: JsonObject, source: { systemId: number; componentId: number }): InboundMessage {
  switch (type) {
    case 'HEARTBEAT':
      return {
        type,
        systemId: source.systemId,
        componentId: source.componentId,
        baseMode: bits(body, 'base_mode'),
        customMode: num(body, 'custom_mode'),
      };
    case 'GLOBAL_POSITION_INT':
      return normalizeGlobalPosition({
        lat: num(body, 'lat'),
        lon: num(body, 'lon'),
        alt: num(body, 'alt'),
        relativeAlt: num(body, 'relative_alt'),
        vx: num(body, 'vx'),
        vy: num(body, 'vy'),
        vz: num(body, 'vz'),
      });
    case 'LOCAL_POSITION_NED':
      return {
        type,
        north: num(body, 'x'),
        east: num(body, 'y'),
        down: num(body, 'z'),
        vn: num(body, 'vx'),
        ve: num(body, 'vy'),
        vd: num(body, 'vz'),
      };
    case 'ATTITUDE':
      return normalizeAttitude({
        roll: num(body, 'roll'),
        pitch: num(body, 'pitch'),
        yaw: num(body, 'yaw'),
        rollspeed: num(body, 'rollspeed'),
        pitchspeed: num(body, 'pitchspeed'),
        yawspeed: num(body, 'yawspeed'),
      });
    case 'SYS_STATUS':
      return normalizeSysStatus({
        voltageBattery: num(body, 'voltage_battery'),
        currentBattery: num(body, 'current_battery'),
        batteryRemaining: num(body, 'battery_remaining'),
      });
    case 'GPS_RAW_INT':
      return normalizeGpsRaw({
        fixType: enumField(body, 'fix_type', GPS_FIX_TYPE, 'GPS_FIX_TYPE_'),
        satellitesVisible: num(body, 'satellites_visible'),
        eph: num(body, 'eph'),
        epv: num(body, 'epv'),
      });
    case 'VFR_HUD':
      return { type, groundSpeed: num(body, 'groundspeed'), airSpeed: num(body, 'airspeed') };
    case 'EXTENDED_SYS_STATE':
      return { type, landedState: enumField(body, 'landed_state', MAV_LANDED_STATE, 'MAV_LANDED_STATE_') };
    case 'COMMAND_ACK':
      return {
        type,
        command: enumField(body, 'command', MAV_CMD, 'MAV_CMD_'),
        result: enumField(body, 'result', MAV_RESULT, 'MAV_RESULT_'),
      };
  }
}

/** Build the `message` part of a POST body. Exposed for testing. */
export function bridgeBody(message: OutboundMessage): JsonObject {
  switch (message.type) {
    case 'HEARTBEAT':
      return {
        type: 'HEARTBEAT',
        mavtype: { type: 'MAV_TYPE_GCS' },
        autopilot: { type: 'MAV_AUTOPILOT_INVALID' },
        base_mode: { bits: 0 },
        custom_mode: 0,
        system_status: { type: 'MAV_STATE_ACTIVE' },
        mavlink_version: 3,
      };
    case 'COMMAND_LONG': {
      const [param1, param2, param3, param4, param5, param6, param7] = message.params;
      return {
        type: 'COMMAND_LONG',
        target_system: message.targetSystem,
        target_component: message.targetComponent,
        command: { type: commandName(message.command) },
        confirmation: message.confirmation,
        param1,
        param2,
        param3,
        param4,
        param5,
        param6,
        param7,
      };
    }
    case 'SET_POSITION_TARGET_LOCAL_NED':
      return {
        type: 'SET_POSITION_TARGET_LOCAL_NED',
        time_boot_ms: message.timeBootMs,
        target_system: message.targetSystem,
        target_component: message.targetComponent,
        coordinate_frame: { type: 'MAV_FRAME_LOCAL_NED' },
        type_mask: { bits: message.typeMask },
        x: message.north,
        y: message.east,
        z: message.down,
        vx: 0,
        vy: 0,
        vz: 0,
        afx: 0,
        afy: 0,
        afz: 0,
        yaw: message.yaw,
        yaw_rate: 0,
      };
  }
}

// ---------------------------------------------------------------------------
// RestBridgeBackend
// ---------------------------------------------------------------------------

/** Path prefixes tried at connect, in order. */
export const PATH_CONVENTIONS: readonly ((system: number, component: number) => string)[] = [
  (s, c) => `mavlink/vehicles/${s}/components/${c}/messages`,
  (s) => `mavlink/vehicles/${s}/messages`,
  (s, c) => `vehicles/${s}/components/${c}/messages`,
];

interface BridgeReading {
  body: JsonObject;
  counter: number;
}

export interface RestBridgeBackendOptions extends BackendOptions {
  /** Pre-configured HTTP client; created from the timing otherwise. */
  httpClient?: AxiosInstance;
}

export class RestBridgeBackend extends AckProtocolBackend {
  readonly kind: BackendKind = 'rest';
  private readonly injectedClient: AxiosInstance | undefined;
  private http: AxiosInstance | null = null;
  private baseUrl = '';
  private messagesPath: string | null = null;
  private sequence = 0;
  private counters = new Map<InboundType, number>();

  constructor(options: RestBridgeBackendOptions) {
    super(options);
    this.injectedClient = options.httpClient;
  }

  protected get linkOpen(): boolean {
    return this.http !== null && this.messagesPath !== null;
  }

  protected async openLink(connectionString: string): Promise<void> {
    const endpoint = parseConnectionString(connectionString);
    if (endpoint.scheme !== 'http') {
      throw new ConnectionError(`REST bridge needs an http(s) URL, got ${connectionString}`);
    }
    this.baseUrl = endpoint.baseUrl;
    this.http = this.injectedClient ?? axios.create({ timeout: this.timing.requestTimeoutMs });
    this.store.clear();
    this.counters.clear();
    this.messagesPath = null;

    const deadline = Date.now() + this.timing.connectTimeoutMs;
    let lastError = 'no heartbeat';
    let selected: string | null = null;
    while (selected === null) {
      for (const convention of PATH_CONVENTIONS) {
        const prefix = convention(this.targetSystem, this.targetComponent);
        try {
          const reading = await this.fetch(prefix, 'HEARTBEAT');
          if (reading) {
            this.ingest('HEARTBEAT', reading);
            selected = prefix;
            break;
          }
        } catch (err) {
          lastError = toErrorMessage(err);
        }
      }
      if (selected !== null) break;
      if (Date.now() >= deadline) {
        this.http = null;
        throw new ConnectionError(
          `no heartbeat from ${this.baseUrl} within ${this.timing.connectTimeoutMs}ms: ${lastError}`,
        );
      }
      await delay(this.timing.transportRetryDelayMs);
    }
    this.messagesPath = selected;
    this.markLinkOpened();
    this.logger.info('bridge_path_selected', { path: selected });
  }

  protected async closeLink(): Promise<void> {
    await this.streamer.stop();
    this.http = null;
    this.messagesPath = null;
  }

  // -----------------------------------------------------------------------
  // Polling
  // -----------------------------------------------------------------------

  /** Heartbeat with retries, then best-effort telemetry. */
  protected async refresh(): Promise<void> {
    if (!this.linkOpen) return;
    try {
      await this.poll('HEARTBEAT', true);
    } catch (err) {
      // Staleness takes over from here; the link is reported lost once the heartbeat ages out
      this.logger.warn('bridge_heartbeat_failed', { error: toErrorMessage(err) });
      return;
    }
    for (const type of TELEMETRY_MESSAGE_TYPES) {
      await this.poll(type, false);
    }
  }

  protected async refreshAcks(): Promise<void> {
    await this.poll('COMMAND_ACK', true);
  }

  private async poll(type: InboundType, required: boolean): Promise<void> {
    const path = this.messagesPath;
    if (path === null) throw new ConnectionError('REST bridge not connected');
    const attempts = required ? this.timing.transportRetries + 1 : 1;
    let lastError = '';
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const reading = await this.fetch(path, type);
        if (reading) this.ingest(type, reading);
        return;
      } catch (err) {
        lastError = toErrorMessage(err);
      }
      if (attempt < attempts) await delay(this.timing.transportRetryDelayMs);
    }
    if (required) {
      throw new BackendError(`GET ${type} failed after ${attempts} attempts: ${lastError}`);
    }
    this.logger.debug('bridge_message_unavailable', { type, error: lastError });
  }

  /** Record a reading only if the bridge has received a new copy since the last poll. */
  private ingest(type: InboundType, reading: BridgeReading): void {
    const previous = this.counters.get(type);
    if (previous !== undefined && reading.counter <= previous) return;
    this.counters.set(type, reading.counter);
    this.store.record(
      parseBridgeMessage(type, reading.body, { systemId: this.targetSystem, componentId: this.targetComponent }),
    );
  }

  /**
   * GET one message.
   * @returns null when the bridge has never received that message (404)
   */
  private async fetch(prefix: string, type: InboundType): Promise<BridgeReading | null> {
    const http = this.http;
    if (!http) throw new ConnectionError('REST bridge not connected');
    const response = await http.get<unknown>(`${this.baseUrl}/${prefix}/${type}`, {
      validateStatus: () => true,
      timeout: this.timing.requestTimeoutMs,
    });
    if (response.status === 404) return null;
    if (response.status !== 200) throw new BackendError(`HTTP ${response.status}`);
    const data: unknown = response.data;
    const message = isObject(data) ? data.message : undefined;
    if (!isObject(data) || !isObject(message)) {
      throw new BackendError(`malformed ${type} response`);
    }
    const status = data.status;
    const time: JsonObject = isObject(status) && isObject(status.time) ? status.time : {};
    const counter = typeof time.counter === 'number' ? time.counter : 0;
    return { body: message, counter };
  }

  // -----------------------------------------------------------------------
  // Sending
  // -----------------------------------------------------------------------

  protected async transmit(message: OutboundMessage): Promise<void> {
    const http = this.http;
    if (!http) throw new ConnectionError('REST bridge not connected');
    const payload = {
      header: { system_id: GCS_SYSTEM_ID, component_id: GCS_COMPONENT_ID, sequence: this.sequence },
      message: bridgeBody(message),
    };
    this.sequence = (this.sequence + 1) & 0xff;

    const attempts = this.timing.transportRetries + 1;
    let lastError = '';
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const response = await http.post(`${this.baseUrl}/mavlink`, payload, {
          validateStatus: () => true,
          timeout: this.timing.requestTimeoutMs,
        });
        if (response.status === 200) return;
        lastError = `HTTP ${response.status}`;
      } catch (err) {
        lastError = toErrorMessage(err);
      }
      if (attempt < attempts) await delay(this.timing.transportRetryDelayMs);
    }
    throw new BackendError(`POST ${message.type} failed after ${attempts} attempts: ${lastError}`);
  }
}
