import { describe, it, expect } from 'vitest';
import axios, { type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { RestBridgeBackend, bridgeBody, isObject, parseBridgeMessage } from './rest-bridge.js';
import { MAV_CMD, px4CustomMode } from './protocol.js';
import type { ProtocolTiming } from '../core/config.js';
import { delay } from '../core/async.js';
import { BackendError, ConnectionError } from '../types/errors.js';

const BASE = 'http://bridge.test';
const HOLD_MODE = px4CustomMode('hold') ?? 0;
const SOURCE = { systemId: 1, componentId: 1 };

interface Stored {
  message: Record<string, unknown>;
  counter: number;
}

/** In-process bridge behind an axios adapter. Acks every COMMAND_LONG it accepts. */
class FakeBridge {
  readonly client: AxiosInstance;
  readonly gets: string[] = [];
  readonly posts: unknown[] = [];
  prefix = 'mavlink/vehicles/1/components/1/messages';
  /** Result written back for each command; null leaves the ack untouched */
  ackResult: string | null = 'MAV_RESULT_ACCEPTED';
  /** Statuses for the next POSTs, consumed in order; 200 afterwards */
  postStatuses: number[] = [];
  /** Forced status per message type */
  readonly getStatus = new Map<string, number>();
  private readonly messages = new Map<string, Stored>();

  constructor() {
    this.client = axios.create({ adapter: (config) => this.handle(config) });
  }

  /** Store a new copy of a message, bumping its receive counter. */
  set(type: string, message: Record<string, unknown>): void {
    const counter = (this.messages.get(type)?.counter ?? 0) + 1;
    this.messages.set(type, { message: { type, ...message }, counter });
  }

  private async handle(config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
    const url = config.url ?? '';
    if (config.method === 'post') return this.handlePost(config);

    this.gets.push(url);
    const path = url.slice(BASE.length + 1);
    if (!path.startsWith(`${this.prefix}/`)) return respond(config, 404);
    const type = path.slice(this.prefix.length + 1);
    const forced = this.getStatus.get(type);
    if (forced !== undefined) return respond(config, forced);
    const stored = this.messages.get(type);
    if (!stored) return respond(config, 404);
    return respond(config, 200, { message: stored.message, status: { time: { counter: stored.counter } } });
  }

  private handlePost(config: InternalAxiosRequestConfig): AxiosResponse {
    const raw: unknown = config.data;
    const body: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
    this.posts.push(body);
    const status = this.postStatuses.shift() ?? 200;
    const message = isObject(body) ? body.message : undefined;
    if (status === 200 && this.ackResult !== null && isObject(message) && message.type === 'COMMAND_LONG') {
      this.set('COMMAND_ACK', { command: message.command, result: { type: this.ackResult } });
    }
    return respond(config, status);
  }
}

function respond(config: InternalAxiosRequestConfig, status: number, data: unknown = {}): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

function makeBackend(timing: Partial<ProtocolTiming> = {}) {
  const bridge = new FakeBridge();
  bridge.set('HEARTBEAT', { base_mode: { bits: 1 }, custom_mode: HOLD_MODE });
  const backend = new RestBridgeBackend({
    droneId: 'test-drone',
    httpClient: bridge.client,
    timing: {
      ackPollIntervalMs: 5,
      ackTimeoutMs: 200,
      connectTimeoutMs: 200,
      transportRetryDelayMs: 5,
      ...timing,
    },
  });
  return { bridge, backend };
}

describe('RestBridgeBackend — connect', () => {
  it('finds the path convention the bridge serves', async () => {
    const { bridge, backend } = makeBackend();
    bridge.prefix = 'mavlink/vehicles/1/messages';
    await backend.connect(BASE);
    expect(backend.connected).toBe(true);
    expect(bridge.gets).toEqual([
      `${BASE}/mavlink/vehicles/1/components/1/messages/HEARTBEAT`,
      `${BASE}/mavlink/vehicles/1/messages/HEARTBEAT`,
    ]);
    await backend.disconnect();
    expect(backend.connected).toBe(false);
  });

  it('fails when no convention yields a heartbeat', async () => {
    const { bridge, backend } = makeBackend({ connectTimeoutMs: 30 });
    bridge.prefix = 'nowhere';
    const err = await backend.connect(BASE).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toHaveProperty('message', `no heartbeat from ${BASE} within 30ms: no heartbeat`);
  });

  it('rejects non-http connection strings', async () => {
    const { backend } = makeBackend();
    await expect(backend.connect('udp://:14540')).rejects.toThrow(
      'REST bridge needs an http(s) URL, got udp://:14540',
    );
  });
});

describe('RestBridgeBackend — commands', () => {
  it('posts COMMAND_LONG with a ground-station header', async () => {
    const { bridge, backend } = makeBackend();
    await backend.connect(BASE);
    await backend.arm();
    expect(bridge.posts).toEqual([
      {
        header: { system_id: 255, component_id: 190, sequence: 0 },
        message: {
          type: 'COMMAND_LONG',
          target_system: 1,
          target_component: 1,
          command: { type: 'MAV_CMD_COMPONENT_ARM_DISARM' },
          confirmation: 0,
          param1: 1,
          param2: 0,
          param3: 0,
          param4: 0,
          param5: 0,
          param6: 0,
          param7: 0,
        },
      },
    ]);
  });

  it('does not take an ack left over from before the command', async () => {
    const { bridge, backend } = makeBackend({ ackTimeoutMs: 50 });
    bridge.set('COMMAND_ACK', {
      command: { type: 'MAV_CMD_COMPONENT_ARM_DISARM' },
      result: { type: 'MAV_RESULT_ACCEPTED' },
    });
    bridge.ackResult = null;
    await backend.connect(BASE);
    await expect(backend.arm()).rejects.toThrow('MAV_CMD_COMPONENT_ARM_DISARM: no acknowledgment within 50ms');
  });

  it('reports a denied command', async () => {
    const { bridge, backend } = makeBackend();
    bridge.ackResult = 'MAV_RESULT_DENIED';
    await backend.connect(BASE);
    await expect(backend.land()).rejects.toThrow('MAV_CMD_NAV_LAND rejected: MAV_RESULT_DENIED');
  });

  it('retries a failed POST with the same sequence number', async () => {
    const { bridge, backend } = makeBackend();
    bridge.postStatuses = [503];
    await backend.connect(BASE);
    await backend.returnToLaunch();
    expect(bridge.posts).toHaveLength(2);
    expect(bridge.posts[1]).toEqual(bridge.posts[0]);
  });

  it('gives up on POST after the transport retries', async () => {
    const { bridge, backend } = makeBackend();
    bridge.postStatuses = [500, 500, 500];
    await backend.connect(BASE);
    const err = await backend.land().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendError);
    expect(err).toHaveProperty('message', 'POST COMMAND_LONG failed after 3 attempts: HTTP 500');
  });

  it('gives up on ack polling after the transport retries', async () => {
    const { bridge, backend } = makeBackend();
    bridge.getStatus.set('COMMAND_ACK', 500);
    await backend.connect(BASE);
    await expect(backend.arm()).rejects.toThrow('GET COMMAND_ACK failed after 3 attempts: HTTP 500');
    expect(bridge.posts).toHaveLength(0);
  });
});

describe('RestBridgeBackend — telemetry', () => {
  it('converts bridge messages into a telemetry frame', async () => {
    const { bridge, backend } = makeBackend();
    await backend.connect(BASE);
    bridge.set('HEARTBEAT', { base_mode: { bits: 129 }, custom_mode: HOLD_MODE });
    bridge.set('GLOBAL_POSITION_INT', {
      lat: 473977420,
      lon: 85455940,
      alt: 498000,
      relative_alt: 10000,
      vx: 100,
      vy: 0,
      vz: 0,
    });
    bridge.set('SYS_STATUS', { voltage_battery: 15800, current_battery: 1250, battery_remaining: 76 });
    bridge.set('GPS_RAW_INT', {
      fix_type: { type: 'GPS_FIX_TYPE_3D_FIX' },
      satellites_visible: 10,
      eph: 80,
      epv: 120,
    });
    bridge.set('EXTENDED_SYS_STATE', { landed_state: { type: 'MAV_LANDED_STATE_IN_AIR' } });

    const telemetry = await backend.getTelemetry();
    expect(telemetry.state).toBe('flying');
    expect(telemetry.flightMode).toBe('hold');
    expect(telemetry.position.latitude).toBeCloseTo(47.397742, 7);
    expect(telemetry.position.altitudeRelative).toBe(10);
    expect(telemetry.velocity?.north).toBe(1);
    expect(telemetry.battery).toEqual({ voltage: 15.8, current: 12.5, remainingPercent: 76 });
    expect(telemetry.gps).toEqual({ fixType: 3, satellitesVisible: 10, hdop: 0.8, vdop: 1.2 });
    expect(telemetry.health.gpsOk).toBe(true);
  });

  it('goes stale while the heartbeat counter stands still', async () => {
    const { bridge, backend } = makeBackend({ heartbeatStaleMs: 20 });
    await backend.connect(BASE);
    await delay(40);
    const stale = await backend.getTelemetry();
    expect(stale.connected).toBe(true);
    expect(stale.health.telemetryOk).toBe(false);

    bridge.set('HEARTBEAT', { base_mode: { bits: 1 }, custom_mode: HOLD_MODE });
    const fresh = await backend.getTelemetry();
    expect(fresh.health.telemetryOk).toBe(true);
  });
});

describe('bridge message codec', () => {
  it('parses enum objects and bitmasks', () => {
    expect(parseBridgeMessage('HEARTBEAT', { base_mode: { bits: 129 }, custom_mode: 7 }, SOURCE)).toEqual({
      type: 'HEARTBEAT',
      systemId: 1,
      componentId: 1,
      baseMode: 129,
      customMode: 7,
    });
    expect(
      parseBridgeMessage(
        'COMMAND_ACK',
        { command: { type: 'MAV_CMD_NAV_TAKEOFF' }, result: { type: 'MAV_RESULT_TEMPORARILY_REJECTED' } },
        SOURCE,
      ),
    ).toEqual({ type: 'COMMAND_ACK', command: MAV_CMD.NAV_TAKEOFF, result: 1 });
  });

  it('rejects unknown enum names and missing numbers', () => {
    expect(() =>
      parseBridgeMessage('EXTENDED_SYS_STATE', { landed_state: { type: 'MAV_LANDED_STATE_SWIMMING' } }, SOURCE),
    ).toThrow('unknown value MAV_LANDED_STATE_SWIMMING in landed_state');
    expect(() => parseBridgeMessage('VFR_HUD', { airspeed: 3 }, SOURCE)).toThrow(
      'bridge field groundspeed is not a number',
    );
  });

  it('encodes setpoints in the local NED frame', () => {
    expect(
      bridgeBody({
        type: 'SET_POSITION_TARGET_LOCAL_NED',
        targetSystem: 1,
        targetComponent: 1,
        timeBootMs: 1200,
        typeMask: 2552,
        north: 4,
        east: -2,
        down: -10,
        yaw: 0,
      }),
    ).toMatchObject({
      coordinate_frame: { type: 'MAV_FRAME_LOCAL_NED' },
      type_mask: { bits: 2552 },
      time_boot_ms: 1200,
      x: 4,
      y: -2,
      z: -10,
    });
  });
});
