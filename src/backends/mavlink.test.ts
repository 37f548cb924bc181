import { describe, it, expect, afterEach } from 'vitest';
import { MavlinkBackend } from './mavlink.js';
import type { MavlinkLink, MessageHandler, MessageSource } from './mavlink-link.js';
import {
  MAV_CMD,
  MAV_RESULT,
  TYPE_MASK_POSITION,
  px4CustomMode,
  type CommandLongMessage,
  type InboundMessage,
  type OutboundMessage,
} from './protocol.js';
import type { ProtocolTiming } from '../core/config.js';
import { delay } from '../core/async.js';
import { silentLogger } from '../core/logger.js';
import type { CommandContext } from '../commands/command.js';
import { GotoCommand } from '../commands/goto.js';
import { FAST_COMMAND_TIMING } from '../commands/testing.js';
import { ConnectionError } from '../types/errors.js';

const VEHICLE: MessageSource = { systemId: 7, componentId: 1 };
const HOLD_MODE = px4CustomMode('hold') ?? 0;

/** In-process link: records outbound messages and acks commands on the spot. */
class FakeLink implements MavlinkLink {
  isOpen = false;
  readonly sent: OutboundMessage[] = [];
  heartbeatOnOpen = true;
  /** Reply to a command; defaults to an immediate ACCEPTED. */
  onCommand: (command: CommandLongMessage, link: FakeLink) => void = (command, link) =>
    link.ack(command.command, MAV_RESULT.ACCEPTED);
  private handlers: MessageHandler[] = [];

  async open(): Promise<void> {
    this.isOpen = true;
    if (this.heartbeatOnOpen) this.heartbeat(1);
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }

  async send(message: OutboundMessage): Promise<void> {
    this.sent.push(message);
    if (message.type === 'COMMAND_LONG') this.onCommand(message, this);
  }

  onMessage(handler: MessageHandler): void {
    this.handlers.push(handler);
  }

  emit(message: InboundMessage, source: MessageSource = VEHICLE): void {
    for (const handler of this.handlers) handler(message, source);
  }

  heartbeat(baseMode: number, customMode = HOLD_MODE, source: MessageSource = VEHICLE): void {
    this.emit({ type: 'HEARTBEAT', systemId: source.systemId, componentId: source.componentId, baseMode, customMode }, source);
  }

  ack(command: number, result: number): void {
    this.emit({ type: 'COMMAND_ACK', command, result });
  }

  commands(): CommandLongMessage[] {
    return this.sent.filter((m): m is CommandLongMessage => m.type === 'COMMAND_LONG');
  }

  vehicleBound(): OutboundMessage[] {
    return this.sent.filter((m) => m.type !== 'HEARTBEAT');
  }
}

const opened: MavlinkBackend[] = [];

function makeBackend(timing: Partial<ProtocolTiming> = {}) {
  const link = new FakeLink();
  const backend = new MavlinkBackend({
    droneId: 'test-drone',
    link,
    timing: { ackPollIntervalMs: 5, ackTimeoutMs: 200, connectTimeoutMs: 200, ...timing },
  });
  opened.push(backend);
  return { link, backend };
}

afterEach(async () => {
  await Promise.all(opened.splice(0).map((backend) => backend.disconnect()));
});

describe('MavlinkBackend — connect', () => {
  it('adopts the ids of the first vehicle heartbeat', async () => {
    const { link, backend } = makeBackend();
    await backend.connect('udp://:14540');
    await backend.arm();
    const [arm] = link.commands();
    expect(arm).toEqual({
      type: 'COMMAND_LONG',
      targetSystem: 7,
      targetComponent: 1,
      command: MAV_CMD.COMPONENT_ARM_DISARM,
      confirmation: 0,
      params: [1, 0, 0, 0, 0, 0, 0],
    });
    await backend.disconnect();
  });

  it('starts the ground-station heartbeat on connect', async () => {
    const { link, backend } = makeBackend();
    await backend.connect('udp://:14540');
    expect(link.sent[0]).toEqual({ type: 'HEARTBEAT' });
    await backend.disconnect();
  });

  it('fails and closes the link when no heartbeat arrives', async () => {
    const { link, backend } = makeBackend({ connectTimeoutMs: 50 });
    link.heartbeatOnOpen = false;
    const err = await backend.connect('udp://:14540').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toHaveProperty('message', 'no heartbeat within 50ms');
    expect(link.isOpen).toBe(false);
  });

  it('stops sending after disconnect', async () => {
    const { link, backend } = makeBackend({ heartbeatRateHz: 100 });
    await backend.connect('udp://:14540');
    await backend.disconnect();
    const count = link.sent.length;
    await delay(40);
    expect(link.sent.length).toBe(count);
    expect(backend.connected).toBe(false);
  });
});

describe('MavlinkBackend — acknowledgments', () => {
  it('rejects with the result name', async () => {
    const { link, backend } = makeBackend();
    link.onCommand = (command, l) => l.ack(command.command, MAV_RESULT.DENIED);
    await backend.connect('udp://:14540');
    await expect(backend.arm()).rejects.toThrow('MAV_CMD_COMPONENT_ARM_DISARM rejected: MAV_RESULT_DENIED');
  });

  it('fails when no ack arrives in time', async () => {
    const { link, backend } = makeBackend({ ackTimeoutMs: 50 });
    link.onCommand = () => undefined;
    await backend.connect('udp://:14540');
    await expect(backend.land()).rejects.toThrow('MAV_CMD_NAV_LAND: no acknowledgment within 50ms');
  });

  it('keeps waiting through IN_PROGRESS', async () => {
    const { link, backend } = makeBackend();
    link.onCommand = (command, l) => {
      l.ack(command.command, MAV_RESULT.IN_PROGRESS);
      setTimeout(() => l.ack(command.command, MAV_RESULT.ACCEPTED), 30);
    };
    await backend.connect('udp://:14540');
    await expect(backend.returnToLaunch()).resolves.toBeUndefined();
  });

  it('ignores acks for other commands', async () => {
    const { link, backend } = makeBackend({ ackTimeoutMs: 50 });
    link.onCommand = (_command, l) => l.ack(MAV_CMD.NAV_TAKEOFF, MAV_RESULT.ACCEPTED);
    await backend.connect('udp://:14540');
    await expect(backend.land()).rejects.toThrow('no acknowledgment within 50ms');
  });
});

describe('MavlinkBackend — commands', () => {
  it('sends an absolute takeoff altitude when the home altitude is known', async () => {
    const { link, backend } = makeBackend();
    await backend.connect('udp://:14540');
    link.emit({
      type: 'GLOBAL_POSITION_INT',
      latitude: 47.39,
      longitude: 8.54,
      altitudeMsl: 490,
      altitudeRelative: 2,
      north: 0,
      east: 0,
      down: 0,
    });
    await backend.takeoff(10);
    expect(link.commands().at(-1)?.params).toEqual([0, 0, 0, 0, 47.39, 8.54, 498]);
  });

  it('sends a relative takeoff altitude without a global fix', async () => {
    const { link, backend } = makeBackend();
    await backend.connect('udp://:14540');
    await backend.takeoff(10);
    expect(link.commands().at(-1)?.params).toEqual([0, 0, 0, 0, 0, 0, 10]);
  });

  it('primes the setpoint stream before switching to offboard', async () => {
    const { link, backend } = makeBackend({ setpointRateHz: 50 });
    await backend.connect('udp://:14540');
    await backend.gotoPosition({ north: 5, east: 0, down: -5 }, undefined, 3);

    const [speed, setpoint, mode] = link.vehicleBound();
    expect(speed).toMatchObject({ type: 'COMMAND_LONG', command: MAV_CMD.DO_CHANGE_SPEED, params: [1, 3, -1, 0, 0, 0, 0] });
    expect(setpoint).toMatchObject({
      type: 'SET_POSITION_TARGET_LOCAL_NED',
      targetSystem: 7,
      typeMask: TYPE_MASK_POSITION,
      north: 5,
      east: 0,
      down: -5,
      yaw: 0,
    });
    expect(mode).toMatchObject({ type: 'COMMAND_LONG', command: MAV_CMD.DO_SET_MODE, params: [1, 6, 0, 0, 0, 0, 0] });

    await backend.holdPosition();
    expect(link.commands().at(-1)?.params).toEqual([1, 4, 3, 0, 0, 0, 0]);
    const setpoints = link.sent.filter((m) => m.type === 'SET_POSITION_TARGET_LOCAL_NED').length;
    await delay(60);
    expect(link.sent.filter((m) => m.type === 'SET_POSITION_TARGET_LOCAL_NED').length).toBe(setpoints);
    await backend.disconnect();
  });

  it('requires a global orbit centre', async () => {
    const { backend } = makeBackend();
    await backend.connect('udp://:14540');
    expect(backend.requiresGlobalOrbitCenter).toBe(true);
    await expect(
      backend.orbit({
        center: { frame: 'local', point: { north: 0, east: 0, down: 0 } },
        radius: 10,
        velocity: 2,
        yawBehavior: 'face_center',
      }),
    ).rejects.toThrow('orbit centre must be given as latitude/longitude');
  });

  it('encodes DO_ORBIT parameters', async () => {
    const { link, backend } = makeBackend();
    await backend.connect('udp://:14540');
    await backend.orbit({
      center: { frame: 'global', point: { latitude: 47.4, longitude: 8.5, altitude: 510 } },
      radius: 15,
      velocity: -3,
      yawBehavior: 'face_tangent',
    });
    expect(link.commands().at(-1)).toMatchObject({
      command: MAV_CMD.DO_ORBIT,
      params: [15, -3, 3, 0, 47.4, 8.5, 510],
    });
  });

  it('refuses modes the autopilot cannot enter on command', async () => {
    const { backend } = makeBackend();
    await backend.connect('udp://:14540');
    await expect(backend.setFlightMode('unknown')).rejects.toThrow('flight mode unknown cannot be commanded');
  });
});

describe('MavlinkBackend — telemetry', () => {
  it('assembles a frame from the latest messages', async () => {
    const { link, backend } = makeBackend();
    await backend.connect('udp://:14540');
    link.heartbeat(129);
    link.emit({ type: 'EXTENDED_SYS_STATE', landedState: 2 });
    link.emit({
      type: 'GLOBAL_POSITION_INT',
      latitude: 47.39,
      longitude: 8.54,
      altitudeMsl: 498,
      altitudeRelative: 10,
      north: 1,
      east: 0,
      down: 0,
    });
    link.emit({ type: 'GPS_RAW_INT', fixType: 3, satellitesVisible: 12, hdop: 0.8, vdop: 1.2 });

    const telemetry = await backend.getTelemetry();
    expect(telemetry.state).toBe('flying');
    expect(telemetry.armed).toBe(true);
    expect(telemetry.flightMode).toBe('hold');
    expect(telemetry.inAir).toBe(true);
    expect(telemetry.position).toEqual({
      latitude: 47.39,
      longitude: 8.54,
      altitudeMsl: 498,
      altitudeRelative: 10,
    });
    expect(telemetry.velocity).toEqual({ north: 1, east: 0, down: 0, groundSpeed: 1 });
    expect(telemetry.health.telemetryOk).toBe(true);
    expect(telemetry.health.gpsOk).toBe(true);
    await backend.disconnect();
  });

  it('falls back to relative altitude without a landed state', async () => {
    const { link, backend } = makeBackend();
    await backend.connect('udp://:14540');
    link.heartbeat(129);
    link.emit({
      type: 'GLOBAL_POSITION_INT',
      latitude: 0,
      longitude: 0,
      altitudeMsl: 0.3,
      altitudeRelative: 0.3,
      north: 0,
      east: 0,
      down: 0,
    });
    expect(await backend.getState()).toBe('armed');
    await backend.disconnect();
  });

  it('ignores messages from other systems', async () => {
    const { link, backend } = makeBackend();
    await backend.connect('udp://:14540');
    link.heartbeat(129, HOLD_MODE, { systemId: 9, componentId: 1 });
    expect(await backend.isArmed()).toBe(false);
    await backend.disconnect();
  });

  it('marks telemetry stale, then the link lost, as heartbeats stop', async () => {
    const { backend } = makeBackend({ heartbeatStaleMs: 20, connectionLostMs: 80 });
    await backend.connect('udp://:14540');

    await delay(40);
    const stale = await backend.getTelemetry();
    expect(stale.connected).toBe(true);
    expect(stale.health.telemetryOk).toBe(false);

    await delay(60);
    expect(backend.connected).toBe(false);
    expect(await backend.getState()).toBe('disconnected');
    await backend.disconnect();
  });
});

describe('MavlinkBackend — offboard stream lifetime', () => {
  const setpointsSent = (link: FakeLink) =>
    link.sent.filter((m) => m.type === 'SET_POSITION_TARGET_LOCAL_NED').length;

  /** Armed, in the air and hovering 10 m up. */
  function hover(link: FakeLink): void {
    link.heartbeat(129);
    link.emit({ type: 'EXTENDED_SYS_STATE', landedState: 2 });
    link.emit({ type: 'LOCAL_POSITION_NED', north: 0, east: 0, down: -10, vn: 0, ve: 0, vd: 0 });
  }

  it('stops streaming when a goto is cancelled', async () => {
    const { link, backend } = makeBackend({ setpointRateHz: 100 });
    await backend.connect('udp://:14540');
    hover(link);
    const controller = new AbortController();
    const ctx: CommandContext = {
      backend,
      telemetry: { read: () => backend.getTelemetry() },
      signal: controller.signal,
      logger: silentLogger,
      timing: { ...FAST_COMMAND_TIMING, movementWindowMs: 5_000 },
    };

    setTimeout(() => controller.abort(), 100);
    const result = await new GotoCommand({ north: 50, east: 0, down: -10, timeout: 30 }).run(ctx);

    expect(result.code).toBe('cancelled');
    expect(link.commands().at(-1)).toMatchObject({ command: MAV_CMD.DO_SET_MODE, params: [1, 4, 3, 0, 0, 0, 0] });
    const sent = setpointsSent(link);
    expect(sent).toBeGreaterThan(1);
    await delay(100);
    expect(setpointsSent(link)).toBe(sent);
    await backend.disconnect();
  });

  it('stops streaming when the switch to offboard is rejected', async () => {
    const { link, backend } = makeBackend({ setpointRateHz: 100 });
    link.onCommand = (command, l) =>
      l.ack(command.command, command.command === MAV_CMD.DO_SET_MODE ? MAV_RESULT.DENIED : MAV_RESULT.ACCEPTED);
    await backend.connect('udp://:14540');
    hover(link);

    await expect(backend.gotoPosition({ north: 5, east: 0, down: -10 })).rejects.toThrow(
      'MAV_CMD_DO_SET_MODE rejected: MAV_RESULT_DENIED',
    );
    const sent = setpointsSent(link);
    await delay(60);
    expect(setpointsSent(link)).toBe(sent);
    await backend.disconnect();
  });
});
