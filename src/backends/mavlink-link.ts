/**
 * Skyhand Agent — MAVLink Link
 *
 * Byte transports (UDP, TCP, serial) feeding node-mavlink's packet
 * splitter and parser, plus the mapping between node-mavlink message
 * classes and the normalised protocol messages the backend works with.
 *
 * UDP follows the ground-station convention: bind the given port, learn
 * the vehicle's address from the first datagram, reply there.
 */

import { createSocket, type Socket as UdpSocket } from 'node:dgram';
import { createConnection, type Socket as TcpSocket } from 'node:net';
import nodeMavlink from 'node-mavlink';
import type { MavLinkData, MavLinkPacket } from 'node-mavlink';
import { SerialPort } from 'serialport';
import { silentLogger, type Logger } from '../core/logger.js';
import { ConnectionError, toErrorMessage } from '../types/errors.js';
import type { Endpoint } from './connection-string.js';
import {
  GCS_COMPONENT_ID,
  GCS_SYSTEM_ID,
  MAV_FRAME_LOCAL_NED,
  normalizeAttitude,
  normalizeGlobalPosition,
  normalizeGpsRaw,
  normalizeSysStatus,
  type InboundMessage,
  type OutboundMessage,
} from './protocol.js';

const { MavLinkPacketSplitter, MavLinkPacketParser, MavLinkProtocolV2, minimal, common } = nodeMavlink;

// ---------------------------------------------------------------------------
// Link contract
// ---------------------------------------------------------------------------

export interface MessageSource {
  systemId: number;
  componentId: number;
}

export type MessageHandler = (message: InboundMessage, source: MessageSource) => void;

/** Message-level link used by MavlinkBackend. */
export interface MavlinkLink {
  readonly isOpen: boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  send(message: OutboundMessage): Promise<void>;
  onMessage(handler: MessageHandler): void;
}

// ---------------------------------------------------------------------------
// Byte transports
// ---------------------------------------------------------------------------

export interface ByteTransport {
  readonly isOpen: boolean;
  readonly description: string;
  open(onData: (chunk: Buffer) => void, onError: (err: Error) => void): Promise<void>;
  write(data: Buffer): Promise<void>;
  close(): Promise<void>;
}

export class UdpTransport implements ByteTransport {
  private socket: UdpSocket | null = null;
  private remote: { address: string; port: number } | null = null;

  constructor(
    private readonly host: string,
    private readonly port: number,
  ) {}

  get isOpen(): boolean {
    return this.socket !== null;
  }

  get description(): string {
    return `udp://${this.host}:${this.port}`;
  }

  open(onData: (chunk: Buffer) => void, onError: (err: Error) => void): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = createSocket('udp4');
      socket.once('error', reject);
      socket.on('message', (msg, rinfo) => {
        this.remote ??= { address: rinfo.address, port: rinfo.port };
        onData(msg);
      });
      socket.bind(this.port, this.host, () => {
        socket.off('error', reject);
        socket.on('error', onError);
        this.socket = socket;
        resolve();
      });
    });
  }

  write(data: Buffer): Promise<void> {
    const socket = this.socket;
    const remote = this.remote;
    if (!socket) return Promise.reject(new ConnectionError('udp link not open'));
    if (!remote) return Promise.reject(new ConnectionError('no vehicle heard on udp yet'));
    return new Promise((resolve, reject) => {
      socket.send(data, remote.port, remote.address, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.remote = null;
    if (!socket) return Promise.resolve();
    return new Promise((resolve) => socket.close(() => resolve()));
  }
}

export class TcpTransport implements ByteTransport {
  private socket: TcpSocket | null = null;

  constructor(
    private readonly host: string,
    private readonly port: number,
  ) {}

  get isOpen(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  get description(): string {
    return `tcp://${this.host}:${this.port}`;
  }

  open(onData: (chunk: Buffer) => void, onError: (err: Error) => void): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ host: this.host, port: this.port });
      socket.once('error', reject);
      socket.on('data', onData);
      socket.once('connect', () => {
        socket.off('error', reject);
        socket.on('error', onError);
        this.socket = socket;
        resolve();
      });
    });
  }

  write(data: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) return Promise.reject(new ConnectionError('tcp link not open'));
    return new Promise((resolve, reject) => {
      socket.write(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket || socket.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      socket.once('close', () => resolve());
      socket.destroy();
    });
  }
}

export class SerialTransport implements ByteTransport {
  private port: SerialPort | null = null;

  constructor(
    private readonly path: string,
    private readonly baudRate: number,
  ) {}

  get isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  get description(): string {
    return `serial://${this.path}:${this.baudRate}`;
  }

  open(onData: (chunk: Buffer) => void, onError: (err: Error) => void): Promise<void> {
    const port = new SerialPort({ path: this.path, baudRate: this.baudRate, autoOpen: false });
    return new Promise((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(err);
          return;
        }
        port.on('data', onData);
        port.on('error', onError);
        this.port = port;
        resolve();
      });
    });
  }

  write(data: Buffer): Promise<void> {
    const port = this.port;
    if (!port) return Promise.reject(new ConnectionError('serial link not open'));
    return new Promise((resolve, reject) => {
      port.write(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(): Promise<void> {
    const port = this.port;
    this.port = null;
    if (!port?.isOpen) return Promise.resolve();
    return new Promise((resolve, reject) => {
      port.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

export function createTransport(endpoint: Endpoint): ByteTransport {
  switch (endpoint.scheme) {
    case 'udp':
      return new UdpTransport(endpoint.host, endpoint.port);
    case 'tcp':
      return new TcpTransport(endpoint.host, endpoint.port);
    case 'serial':
      return new SerialTransport(endpoint.path, endpoint.baudRate);
    default:
      throw new ConnectionError(`${endpoint.scheme} endpoints do not carry raw MAVLink`);
  }
}

// ---------------------------------------------------------------------------
// Codec
// ---------------------------------------------------------------------------

/** Normalise a parsed packet. Returns null for messages the agent ignores. */
export function decodePacket(packet: MavLinkPacket): InboundMessage | null {
  const { protocol, payload } = packet;
  switch (packet.header.msgid) {
    case minimal.Heartbeat.MSG_ID: {
      const hb = protocol.data(payload, minimal.Heartbeat);
      // Other ground stations on the same link
      if (hb.type === minimal.MavType.GCS) return null;
      return {
        type: 'HEARTBEAT',
        systemId: packet.header.sysid,
        componentId: packet.header.compid,
        baseMode: hb.baseMode,
        customMode: hb.customMode,
      };
    }
    case common.GlobalPositionInt.MSG_ID:
      return normalizeGlobalPosition(protocol.data(payload, common.GlobalPositionInt));
    case common.LocalPositionNed.MSG_ID: {
      const local = protocol.data(payload, common.LocalPositionNed);
      return {
        type: 'LOCAL_POSITION_NED',
        north: local.x,
        east: local.y,
        down: local.z,
        vn: local.vx,
        ve: local.vy,
        vd: local.vz,
      };
    }
    case common.Attitude.MSG_ID:
      return normalizeAttitude(protocol.data(payload, common.Attitude));
    case common.SysStatus.MSG_ID:
      return normalizeSysStatus(protocol.data(payload, common.SysStatus));
    case common.GpsRawInt.MSG_ID:
      return normalizeGpsRaw(protocol.data(payload, common.GpsRawInt));
    case common.VfrHud.MSG_ID: {
      const hud = protocol.data(payload, common.VfrHud);
      return { type: 'VFR_HUD', groundSpeed: hud.groundspeed, airSpeed: hud.airspeed };
    }
    case common.ExtendedSysState.MSG_ID:
      return { type: 'EXTENDED_SYS_STATE', landedState: protocol.data(payload, common.ExtendedSysState).landedState };
    case common.CommandAck.MSG_ID: {
      const ack = protocol.data(payload, common.CommandAck);
      return { type: 'COMMAND_ACK', command: ack.command, result: ack.result };
    }
    default:
      return null;
  }
}

export function encodeMessage(message: OutboundMessage): MavLinkData {
  switch (message.type) {
    case 'HEARTBEAT': {
      const hb = new minimal.Heartbeat();
      const none: number = 0;
      hb.type = minimal.MavType.GCS;
      hb.autopilot = minimal.MavAutopilot.INVALID;
      hb.baseMode = none;
      hb.customMode = none;
      hb.systemStatus = minimal.MavState.ACTIVE;
      hb.mavlinkVersion = 3;
      return hb;
    }
    case 'COMMAND_LONG': {
      const cmd = new common.CommandLong();
      const [p1, p2, p3, p4, p5, p6, p7] = message.params;
      cmd.targetSystem = message.targetSystem;
      cmd.targetComponent = message.targetComponent;
      cmd.command = message.command;
      cmd.confirmation = message.confirmation;
      cmd._param1 = p1;
      cmd._param2 = p2;
      cmd._param3 = p3;
      cmd._param4 = p4;
      cmd._param5 = p5;
      cmd._param6 = p6;
      cmd._param7 = p7;
      return cmd;
    }
    case 'SET_POSITION_TARGET_LOCAL_NED': {
      const sp = new common.SetPositionTargetLocalNed();
      const frame: number = MAV_FRAME_LOCAL_NED;
      sp.timeBootMs = message.timeBootMs;
      sp.targetSystem = message.targetSystem;
      sp.targetComponent = message.targetComponent;
      sp.coordinateFrame = frame;
      sp.typeMask = message.typeMask;
      sp.x = message.north;
      sp.y = message.east;
      sp.z = message.down;
      sp.vx = 0;
      sp.vy = 0;
      sp.vz = 0;
      sp.afx = 0;
      sp.afy = 0;
      sp.afz = 0;
      sp.yaw = message.yaw;
      sp.yawRate = 0;
      return sp;
    }
  }
}

// ---------------------------------------------------------------------------
// NodeMavlinkLink
// ---------------------------------------------------------------------------

export class NodeMavlinkLink implements MavlinkLink {
  private readonly handlers: MessageHandler[] = [];
  private readonly protocol = new MavLinkProtocolV2(GCS_SYSTEM_ID, GCS_COMPONENT_ID);
  private seq = 0;

  constructor(
    private readonly transport: ByteTransport,
    private readonly logger: Logger = silentLogger,
  ) {}

  get isOpen(): boolean {
    return this.transport.isOpen;
  }

  onMessage(handler: MessageHandler): void {
    this.handlers.push(handler);
  }

  async open(): Promise<void> {
    const splitter = new MavLinkPacketSplitter();
    const reader = splitter.pipe(new MavLinkPacketParser());
    reader.on('data', (packet: MavLinkPacket) => this.dispatch(packet));
    await this.transport.open(
      (chunk) => splitter.write(chunk),
      (err) => this.logger.warn('link_error', { transport: this.transport.description, error: err }),
    );
    this.logger.info('link_open', { transport: this.transport.description });
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  async send(message: OutboundMessage): Promise<void> {
    const buffer = this.protocol.serialize(encodeMessage(message), this.seq);
    this.seq = (this.seq + 1) & 0xff;
    await this.transport.write(buffer);
  }

  private dispatch(packet: MavLinkPacket): void {
    let message: InboundMessage | null;
    try {
      message = decodePacket(packet);
    } catch (err) {
      this.logger.debug('packet_decode_failed', { msgid: packet.header.msgid, error: toErrorMessage(err) });
      return;
    }
    if (!message) return;
    const source = { systemId: packet.header.sysid, componentId: packet.header.compid };
    for (const handler of this.handlers) handler(message, source);
  }
}

export function createMavlinkLink(endpoint: Endpoint, logger?: Logger): MavlinkLink {
  return new NodeMavlinkLink(createTransport(endpoint), logger);
}
