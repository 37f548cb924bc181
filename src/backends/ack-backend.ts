/**
 * Skyhand Agent — Acknowledged-Command Backend
 *
 * Shared by the raw MAVLink and REST-bridge adapters. Both speak
 * COMMAND_LONG and wait for a matching COMMAND_ACK; they differ only in
 * how messages travel. Subclasses provide transmit() and refreshAcks(),
 * and polled transports override refresh(); everything else lives here:
 *
 *   - latest-message store with receive timestamps
 *   - ack handshake (baseline, send, poll for a newer matching ack)
 *   - heartbeat staleness and link-loss detection
 *   - PX4 mode switching and the offboard setpoint stream
 *   - telemetry frame assembly
 */

import { delay } from '../core/async.js';
import { BackendError } from '../types/errors.js';
import { DEG2RAD, type NedPoint } from '../types/geo.js';
import type { FlightMode, Position, Velocity } from '../types/models.js';
import { BaseBackend, ORBIT_YAW_BEHAVIORS, type BackendOptions, type OrbitRequest, type TelemetryFrame } from './backend.js';
import {
  GPS_FIX_TYPE,
  MAV_CMD,
  MAV_LANDED_STATE,
  MAV_RESULT,
  TYPE_MASK_POSITION,
  TYPE_MASK_POSITION_YAW,
  commandName,
  decodePx4Mode,
  encodePx4Mode,
  isArmedFlag,
  resultName,
  type AttitudeMessage,
  type CommandParams7,
  type ExtendedSysStateMessage,
  type GlobalPositionMessage,
  type GpsRawMessage,
  type HeartbeatMessage,
  type InboundMessage,
  type LocalPositionMessage,
  type OutboundMessage,
  type SysStatusMessage,
  type VfrHudMessage,
} from './protocol.js';
import { SetpointStreamer, type PositionSetpoint } from './setpoint-streamer.js';

// ---------------------------------------------------------------------------
// Message store
// ---------------------------------------------------------------------------

export interface Stamped<T> {
  message: T;
  /** Date.now() when received */
  receivedAt: number;
}

export interface AckRecord {
  command: number;
  result: number;
  /** Monotonic arrival number, starting at 1 */
  seq: number;
  receivedAt: number;
}

/** Relative altitude above which the vehicle counts as airborne when no landed state is reported. */
const AIRBORNE_ALTITUDE = 0.5;
const ACK_HISTORY = 32;

/** Latest message of each kind, plus a short ack history. */
export class MessageStore {
  heartbeat?: Stamped<HeartbeatMessage>;
  globalPosition?: Stamped<GlobalPositionMessage>;
  localPosition?: Stamped<LocalPositionMessage>;
  attitude?: Stamped<AttitudeMessage>;
  sysStatus?: Stamped<SysStatusMessage>;
  gpsRaw?: Stamped<GpsRawMessage>;
  vfrHud?: Stamped<VfrHudMessage>;
  extendedSysState?: Stamped<ExtendedSysStateMessage>;
  private acks: AckRecord[] = [];
  private ackSeq = 0;

  record(message: InboundMessage, receivedAt: number = Date.now()): void {
    switch (message.type) {
      case 'HEARTBEAT':
        this.heartbeat = { message, receivedAt };
        break;
      case 'GLOBAL_POSITION_INT':
        this.globalPosition = { message, receivedAt };
        break;
      case 'LOCAL_POSITION_NED':
        this.localPosition = { message, receivedAt };
        break;
      case 'ATTITUDE':
        this.attitude = { message, receivedAt };
        break;
      case 'SYS_STATUS':
        this.sysStatus = { message, receivedAt };
        break;
      case 'GPS_RAW_INT':
        this.gpsRaw = { message, receivedAt };
        break;
      case 'VFR_HUD':
        this.vfrHud = { message, receivedAt };
        break;
      case 'EXTENDED_SYS_STATE':
        this.extendedSysState = { message, receivedAt };
        break;
      case 'COMMAND_ACK':
        this.acks.push({ command: message.command, result: message.result, seq: ++this.ackSeq, receivedAt });
        if (this.acks.length > ACK_HISTORY) this.acks.shift();
        break;
    }
  }

  /** Sequence number of the newest ack, 0 before any. */
  get lastAckSeq(): number {
    return this.ackSeq;
  }

  /** Newest ack for `command` that arrived after `afterSeq`. */
  findAck(command: number, afterSeq: number): AckRecord | undefined {
    for (let i = this.acks.length - 1; i >= 0; i--) {
      const ack = this.acks[i];
      if (ack && ack.seq > afterSeq && ack.command === command) return ack;
    }
    return undefined;
  }

  clear(): void {
    this.heartbeat = undefined;
    this.globalPosition = undefined;
    this.localPosition = undefined;
    this.attitude = undefined;
    this.sysStatus = undefined;
    this.gpsRaw = undefined;
    this.vfrHud = undefined;
    this.extendedSysState = undefined;
    this.acks = [];
  }
}

const zeros = (): CommandParams7 => [0, 0, 0, 0, 0, 0, 0];

// ---------------------------------------------------------------------------
// AckProtocolBackend
// ---------------------------------------------------------------------------

export abstract class AckProtocolBackend extends BaseBackend {
  protected readonly store = new MessageStore();
  protected readonly streamer: SetpointStreamer;
  /** Wire ids of the vehicle being commanded */
  protected targetSystem: number;
  protected targetComponent: number;
  private bootAt = Date.now();

  constructor(options: BackendOptions) {
    super(options);
    this.targetSystem = this.timing.targetSystem;
    this.targetComponent = this.timing.targetComponent;
    this.streamer = new SetpointStreamer(
      (setpoint) => this.sendSetpoint(setpoint),
      this.timing.setpointRateHz,
      this.logger.child('setpoints'),
    );
  }

  /** Transport is open; says nothing about the vehicle. */
  protected abstract get linkOpen(): boolean;
  protected abstract transmit(message: OutboundMessage): Promise<void>;
  /** Pull any acks the transport holds into the store. */
  protected abstract refreshAcks(): Promise<void>;

  get requiresGlobalOrbitCenter(): boolean {
    return true;
  }

  get connected(): boolean {
    if (!this.linkOpen) return false;
    const age = this.heartbeatAgeMs();
    return age !== null && age <= this.timing.connectionLostMs;
  }

  /** Milliseconds since the last vehicle heartbeat, or null before the first. */
  heartbeatAgeMs(now: number = Date.now()): number | null {
    const heartbeat = this.store.heartbeat;
    return heartbeat ? now - heartbeat.receivedAt : null;
  }

  protected markLinkOpened(): void {
    this.bootAt = Date.now();
  }

  // -----------------------------------------------------------------------
  // Ack handshake
  // -----------------------------------------------------------------------

  /**
   * Send COMMAND_LONG and wait for an ack newer than anything seen
   * before sending. IN_PROGRESS keeps waiting; any other non-ACCEPTED
   * result rejects.
   */
  protected async sendCommand(command: number, params: CommandParams7): Promise<void> {
    await this.refreshAcks();
    const baseline = this.store.lastAckSeq;
    const name = commandName(command);

    await this.transmit({
      type: 'COMMAND_LONG',
      targetSystem: this.targetSystem,
      targetComponent: this.targetComponent,
      command,
      confirmation: 0,
      params,
    });
    this.logger.debug('command_sent', { command: name, params: params.join(',') });

    const deadline = Date.now() + this.timing.ackTimeoutMs;
    let after = baseline;
    while (Date.now() < deadline) {
      await delay(this.timing.ackPollIntervalMs);
      await this.refreshAcks();
      const ack = this.store.findAck(command, after);
      if (!ack) continue;
      if (ack.result === MAV_RESULT.ACCEPTED) {
        this.logger.debug('command_accepted', { command: name });
        return;
      }
      if (ack.result === MAV_RESULT.IN_PROGRESS) {
        after = ack.seq;
        continue;
      }
      throw new BackendError(`${name} rejected: ${resultName(ack.result)}`);
    }
    throw new BackendError(`${name}: no acknowledgment within ${this.timing.ackTimeoutMs}ms`);
  }

  private sendSetpoint(setpoint: PositionSetpoint): Promise<void> {
    return this.transmit({
      type: 'SET_POSITION_TARGET_LOCAL_NED',
      targetSystem: this.targetSystem,
      targetComponent: this.targetComponent,
      timeBootMs: (Date.now() - this.bootAt) % 0x1_0000_0000,
      typeMask: setpoint.yaw === undefined ? TYPE_MASK_POSITION : TYPE_MASK_POSITION_YAW,
      north: setpoint.target.north,
      east: setpoint.target.east,
      down: setpoint.target.down,
      yaw: setpoint.yaw === undefined ? 0 : setpoint.yaw * DEG2RAD,
    });
  }

  // -----------------------------------------------------------------------
  // Actions
  // -----------------------------------------------------------------------

  protected doArm(): Promise<void> {
    const params = zeros();
    params[0] = 1;
    return this.sendCommand(MAV_CMD.COMPONENT_ARM_DISARM, params);
  }

  protected async doDisarm(): Promise<void> {
    await this.streamer.stop();
    await this.sendCommand(MAV_CMD.COMPONENT_ARM_DISARM, zeros());
  }

  /** Param 7 is absolute (AMSL) when the global position is known. */
  protected async doTakeoff(altitude: number): Promise<void> {
    await this.streamer.stop();
    const params = zeros();
    const fix = this.store.globalPosition?.message;
    if (fix) {
      const homeAmsl = fix.altitudeMsl - fix.altitudeRelative;
      params[4] = fix.latitude;
      params[5] = fix.longitude;
      params[6] = homeAmsl + altitude;
    } else {
      params[6] = altitude;
    }
    await this.sendCommand(MAV_CMD.NAV_TAKEOFF, params);
  }

  protected async doLand(): Promise<void> {
    await this.streamer.stop();
    await this.sendCommand(MAV_CMD.NAV_LAND, zeros());
  }

  protected async doReturnToLaunch(): Promise<void> {
    await this.streamer.stop();
    await this.sendCommand(MAV_CMD.NAV_RETURN_TO_LAUNCH, zeros());
  }

  protected doHold(): Promise<void> {
    return this.doSetFlightMode('hold');
  }

  protected async doSetFlightMode(mode: FlightMode): Promise<void> {
    const encoded = encodePx4Mode(mode);
    if (!encoded) throw new BackendError(`flight mode ${mode} cannot be commanded`);
    if (mode !== 'offboard') await this.streamer.stop();
    await this.sendCommand(MAV_CMD.DO_SET_MODE, [1, encoded[0], encoded[1], 0, 0, 0, 0]);
  }

  /** Prime the setpoint stream, then switch to offboard if not already there. */
  protected async doGoto(target: NedPoint, yaw?: number, maxSpeed?: number): Promise<void> {
    if (maxSpeed !== undefined) {
      await this.sendCommand(MAV_CMD.DO_CHANGE_SPEED, [1, maxSpeed, -1, 0, 0, 0, 0]);
    }
    const setpoint: PositionSetpoint = yaw === undefined ? { target } : { target, yaw };
    if (this.streamer.active) {
      this.streamer.update(setpoint);
    } else {
      await this.streamer.start(setpoint);
    }
    if (this.currentMode() === 'offboard') return;
    try {
      await this.doSetFlightMode('offboard');
    } catch (err) {
      await this.streamer.stop();
      throw err;
    }
  }

  protected async doOrbit(request: OrbitRequest): Promise<void> {
    if (request.center.frame !== 'global') {
      throw new BackendError('orbit centre must be given as latitude/longitude');
    }
    await this.streamer.stop();
    const { point } = request.center;
    await this.sendCommand(MAV_CMD.DO_ORBIT, [
      request.radius,
      request.velocity,
      ORBIT_YAW_BEHAVIORS.indexOf(request.yawBehavior),
      0,
      point.latitude,
      point.longitude,
      point.altitude,
    ]);
  }

  // -----------------------------------------------------------------------
  // Telemetry
  // -----------------------------------------------------------------------

  protected currentMode(): FlightMode {
    const heartbeat = this.store.heartbeat?.message;
    return heartbeat ? decodePx4Mode(heartbeat.baseMode, heartbeat.customMode) : 'unknown';
  }

  protected inAir(): boolean {
    const landed = this.store.extendedSysState?.message.landedState;
    if (landed !== undefined && landed !== MAV_LANDED_STATE.UNDEFINED) {
      return (
        landed === MAV_LANDED_STATE.IN_AIR ||
        landed === MAV_LANDED_STATE.TAKEOFF ||
        landed === MAV_LANDED_STATE.LANDING
      );
    }
    return (this.store.globalPosition?.message.altitudeRelative ?? 0) > AIRBORNE_ALTITUDE;
  }

  protected async readFrame(): Promise<TelemetryFrame> {
    const heartbeat = this.store.heartbeat;
    const age = this.heartbeatAgeMs();
    const global = this.store.globalPosition?.message;
    const local = this.store.localPosition?.message;
    const attitude = this.store.attitude?.message;
    const sys = this.store.sysStatus?.message;
    const gps = this.store.gpsRaw?.message;
    const hud = this.store.vfrHud?.message;

    const position: Position = {};
    if (global) {
      position.latitude = global.latitude;
      position.longitude = global.longitude;
      position.altitudeMsl = global.altitudeMsl;
      position.altitudeRelative = global.altitudeRelative;
    }
    if (local) {
      position.north = local.north;
      position.east = local.east;
      position.down = local.down;
    }

    let velocity: Velocity | undefined;
    const source = local ? { north: local.vn, east: local.ve, down: local.vd } : global;
    if (source) {
      velocity = {
        north: source.north,
        east: source.east,
        down: source.down,
        groundSpeed: hud?.groundSpeed ?? Math.hypot(source.north, source.east),
        ...(hud ? { airSpeed: hud.airSpeed } : {}),
      };
    }

    return {
      connected: this.connected,
      statusReceived: heartbeat !== undefined,
      armed: heartbeat ? isArmedFlag(heartbeat.message.baseMode) : false,
      flightMode: this.currentMode(),
      inAir: this.inAir(),
      position,
      attitude: attitude
        ? {
            roll: attitude.roll,
            pitch: attitude.pitch,
            yaw: attitude.yaw,
            rollRate: attitude.rollRate,
            pitchRate: attitude.pitchRate,
            yawRate: attitude.yawRate,
          }
        : undefined,
      velocity,
      battery: sys
        ? { voltage: sys.voltage, current: sys.current, remainingPercent: sys.remainingPercent }
        : undefined,
      gps: gps
        ? { fixType: gps.fixType, satellitesVisible: gps.satellitesVisible, hdop: gps.hdop, vdop: gps.vdop }
        : undefined,
      health: {
        telemetryOk: age !== null && age <= this.timing.heartbeatStaleMs,
        gpsOk: (gps?.fixType ?? 0) >= GPS_FIX_TYPE['3D_FIX'],
        ...(age !== null ? { lastHeartbeatAgeMs: age } : {}),
      },
    };
  }
}
