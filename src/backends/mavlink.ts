/**
 * Skyhand Agent — MAVLink Backend
 *
 * Raw-frame adapter. Messages are pushed by the link into the store as
 * they arrive; this class adds the connect handshake (wait for the first
 * vehicle heartbeat and adopt its ids) and the outgoing ground-station
 * heartbeat that keeps the autopilot from declaring a link loss.
 */

import { delay } from '../core/async.js';
import { CancellationError, ConnectionError, toErrorMessage } from '../types/errors.js';
import { AckProtocolBackend } from './ack-backend.js';
import type { BackendOptions } from './backend.js';
import { parseConnectionString } from './connection-string.js';
import { createMavlinkLink, type MavlinkLink, type MessageSource } from './mavlink-link.js';
import type { InboundMessage, OutboundMessage } from './protocol.js';
import type { BackendKind } from '../core/config.js';

export interface MavlinkBackendOptions extends BackendOptions {
  /** Pre-built link; otherwise one is created from the connection string. */
  link?: MavlinkLink;
}

export class MavlinkBackend extends AckProtocolBackend {
  readonly kind: BackendKind = 'mavlink';
  private link: MavlinkLink | null;
  private readonly injected: boolean;
  private vehicle: MessageSource | null = null;
  private subscribed: MavlinkLink | null = null;
  private heartbeatController: AbortController | null = null;
  private heartbeatLoop: Promise<void> | null = null;

  constructor(options: MavlinkBackendOptions) {
    super(options);
    this.link = options.link ?? null;
    this.injected = options.link !== undefined;
  }

  protected get linkOpen(): boolean {
    return this.link?.isOpen ?? false;
  }

  protected async openLink(connectionString: string): Promise<void> {
    const link = this.link ?? createMavlinkLink(parseConnectionString(connectionString), this.logger.child('link'));
    this.link = link;
    this.store.clear();
    this.vehicle = null;
    if (this.subscribed !== link) {
      link.onMessage((message, source) => this.handleMessage(message, source));
      this.subscribed = link;
    }
    await link.open();
    this.markLinkOpened();
    this.startHeartbeat();

    try {
      await this.waitForVehicle();
    } catch (err) {
      await this.closeLink();
      throw err;
    }
    this.logger.info('vehicle_found', { system: this.targetSystem, component: this.targetComponent });
  }

  protected async closeLink(): Promise<void> {
    await this.streamer.stop();
    await this.stopHeartbeat();
    const link = this.link;
    if (link?.isOpen) await link.close();
    if (!this.injected) this.link = null;
  }

  protected transmit(message: OutboundMessage): Promise<void> {
    const link = this.link;
    if (!link?.isOpen) return Promise.reject(new ConnectionError('mavlink link not open'));
    return link.send(message);
  }

  /** Acks are pushed by the link; nothing to poll. */
  protected refreshAcks(): Promise<void> {
    return Promise.resolve();
  }

  // -----------------------------------------------------------------------
  // Inbound
  // -----------------------------------------------------------------------

  /** Adopt the first vehicle heard; ignore every other system after that. Exposed for testing. */
  handleMessage(message: InboundMessage, source: MessageSource): void {
    let vehicle = this.vehicle;
    if (!vehicle) {
      if (message.type !== 'HEARTBEAT') return;
      vehicle = source;
      this.vehicle = source;
      this.targetSystem = source.systemId;
      this.targetComponent = source.componentId;
    }
    if (source.systemId !== vehicle.systemId) return;
    this.store.record(message);
  }

  private async waitForVehicle(): Promise<void> {
    const deadline = Date.now() + this.timing.connectTimeoutMs;
    while (!this.store.heartbeat) {
      if (Date.now() >= deadline) {
        throw new ConnectionError(`no heartbeat within ${this.timing.connectTimeoutMs}ms`);
      }
      await delay(Math.min(50, this.timing.connectTimeoutMs));
    }
  }

  // -----------------------------------------------------------------------
  // Outgoing heartbeat
  // -----------------------------------------------------------------------

  private startHeartbeat(): void {
    if (this.heartbeatLoop) return;
    const controller = new AbortController();
    this.heartbeatController = controller;
    this.heartbeatLoop = this.runHeartbeat(controller.signal);
  }

  private async stopHeartbeat(): Promise<void> {
    const loop = this.heartbeatLoop;
    this.heartbeatController?.abort();
    this.heartbeatController = null;
    this.heartbeatLoop = null;
    if (loop) await loop;
  }

  private async runHeartbeat(signal: AbortSignal): Promise<void> {
    const periodMs = 1000 / Math.max(this.timing.heartbeatRateHz, 0.1);
    while (!signal.aborted) {
      try {
        await this.transmit({ type: 'HEARTBEAT' });
      } catch (err) {
        this.logger.debug('gcs_heartbeat_failed', { error: toErrorMessage(err) });
      }
      try {
        await delay(periodMs, signal);
      } catch (err) {
        if (err instanceof CancellationError) return;
        throw err;
      }
    }
  }
}
