/**
 * Skyhand Agent — Drone Agent
 *
 * Owns the backend, the telemetry poller and the command runner for one
 * vehicle, and exposes the operations the HTTP layer maps onto routes:
 *
 *   GET  status          → getStatus()
 *   GET  telemetry       → getTelemetry()
 *   POST commands        → submitSequence()
 *   POST emergency_stop  → emergencyStop()
 *   GET  executions/:id  → getExecution()
 */

import type { VehicleBackend } from '../backends/backend.js';
import { createBackend } from '../backends/factory.js';
import type { FlightSession } from '../backends/session.js';
import { loadCatalog } from '../catalog/lookup.js';
import type { CommandCatalog } from '../catalog/types.js';
import { createCommandRegistry, type CommandRegistry } from '../commands/registry.js';
import { DEFAULT_AGENT_CONFIG, loadAgentConfig, type AgentConfig, type Env } from '../core/config.js';
import { createLogger, type Logger } from '../core/logger.js';
import { toErrorMessage } from '../types/errors.js';
import type { CommandExecution, CommandRequest, DroneState, HealthFlags, Telemetry } from '../types/models.js';
import { CommandRunner, type SequenceReport } from './runner.js';
import { TelemetryPoller } from './telemetry-poller.js';

export interface DroneAgentOptions {
  config?: Partial<AgentConfig>;
  /** Prebuilt backend; otherwise one is created from the connection string */
  backend?: VehicleBackend;
  /** Session for the session adapter */
  session?: FlightSession;
  /** Loaded from `config.catalogDir` when omitted */
  catalog?: CommandCatalog;
  logger?: Logger;
}

export interface SubmittedSequence {
  sequenceId: string;
  executionIds: string[];
}

export interface AgentStatus {
  droneId: string;
  state: DroneState;
  currentExecution: CommandExecution | null;
  queueDepth: number;
  /** Timestamp of the cached telemetry, null before the first poll */
  lastTelemetryAt: number | null;
  health: HealthFlags;
  emergencyReason: string | null;
}

export interface EmergencyStopOutcome {
  /** The sequence in flight was cancelled */
  cancelledCurrent: boolean;
  /** Queued sequence ids dropped */
  droppedSequences: string[];
  /** The backend's emergency stop went through */
  stopped: boolean;
  error?: string;
}

export class DroneAgent {
  readonly config: AgentConfig;
  readonly backend: VehicleBackend;
  readonly registry: CommandRegistry;
  readonly poller: TelemetryPoller;
  readonly runner: CommandRunner;
  private readonly logger: Logger;
  private _started = false;

  /** Forwarded from the runner. */
  onSequenceComplete?: (report: SequenceReport) => void;

  constructor(options: DroneAgentOptions = {}) {
    this.config = { ...DEFAULT_AGENT_CONFIG, ...options.config };
    this.logger = options.logger ?? createLogger('agent', { level: this.config.logLevel });

    const catalog = options.catalog ?? loadCatalog(this.config.catalogDir);
    this.registry = createCommandRegistry(catalog);

    this.backend =
      options.backend ??
      createBackend({
        droneId: this.config.droneId,
        connectionString: this.config.connectionString,
        backend: this.config.backend,
        timing: this.config.protocol,
        logger: this.logger.child('backend'),
        session: options.session,
      });

    this.poller = new TelemetryPoller(
      this.backend,
      { intervalMs: this.config.telemetryIntervalMs },
      this.logger.child('telemetry'),
    );
    this.runner = new CommandRunner(
      this.backend,
      this.registry,
      this.poller,
      { attemptGraceMs: this.config.attemptGraceMs, timing: this.config.command },
      this.logger.child('runner'),
    );
    this.runner.onSequenceComplete = (report) => this.onSequenceComplete?.(report);
  }

  /** Agent configured from SKYHAND_* environment variables. */
  static fromEnv(env: Env = process.env, options: Omit<DroneAgentOptions, 'config'> = {}): DroneAgent {
    return new DroneAgent({ ...options, config: loadAgentConfig(env) });
  }

  get started(): boolean {
    return this._started;
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /** Connect, then start polling and executing. */
  async start(): Promise<void> {
    if (this._started) return;
    await this.backend.connect(this.config.connectionString);
    this.poller.start();
    this.runner.start();
    this._started = true;
    this.logger.info('agent_started', {
      droneId: this.config.droneId,
      backend: this.backend.kind,
      commands: this.registry.names().join(','),
    });
  }

  /** Stop both loops and wait for them before releasing the link. */
  async stop(): Promise<void> {
    if (!this._started) return;
    await this.runner.stop();
    await this.poller.stop();
    await this.backend.disconnect();
    this._started = false;
    this.logger.info('agent_stopped', { droneId: this.config.droneId });
  }

  // -----------------------------------------------------------------------
  // Operations
  // -----------------------------------------------------------------------

  /** @throws ValidationError when any command in the sequence is invalid */
  submitSequence(requests: readonly CommandRequest[]): SubmittedSequence {
    const sequence = this.runner.enqueue(requests);
    return { sequenceId: sequence.id, executionIds: sequence.executions.map((e) => e.id) };
  }

  getStatus(): AgentStatus {
    const telemetry = this.poller.snapshot();
    return {
      droneId: this.config.droneId,
      state: telemetry?.state ?? (this.backend.connected ? 'connected' : 'disconnected'),
      currentExecution: this.runner.currentExecution,
      queueDepth: this.runner.queueDepth,
      lastTelemetryAt: telemetry?.timestamp ?? null,
      health: telemetry?.health ?? { telemetryOk: false, gpsOk: false },
      emergencyReason: this.backend.emergencyReason,
    };
  }

  /** Latest cached telemetry, or null before the first poll. */
  getTelemetry(): Telemetry | null {
    return this.poller.snapshot();
  }

  getExecution(id: string): CommandExecution | null {
    return this.runner.getExecution(id);
  }

  getSequenceExecutions(sequenceId: string): CommandExecution[] {
    return this.runner.getSequenceExecutions(sequenceId);
  }

  /**
   * Drop queued work, cancel the sequence in flight and stop the vehicle.
   * The backend call is made even when nothing was running.
   */
  async emergencyStop(): Promise<EmergencyStopOutcome> {
    this.logger.error('emergency_stop_requested');
    const dropped = this.runner.cancelQueued('emergency stop');
    const cancelledCurrent = this.runner.cancelCurrent();
    const droppedSequences = dropped.map((sequence) => sequence.id);
    try {
      await this.backend.emergencyStop();
      return { cancelledCurrent, droppedSequences, stopped: true };
    } catch (err) {
      this.logger.error('emergency_stop_failed', { error: toErrorMessage(err) });
      return { cancelledCurrent, droppedSequences, stopped: false, error: toErrorMessage(err) };
    }
  }

  /** Clear the emergency latch once the operator has recovered the vehicle. */
  resetEmergency(): void {
    this.backend.clearEmergency();
  }
}
