/**
 * Skyhand Agent — Command Runner
 *
 * One long-lived loop pulling command sequences from a single-consumer
 * queue, so at most one sequence drives the vehicle at a time.
 *
 * Per command:
 *   1. Up to max_retries + 1 attempts, each on a fresh instance and each
 *      bounded by the catalog timeout plus a grace period.
 *   2. Out of attempts: a critical command triggers its failsafe once and
 *      abandons the rest of the sequence; a non-critical one is logged and
 *      the sequence moves on. A timeout escalates further when the
 *      command's timeout_behavior asks for it.
 *   3. A fault outside the attempt path is treated as critical with a
 *      `land` failsafe, whatever the command declares.
 *
 * If the failsafe itself fails the sequence ends as `failsafe_failed`:
 * the emergency latch is set on the backend and queued sequences are
 * cancelled, since nothing further can be trusted to run safely.
 */

import type { VehicleBackend } from '../backends/backend.js';
import type { CommandSpec, FailsafeAction, TimeoutBehavior } from '../catalog/types.js';
import { validateSequence } from '../catalog/validate.js';
import type { CommandContext, TelemetryReader } from '../commands/command.js';
import type { CommandRegistry } from '../commands/registry.js';
import { AsyncQueue, withDeadline } from '../core/async.js';
import { DEFAULT_COMMAND_TIMING, type CommandTiming } from '../core/config.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { CancellationError, toErrorMessage } from '../types/errors.js';
import {
  failed,
  type CommandExecution,
  type CommandRequest,
  type CommandResult,
  type ValidatedCommand,
} from '../types/models.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface CommandRunnerConfig {
  /** Added to each command's catalog timeout before the attempt is aborted (ms). */
  attemptGraceMs: number;
  timing: CommandTiming;
}

export const DEFAULT_COMMAND_RUNNER_CONFIG: CommandRunnerConfig = {
  attemptGraceMs: 1_000,
  timing: DEFAULT_COMMAND_TIMING,
};

// ---------------------------------------------------------------------------
// Sequences and reports
// ---------------------------------------------------------------------------

export interface QueuedSequence {
  id: string;
  commands: readonly ValidatedCommand[];
  /** One per command, same order */
  executions: readonly CommandExecution[];
}

export const SEQUENCE_OUTCOMES = [
  'completed',
  'completed_with_failures',
  'aborted',
  'failsafe_failed',
  'cancelled',
] as const;

export type SequenceOutcome = (typeof SEQUENCE_OUTCOMES)[number];

export interface FailsafeReport {
  action: FailsafeAction;
  /** Command whose failure triggered it */
  trigger: string;
  success: boolean;
  error?: string;
}

export interface SequenceReport {
  sequenceId: string;
  outcome: SequenceOutcome;
  executions: readonly CommandExecution[];
  failsafe?: FailsafeReport;
  startedAt: number;
  completedAt: number;
}

/** What to do with the rest of the sequence after a command has failed. */
type Escalation = 'continue' | 'abort' | 'failsafe';

const SEVERITY: Record<Escalation, number> = { continue: 0, abort: 1, failsafe: 2 };

function escalationFor(spec: CommandSpec, result: CommandResult): Escalation {
  const fromCriticality: Escalation = spec.metadata.critical
    ? spec.metadata.failsafe
      ? 'failsafe'
      : 'abort'
    : 'continue';
  if (result.code !== 'timeout') return fromCriticality;
  const fromTimeout: TimeoutBehavior = spec.metadata.timeout_behavior;
  return SEVERITY[fromTimeout] > SEVERITY[fromCriticality] ? fromTimeout : fromCriticality;
}

// ---------------------------------------------------------------------------
// CommandRunner
// ---------------------------------------------------------------------------

export class CommandRunner {
  readonly config: CommandRunnerConfig;
  private readonly backend: VehicleBackend;
  private readonly registry: CommandRegistry;
  private readonly telemetry: TelemetryReader;
  private readonly logger: Logger;

  private readonly queue = new AsyncQueue<QueuedSequence>();
  private readonly executions = new Map<string, CommandExecution>();
  private readonly sequences = new Map<string, string[]>();
  private sequenceCounter = 0;

  private _current: CommandExecution | null = null;
  /** Aborts the sequence in flight */
  private sequenceController: AbortController | null = null;
  private stopController: AbortController | null = null;
  private loop: Promise<void> | null = null;

  /** Called once per finished sequence, whatever its outcome. */
  onSequenceComplete?: (report: SequenceReport) => void;

  constructor(
    backend: VehicleBackend,
    registry: CommandRegistry,
    telemetry: TelemetryReader,
    config: Partial<CommandRunnerConfig> = {},
    logger: Logger = silentLogger,
  ) {
    this.backend = backend;
    this.registry = registry;
    this.telemetry = telemetry;
    this.config = { ...DEFAULT_COMMAND_RUNNER_CONFIG, ...config };
    this.logger = logger;
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.stopController = controller;
    this.loop = this.run(controller.signal);
    this.logger.info('runner_started');
  }

  /** Cancel the sequence in flight and everything queued, then wait for the loop to exit. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.cancelQueued('runner stopped');
    this.cancelCurrent();
    this.stopController?.abort();
    await loop;
    this.loop = null;
    this.stopController = null;
    this.logger.info('runner_stopped');
  }

  // -----------------------------------------------------------------------
  // Submission and inspection
  // -----------------------------------------------------------------------

  /**
   * Validate a sequence and queue it. Nothing is queued unless every
   * command passes validation.
   *
   * @throws ValidationError listing every problem in the sequence
   */
  enqueue(requests: readonly CommandRequest[]): QueuedSequence {
    const sequence = this.prepare(requests);
    this.queue.push(sequence);
    this.logger.info('sequence_queued', {
      sequenceId: sequence.id,
      commands: sequence.commands.map((c) => c.name).join(','),
    });
    return sequence;
  }

  /** Validate and register executions without queuing. Exposed for testing. */
  prepare(requests: readonly CommandRequest[]): QueuedSequence {
    const commands = validateSequence(this.registry.catalog, requests);
    const id = `seq-${Date.now()}-${++this.sequenceCounter}`;
    const createdAt = Date.now();
    const executions = requests.map(
      (request, index): CommandExecution => ({
        id: `${id}-${index}`,
        sequenceId: id,
        index,
        request,
        status: 'pending',
        attempts: 0,
        createdAt,
      }),
    );
    for (const execution of executions) this.executions.set(execution.id, execution);
    this.sequences.set(id, executions.map((execution) => execution.id));

    return { id, commands, executions };
  }

  // Lookups hand out copies; the records stay owned by the runner.

  getExecution(id: string): CommandExecution | null {
    const execution = this.executions.get(id);
    return execution ? structuredClone(execution) : null;
  }

  getSequenceExecutions(sequenceId: string): CommandExecution[] {
    const ids = this.sequences.get(sequenceId) ?? [];
    return ids.flatMap((id) => {
      const execution = this.executions.get(id);
      return execution ? [structuredClone(execution)] : [];
    });
  }

  get currentExecution(): CommandExecution | null {
    return this._current ? structuredClone(this._current) : null;
  }

  /** Sequences waiting behind the one in flight. */
  get queueDepth(): number {
    return this.queue.size;
  }

  /** Abort the sequence in flight. Returns false when nothing is running. */
  cancelCurrent(): boolean {
    const controller = this.sequenceController;
    if (!controller || controller.signal.aborted) return false;
    controller.abort(new CancellationError('sequence cancelled'));
    return true;
  }

  /** Drop every queued sequence, marking its executions cancelled. */
  cancelQueued(reason: string): QueuedSequence[] {
    const dropped = this.queue.drain();
    for (const sequence of dropped) {
      this.skipFrom(sequence, 0, `Sequence cancelled before it started: ${reason}`);
      this.logger.warn('sequence_dropped', { sequenceId: sequence.id, reason });
    }
    return dropped;
  }

  // -----------------------------------------------------------------------
  // Execution
  // -----------------------------------------------------------------------

  /** Drive one sequence to its end. Exposed for testing; the loop calls it for queued sequences. */
  async executeSequence(sequence: QueuedSequence, parent?: AbortSignal): Promise<SequenceReport> {
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parent?.reason);
    if (parent?.aborted) onParentAbort();
    parent?.addEventListener('abort', onParentAbort, { once: true });
    this.sequenceController = controller;

    const startedAt = Date.now();
    let outcome: SequenceOutcome = 'completed';
    let failsafe: FailsafeReport | undefined;
    this.logger.info('sequence_started', { sequenceId: sequence.id, length: sequence.commands.length });

    try {
      for (let index = 0; index < sequence.commands.length; index++) {
        const command = sequence.commands[index];
        const execution = sequence.executions[index];
        if (!command || !execution) break;

        if (controller.signal.aborted) {
          outcome = 'cancelled';
          this.skipFrom(sequence, index, 'Sequence cancelled before this command ran');
          break;
        }

        let spec: CommandSpec;
        let result: CommandResult;
        try {
          spec = this.registry.spec(command.name);
          result = await this.runCommand(execution, command, spec, controller.signal);
        } catch (err) {
          this.logger.error('unexpected_fault', { command: command.name, error: toErrorMessage(err) });
          this.finish(
            execution,
            failed('execution', `${command.name} hit an unexpected fault: ${toErrorMessage(err)}`, {
              error: toErrorMessage(err),
            }),
          );
          failsafe = await this.runFailsafe('land', command.name);
          outcome = failsafe.success ? 'aborted' : 'failsafe_failed';
          this.skipFrom(sequence, index + 1, `Skipped: ${command.name} hit an unexpected fault`);
          break;
        }

        if (result.success) continue;

        if (result.code === 'cancelled' && controller.signal.aborted) {
          outcome = 'cancelled';
          this.skipFrom(sequence, index + 1, 'Sequence cancelled before this command ran');
          break;
        }

        const escalation = escalationFor(spec, result);
        this.logger.error('command_failed', {
          command: command.name,
          code: result.code,
          critical: spec.metadata.critical,
          escalation,
        });
        if (escalation === 'continue') {
          outcome = 'completed_with_failures';
          continue;
        }
        if (escalation === 'failsafe') {
          failsafe = await this.runFailsafe(spec.metadata.failsafe ?? 'land', command.name);
          outcome = failsafe.success ? 'aborted' : 'failsafe_failed';
        } else {
          outcome = 'aborted';
        }
        this.skipFrom(sequence, index + 1, `Skipped: ${command.name} failed`);
        break;
      }
    } finally {
      parent?.removeEventListener('abort', onParentAbort);
      this.sequenceController = null;
      this._current = null;
    }

    if (outcome === 'failsafe_failed') {
      this.backend.latchEmergency(`failsafe ${failsafe?.action ?? 'land'} failed: ${failsafe?.error ?? 'unknown'}`);
      this.cancelQueued('failsafe failed');
    }

    const report: SequenceReport = {
      sequenceId: sequence.id,
      outcome,
      executions: sequence.executions,
      startedAt,
      completedAt: Date.now(),
      ...(failsafe ? { failsafe } : {}),
    };
    const fields = { sequenceId: sequence.id, outcome, durationMs: report.completedAt - startedAt };
    if (outcome === 'completed') {
      this.logger.info('sequence_finished', fields);
    } else {
      this.logger.warn('sequence_finished', fields);
    }
    this.onSequenceComplete?.(report);
    return report;
  }

  /** The attempt loop for one command. Returns the aggregated result. */
  private async runCommand(
    execution: CommandExecution,
    command: ValidatedCommand,
    spec: CommandSpec,
    signal: AbortSignal,
  ): Promise<CommandResult> {
    execution.status = 'running';
    execution.startedAt = Date.now();
    this._current = execution;

    const maxAttempts = spec.metadata.max_retries + 1;
    let result: CommandResult = failed('execution', `${command.name} never ran`);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      execution.attempts = attempt;
      if (attempt > 1) this.logger.warn('command_retry', { command: command.name, attempt, maxAttempts });
      this.logger.info('command_started', { command: command.name, executionId: execution.id, attempt });

      result = await this.attempt(command, spec, signal);
      if (result.success) break;
      this.logger.warn('attempt_failed', {
        command: command.name,
        attempt,
        code: result.code,
        message: result.message,
      });
      if (signal.aborted || result.code === 'validation') break;
    }

    this.finish(execution, result);
    return result;
  }

  /** One attempt on a fresh instance, bounded by the catalog timeout. */
  private async attempt(command: ValidatedCommand, spec: CommandSpec, signal: AbortSignal): Promise<CommandResult> {
    const instance = this.registry.create(command);
    const timeoutMs = spec.implementation.timeout * 1000 + this.config.attemptGraceMs;

    const { value, timedOut } = await withDeadline(
      async (attemptSignal) => {
        const ctx: CommandContext = {
          backend: this.backend,
          telemetry: this.telemetry,
          signal: attemptSignal,
          logger: this.logger.child(command.name),
          timing: this.config.timing,
        };
        try {
          return await instance.run(ctx);
        } catch (err) {
          this.logger.error('attempt_raised', { command: command.name, error: toErrorMessage(err) });
          return failed('execution', `${command.name} raised an unexpected error: ${toErrorMessage(err)}`, {
            error: toErrorMessage(err),
          });
        }
      },
      timeoutMs,
      signal,
    );
    if (timedOut) this.logger.warn('attempt_deadline', { command: command.name, timeoutMs });
    return value;
  }

  /** One-shot failsafe call. Never retried, never throws. */
  private async runFailsafe(action: FailsafeAction, trigger: string): Promise<FailsafeReport> {
    this.logger.error('failsafe_triggered', { action, trigger });
    try {
      switch (action) {
        case 'land':
          await this.backend.land();
          break;
        case 'rtl':
          await this.backend.returnToLaunch();
          break;
        case 'emergency_stop':
          await this.backend.emergencyStop();
          break;
      }
      return { action, trigger, success: true };
    } catch (err) {
      this.logger.error('failsafe_failed', { action, trigger, error: toErrorMessage(err) });
      return { action, trigger, success: false, error: toErrorMessage(err) };
    }
  }

  // -----------------------------------------------------------------------
  // Bookkeeping
  // -----------------------------------------------------------------------

  private finish(execution: CommandExecution, result: CommandResult): void {
    execution.status = result.success ? 'succeeded' : result.code === 'cancelled' ? 'cancelled' : 'failed';
    execution.result = result;
    execution.completedAt = Date.now();
  }

  /** Mark every execution from `index` on as cancelled. */
  private skipFrom(sequence: QueuedSequence, index: number, message: string): void {
    for (const execution of sequence.executions.slice(index)) {
      if (execution.status !== 'pending') continue;
      this.finish(execution, failed('cancelled', message));
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    for (;;) {
      let sequence: QueuedSequence;
      try {
        sequence = await this.queue.take(signal);
      } catch (err) {
        if (err instanceof CancellationError) return;
        throw err;
      }
      try {
        await this.executeSequence(sequence, signal);
      } catch (err) {
        this.logger.error('sequence_crashed', { sequenceId: sequence.id, error: toErrorMessage(err) });
        this.skipFrom(sequence, 0, `Sequence crashed: ${toErrorMessage(err)}`);
      }
    }
  }
}
