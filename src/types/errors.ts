/**
 * Skyhand Agent — Errors
 *
 * Hard failures. Soft command failures travel as CommandResult values;
 * these classes cover rejected input, protocol faults and cancellation.
 */

export type ErrorCode =
  | 'connection'
  | 'validation'
  | 'backend'
  | 'execution'
  | 'cancelled'
  | 'timeout'
  | 'configuration';

export class SkyhandError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Link establishment failed, or the link was lost. */
export class ConnectionError extends SkyhandError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connection', message, options);
  }
}

/** Bad command name or parameters. Never reaches the backend, never retried. */
export class ValidationError extends SkyhandError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('validation', issues.join('; '));
    this.issues = issues;
  }
}

/** The vehicle rejected a command, or an acknowledgment never came. */
export class BackendError extends SkyhandError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('backend', message, options);
  }
}

export class ExecutionError extends SkyhandError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('execution', message, options);
  }
}

/** A cooperative cancel was observed. */
export class CancellationError extends SkyhandError {
  constructor(message = 'operation cancelled') {
    super('cancelled', message);
  }
}

export class TimeoutError extends SkyhandError {
  constructor(message: string) {
    super('timeout', message);
  }
}

/** Catalog, registry or environment misconfiguration found at startup. */
export class ConfigurationError extends SkyhandError {
  constructor(message: string) {
    super('configuration', message);
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
