/**
 * Skyhand Agent — Command Catalog Types
 *
 * Schema for command records. Files in catalog/commands/ conform to the
 * CommandSpec interface (snake_case keys as written on disk).
 */

import type { ParamValue } from '../types/models.js';

// ---------------------------------------------------------------------------
// Parameter schema
// ---------------------------------------------------------------------------

export const PARAM_TYPES = ['float', 'int', 'bool', 'string'] as const;

export type ParamType = (typeof PARAM_TYPES)[number];

export interface ParamConstraints {
  min?: number;
  max?: number;
  /** Informational only */
  unit?: string;
}

export interface ParameterSpec {
  type: ParamType;
  /** Applied when the request omits the parameter */
  default?: ParamValue;
  /** Must be supplied when there is no default */
  required?: boolean;
  /** Allowed values for string parameters */
  enum?: string[];
  constraints?: ParamConstraints;
  description?: string;
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

export const FAILSAFE_ACTIONS = ['land', 'rtl', 'emergency_stop'] as const;

export type FailsafeAction = (typeof FAILSAFE_ACTIONS)[number];

/** What a timeout means for the rest of the sequence. */
export const TIMEOUT_BEHAVIORS = ['continue', 'abort', 'failsafe'] as const;

export type TimeoutBehavior = (typeof TIMEOUT_BEHAVIORS)[number];

export interface CommandMetadata {
  /** Exhausted retries abort the sequence */
  critical: boolean;
  /** Action taken when a critical command fails; null for none */
  failsafe: FailsafeAction | null;
  /** Extra attempts after the first */
  max_retries: number;
  timeout_behavior: TimeoutBehavior;
}

export interface CommandImplementation {
  /** Upper bound for a single attempt (s), enforced by the runner */
  timeout: number;
}

// ---------------------------------------------------------------------------
// Command record and catalog
// ---------------------------------------------------------------------------

export interface CommandSpec {
  /** Unique key */
  name: string;
  version: string;
  description: string;
  category: string;
  parameters: Record<string, ParameterSpec>;
  metadata: CommandMetadata;
  implementation: CommandImplementation;
}

/** Loaded once at startup, read-only afterwards. */
export interface CommandCatalog {
  specs: ReadonlyMap<string, CommandSpec>;
}
