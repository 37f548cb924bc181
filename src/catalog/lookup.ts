/**
 * Skyhand Agent — Command Catalog Loading & Lookup
 *
 * Reads every `*.command.json` record from the catalog directory, checks
 * the shape of each field and indexes the result by command name. Unknown
 * keys are ignored so records can carry documentation fields.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigurationError } from '../types/errors.js';
import type { ParamValue } from '../types/models.js';
import {
  FAILSAFE_ACTIONS,
  PARAM_TYPES,
  TIMEOUT_BEHAVIORS,
  type CommandCatalog,
  type CommandMetadata,
  type CommandSpec,
  type FailsafeAction,
  type ParamConstraints,
  type ParameterSpec,
  type ParamType,
  type TimeoutBehavior,
} from './types.js';

// ---------------------------------------------------------------------------
// Field checks
// ---------------------------------------------------------------------------

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const ensureRecord = (value: unknown, path: string): Record<string, unknown> => {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`);
  }
  return value;
};

const ensureFiniteNumber = (value: unknown, path: string): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${path} must be numeric`);
  }
  return value;
};

const ensureCount = (value: unknown, path: string): number => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${path} must be a non-negative integer`);
  }
  return value;
};

const ensureNonEmptyString = (value: unknown, path: string): string => {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigurationError(`${path} must be a non-empty string`);
  }
  return value;
};

const optionalString = (value: unknown, path: string): string | undefined =>
  value === undefined ? undefined : ensureNonEmptyString(value, path);

const optionalNumber = (value: unknown, path: string): number | undefined =>
  value === undefined ? undefined : ensureFiniteNumber(value, path);

const ensureBoolean = (value: unknown, path: string): boolean => {
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${path} must be true|false`);
  }
  return value;
};

const ensureOneOf = <T extends string>(allowed: readonly T[], value: unknown, path: string): T => {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(`${path} must be ${allowed.join('|')}`);
  }
  return match;
};

const ensureParamValue = (value: unknown, path: string): ParamValue => {
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  throw new ConfigurationError(`${path} must be a number, boolean or string`);
};

const ensureStringList = (value: unknown, path: string): string[] => {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigurationError(`${path} must be a non-empty list`);
  }
  return value.map((item, i) => ensureNonEmptyString(item, `${path}[${i}]`));
};

// ---------------------------------------------------------------------------
// Record parsing
// ---------------------------------------------------------------------------

function parseConstraints(value: unknown, path: string): ParamConstraints | undefined {
  if (value === undefined) return undefined;
  const raw = ensureRecord(value, path);
  const constraints: ParamConstraints = {};
  const min = optionalNumber(raw.min, `${path}.min`);
  const max = optionalNumber(raw.max, `${path}.max`);
  const unit = optionalString(raw.unit, `${path}.unit`);
  if (min !== undefined) constraints.min = min;
  if (max !== undefined) constraints.max = max;
  if (unit !== undefined) constraints.unit = unit;
  return constraints;
}

function parseParameter(value: unknown, path: string): ParameterSpec {
  const raw = ensureRecord(value, path);
  const type: ParamType = ensureOneOf(PARAM_TYPES, raw.type, `${path}.type`);
  const spec: ParameterSpec = { type };
  if (raw.default !== undefined) spec.default = ensureParamValue(raw.default, `${path}.default`);
  if (raw.required !== undefined) spec.required = ensureBoolean(raw.required, `${path}.required`);
  if (raw.enum !== undefined) spec.enum = ensureStringList(raw.enum, `${path}.enum`);
  const constraints = parseConstraints(raw.constraints, `${path}.constraints`);
  if (constraints) spec.constraints = constraints;
  const description = optionalString(raw.description, `${path}.description`);
  if (description !== undefined) spec.description = description;
  return spec;
}

function parseMetadata(value: unknown, path: string): CommandMetadata {
  const raw = ensureRecord(value, path);
  const failsafe: FailsafeAction | null =
    raw.failsafe === null || raw.failsafe === undefined
      ? null
      : ensureOneOf(FAILSAFE_ACTIONS, raw.failsafe, `${path}.failsafe`);
  const timeoutBehavior: TimeoutBehavior =
    raw.timeout_behavior === undefined
      ? 'continue'
      : ensureOneOf(TIMEOUT_BEHAVIORS, raw.timeout_behavior, `${path}.timeout_behavior`);
  return {
    critical: ensureBoolean(raw.critical, `${path}.critical`),
    failsafe,
    max_retries: ensureCount(raw.max_retries ?? 0, `${path}.max_retries`),
    timeout_behavior: timeoutBehavior,
  };
}

/**
 * Parse one command record. Throws ConfigurationError naming the first
 * offending field path.
 */
export function parseCommandSpec(value: unknown, source = 'command'): CommandSpec {
  const raw = ensureRecord(value, source);
  const name = ensureNonEmptyString(raw.name, `${source}.name`);
  const path = `${source}(${name})`;

  const parametersRaw = raw.parameters === undefined ? {} : ensureRecord(raw.parameters, `${path}.parameters`);
  const parameters: Record<string, ParameterSpec> = {};
  for (const [param, spec] of Object.entries(parametersRaw)) {
    parameters[param] = parseParameter(spec, `${path}.parameters.${param}`);
  }

  const implementation = ensureRecord(raw.implementation, `${path}.implementation`);

  return {
    name,
    version: ensureNonEmptyString(raw.version, `${path}.version`),
    description: optionalString(raw.description, `${path}.description`) ?? '',
    category: optionalString(raw.category, `${path}.category`) ?? 'general',
    parameters,
    metadata: parseMetadata(raw.metadata, `${path}.metadata`),
    implementation: { timeout: ensureFiniteNumber(implementation.timeout, `${path}.implementation.timeout`) },
  };
}

// ---------------------------------------------------------------------------
// Catalog Loading
// ---------------------------------------------------------------------------

/**
 * Load the command catalog from disk.
 *
 * @param catalogDir — directory holding `*.command.json` files
 * @throws ConfigurationError on unreadable JSON, malformed records or duplicate names
 */
export function loadCatalog(catalogDir: string): CommandCatalog {
  const specs = new Map<string, CommandSpec>();

  const files = readdirSync(catalogDir)
    .filter((f) => f.endsWith('.command.json'))
    .sort();

  for (const file of files) {
    const raw = readFileSync(join(catalogDir, file), 'utf-8');
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new ConfigurationError(`${file}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }
    const spec = parseCommandSpec(data, file);
    if (specs.has(spec.name)) {
      throw new ConfigurationError(`${file}: duplicate command name "${spec.name}"`);
    }
    specs.set(spec.name, spec);
  }

  return { specs };
}

/** Build a catalog from already-parsed records. */
export function catalogFromSpecs(list: readonly CommandSpec[]): CommandCatalog {
  const specs = new Map<string, CommandSpec>();
  for (const spec of list) {
    if (specs.has(spec.name)) {
      throw new ConfigurationError(`duplicate command name "${spec.name}"`);
    }
    specs.set(spec.name, spec);
  }
  return { specs };
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

/** @returns The record, or null if the catalog has no command by that name */
export function lookupSpec(catalog: CommandCatalog, name: string): CommandSpec | null {
  return catalog.specs.get(name) ?? null;
}

export function commandNames(catalog: CommandCatalog): string[] {
  return Array.from(catalog.specs.keys()).sort();
}
