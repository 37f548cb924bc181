/**
 * Skyhand Agent — Command Validation
 *
 * Turns a raw CommandRequest into a ValidatedCommand against its catalog
 * record. Pure: no backend access, no side effects. Values are checked,
 * never coerced; the string "10" is not a float.
 */

import { ValidationError } from '../types/errors.js';
import type { CommandParams, CommandRequest, ParamValue, ValidatedCommand } from '../types/models.js';
import { lookupSpec } from './lookup.js';
import type { CommandCatalog, CommandSpec, ParameterSpec } from './types.js';

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value === null) return 'null';
  if (typeof value === 'object') return Array.isArray(value) ? 'a list' : 'an object';
  return String(value);
}

/**
 * Check one value against its parameter spec.
 * Returns the typed value, or an issue string.
 */
export function checkParam(
  name: string,
  spec: ParameterSpec,
  value: unknown,
): { value: ParamValue } | { issue: string } {
  switch (spec.type) {
    case 'float':
    case 'int': {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return { issue: `${name}: expected ${spec.type}, got ${describeValue(value)}` };
      }
      if (spec.type === 'int' && !Number.isInteger(value)) {
        return { issue: `${name}: expected int, got ${value}` };
      }
      const { min, max } = spec.constraints ?? {};
      if (min !== undefined && value < min) return { issue: `${name}: ${value} is below the minimum ${min}` };
      if (max !== undefined && value > max) return { issue: `${name}: ${value} is above the maximum ${max}` };
      return { value };
    }
    case 'bool':
      if (typeof value !== 'boolean') {
        return { issue: `${name}: expected bool, got ${describeValue(value)}` };
      }
      return { value };
    case 'string':
      if (typeof value !== 'string') {
        return { issue: `${name}: expected string, got ${describeValue(value)}` };
      }
      if (spec.enum && !spec.enum.includes(value)) {
        return { issue: `${name}: "${value}" is not one of ${spec.enum.join(', ')}` };
      }
      return { value };
  }
}

/**
 * Validate raw parameters against a spec.
 * Defaults fill omitted parameters; every issue is collected.
 */
export function validateParams(
  spec: CommandSpec,
  raw: Record<string, unknown> = {},
): { params: CommandParams; issues: string[] } {
  const params: Record<string, ParamValue> = {};
  const issues: string[] = [];

  for (const key of Object.keys(raw)) {
    if (!Object.hasOwn(spec.parameters, key)) {
      issues.push(`${key}: unknown parameter for "${spec.name}"`);
    }
  }

  for (const [name, paramSpec] of Object.entries(spec.parameters)) {
    const supplied = raw[name];
    if (supplied === undefined || supplied === null) {
      if (paramSpec.default !== undefined) {
        params[name] = paramSpec.default;
      } else if (paramSpec.required) {
        issues.push(`${name}: required parameter missing`);
      }
      continue;
    }
    const checked = checkParam(name, paramSpec, supplied);
    if ('issue' in checked) {
      issues.push(checked.issue);
    } else {
      params[name] = checked.value;
    }
  }

  return { params, issues };
}

// ---------------------------------------------------------------------------
// Cross-parameter rules
// ---------------------------------------------------------------------------

/** Checks that span parameters, run on the defaulted values. */
export type CrossParamCheck = (params: CommandParams) => string[];

const given = (params: CommandParams, name: string): boolean => params[name] !== undefined;

function pairedTogether(params: CommandParams, a: string, b: string): string[] {
  return given(params, a) === given(params, b) ? [] : [`${a} and ${b} must be given together`];
}

function checkOrbitParams(params: CommandParams): string[] {
  const issues: string[] = [];
  const lengths = [given(params, 'duration'), given(params, 'loops'), params.continuous === true];
  if (lengths.filter(Boolean).length > 1) {
    issues.push('only one of duration, loops or continuous may be given');
  }
  const hasLocal = given(params, 'center_north') || given(params, 'center_east');
  const hasGlobal = given(params, 'center_lat') || given(params, 'center_lon');
  if (hasLocal && hasGlobal) {
    issues.push('the orbit centre must be given in one frame only');
  }
  issues.push(...pairedTogether(params, 'center_north', 'center_east'));
  issues.push(...pairedTogether(params, 'center_lat', 'center_lon'));
  return issues;
}

export const CROSS_PARAM_CHECKS: Readonly<Partial<Record<string, CrossParamCheck>>> = {
  orbit: checkOrbitParams,
};

/** @throws ValidationError listing every problem with the request */
export function validateCommand(catalog: CommandCatalog, request: CommandRequest): ValidatedCommand {
  const spec = lookupSpec(catalog, request.name);
  if (!spec) {
    throw new ValidationError([`unknown command "${request.name}"`]);
  }
  const { params, issues } = validateParams(spec, request.params);
  if (issues.length > 0) {
    throw new ValidationError(issues.map((issue) => `${spec.name}.${issue}`));
  }
  const crossCheck = CROSS_PARAM_CHECKS[spec.name];
  const crossIssues = crossCheck ? crossCheck(params) : [];
  if (crossIssues.length > 0) {
    throw new ValidationError(crossIssues.map((issue) => `${spec.name}: ${issue}`));
  }
  return { name: spec.name, params };
}

/**
 * Validate a whole sequence before anything is queued.
 * @throws ValidationError with issues prefixed by the command's position
 */
export function validateSequence(
  catalog: CommandCatalog,
  requests: readonly CommandRequest[],
): ValidatedCommand[] {
  if (requests.length === 0) {
    throw new ValidationError(['sequence is empty']);
  }
  const validated: ValidatedCommand[] = [];
  const issues: string[] = [];
  requests.forEach((request, index) => {
    try {
      validated.push(validateCommand(catalog, request));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      issues.push(...err.issues.map((issue) => `[${index}] ${issue}`));
    }
  });
  if (issues.length > 0) throw new ValidationError(issues);
  return validated;
}
