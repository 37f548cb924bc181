/**
 * Skyhand Agent — Catalog Validation Script
 *
 * Checks the command catalog for internal consistency.
 * Can be run standalone or imported as a library.
 *
 * Usage:
 *   npx tsx scripts/validate-catalog.ts [catalogDir]
 *
 * Checks (errors):
 *   - Every catalog command has an implementation, and every implementation a record
 *   - Defaults match the declared type and lie within bounds
 *   - Constraint min is not above max
 *   - Enums only appear on string parameters
 *   - implementation.timeout is positive and above the largest timeout/duration a request may ask for
 *   - max_retries is a non-negative integer
 *
 * Checks (warnings):
 *   - Critical command without a failsafe
 *   - Non-critical command with a failsafe (never used)
 *   - Parameter both required and defaulted
 */

import { DEFAULT_CATALOG_DIR } from '../src/core/config.js';
import { loadCatalog } from '../src/catalog/lookup.js';
import type { CommandCatalog, CommandSpec } from '../src/catalog/types.js';
import { checkParam } from '../src/catalog/validate.js';
import { COMMAND_NAMES } from '../src/commands/command.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/** Parameters whose value bounds how long a single attempt may legitimately run. */
const DURATION_PARAMS = ['timeout', 'duration'];

// ---------------------------------------------------------------------------
// Per-command checks
// ---------------------------------------------------------------------------

function checkParameters(spec: CommandSpec, errors: string[], warnings: string[]): void {
  for (const [param, paramSpec] of Object.entries(spec.parameters)) {
    const where = `Command "${spec.name}" parameter "${param}"`;
    const { min, max } = paramSpec.constraints ?? {};

    if (min !== undefined && max !== undefined && min > max) {
      errors.push(`${where}: min ${min} is above max ${max}.`);
    }

    if (paramSpec.enum && paramSpec.type !== 'string') {
      errors.push(`${where}: enum is only allowed on string parameters, not ${paramSpec.type}.`);
    }

    if (paramSpec.default !== undefined) {
      const checked = checkParam(param, paramSpec, paramSpec.default);
      if ('issue' in checked) {
        errors.push(`${where}: default is invalid (${checked.issue}).`);
      }
      if (paramSpec.required) {
        warnings.push(`${where}: marked required but has a default; the default is never used.`);
      }
    }

    if (DURATION_PARAMS.includes(param) && max !== undefined && max >= spec.implementation.timeout) {
      errors.push(
        `${where}: max ${max}s is not below implementation.timeout ${spec.implementation.timeout}s, ` +
          'so the runner could cut a valid request short.',
      );
    }
  }
}

function checkMetadata(spec: CommandSpec, errors: string[], warnings: string[]): void {
  const { critical, failsafe, max_retries: maxRetries } = spec.metadata;
  const where = `Command "${spec.name}"`;

  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    errors.push(`${where}: max_retries must be a non-negative integer, got ${maxRetries}.`);
  }

  if (spec.implementation.timeout <= 0) {
    errors.push(`${where}: implementation.timeout must be positive, got ${spec.implementation.timeout}.`);
  }

  if (critical && failsafe === null) {
    warnings.push(`${where}: critical but declares no failsafe; a failure aborts the sequence with the vehicle where it is.`);
  }

  if (!critical && failsafe !== null) {
    warnings.push(`${where}: failsafe "${failsafe}" is ignored because the command is not critical.`);
  }
}

// ---------------------------------------------------------------------------
// Core Validation
// ---------------------------------------------------------------------------

/**
 * Validate a loaded CommandCatalog against itself and the implemented commands.
 * Returns errors (must fix) and warnings (informational).
 */
export function validateCatalog(
  catalog: CommandCatalog,
  implemented: readonly string[] = COMMAND_NAMES,
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const [name, spec] of catalog.specs) {
    if (!implemented.includes(name)) {
      errors.push(`Command "${name}": no implementation is registered for it.`);
    }
    checkParameters(spec, errors, warnings);
    checkMetadata(spec, errors, warnings);
  }

  for (const name of implemented) {
    if (!catalog.specs.has(name)) {
      errors.push(`Command "${name}": implemented but missing from the catalog.`);
    }
  }

  return { errors, warnings };
}

/**
 * Load a catalog from disk and validate it.
 * Convenience wrapper combining loadCatalog + validateCatalog.
 */
export function loadAndValidate(catalogDir: string): ValidationResult {
  return validateCatalog(loadCatalog(catalogDir));
}

// ---------------------------------------------------------------------------
// CLI Entry Point
// ---------------------------------------------------------------------------

const isMainModule =
  typeof process !== 'undefined' &&
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith('validate-catalog.ts') || process.argv[1].endsWith('validate-catalog.js'));

if (isMainModule) {
  const catalogDir = process.argv[2] || DEFAULT_CATALOG_DIR;

  console.log(`Validating catalog at: ${catalogDir}\n`);

  try {
    const result = loadAndValidate(catalogDir);

    if (result.errors.length > 0) {
      console.log(`ERRORS (${result.errors.length}):`);
      for (const err of result.errors) {
        console.log(`  [ERROR] ${err}`);
      }
      console.log();
    }

    if (result.warnings.length > 0) {
      console.log(`WARNINGS (${result.warnings.length}):`);
      for (const warn of result.warnings) {
        console.log(`  [WARN]  ${warn}`);
      }
      console.log();
    }

    if (result.errors.length === 0 && result.warnings.length === 0) {
      console.log('Catalog is valid with no errors or warnings.');
    } else if (result.errors.length === 0) {
      console.log(`Catalog is valid with ${result.warnings.length} warning(s).`);
    } else {
      console.log(`Catalog has ${result.errors.length} error(s) and ${result.warnings.length} warning(s).`);
      process.exit(1);
    }
  } catch (err) {
    console.error('Failed to load catalog:', err);
    process.exit(2);
  }
}
