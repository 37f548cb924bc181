import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { catalogFromSpecs, commandNames, loadCatalog, lookupSpec, parseCommandSpec } from './lookup.js';
import { DEFAULT_CATALOG_DIR } from '../core/config.js';
import { ConfigurationError } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Test Helpers
// ---------------------------------------------------------------------------

function makeRecord(name: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name,
    version: '1.0.0',
    description: `Test command ${name}`,
    category: 'test',
    parameters: {
      altitude: { type: 'float', default: 10, constraints: { min: 1, max: 50, unit: 'm' } },
    },
    metadata: { critical: false, failsafe: null, max_retries: 0, timeout_behavior: 'continue' },
    implementation: { timeout: 30 },
    ...overrides,
  };
}

function writeCatalog(records: Record<string, unknown>): string {
  const dir = mkdtempSync(join(tmpdir(), 'skyhand-catalog-'));
  for (const [file, content] of Object.entries(records)) {
    writeFileSync(join(dir, file), typeof content === 'string' ? content : JSON.stringify(content));
  }
  return dir;
}

// ---------------------------------------------------------------------------
// loadCatalog
// ---------------------------------------------------------------------------

describe('loadCatalog', () => {
  it('indexes every *.command.json record by name', () => {
    const dir = writeCatalog({
      'climb.command.json': makeRecord('climb'),
      'hover.command.json': makeRecord('hover'),
      'README.md': '# not a record',
    });
    const catalog = loadCatalog(dir);
    expect(commandNames(catalog)).toEqual(['climb', 'hover']);
    expect(lookupSpec(catalog, 'climb')?.parameters.altitude).toEqual({
      type: 'float',
      default: 10,
      constraints: { min: 1, max: 50, unit: 'm' },
    });
  });

  it('rejects duplicate names', () => {
    const dir = writeCatalog({
      'a.command.json': makeRecord('climb'),
      'b.command.json': makeRecord('climb'),
    });
    expect(() => loadCatalog(dir)).toThrow('b.command.json: duplicate command name "climb"');
  });

  it('rejects malformed JSON with the file name', () => {
    const dir = writeCatalog({ 'broken.command.json': '{ "name": ' });
    expect(() => loadCatalog(dir)).toThrow(ConfigurationError);
    expect(() => loadCatalog(dir)).toThrow(/^broken\.command\.json: invalid JSON/);
  });

  it('loads the shipped catalog', () => {
    const catalog = loadCatalog(DEFAULT_CATALOG_DIR);
    expect(commandNames(catalog)).toEqual(['goto', 'land', 'orbit', 'rtl', 'takeoff', 'wait']);
    const takeoff = lookupSpec(catalog, 'takeoff');
    expect(takeoff?.metadata).toEqual({
      critical: true,
      failsafe: 'land',
      max_retries: 1,
      timeout_behavior: 'failsafe',
    });
  });
});

// ---------------------------------------------------------------------------
// parseCommandSpec
// ---------------------------------------------------------------------------

describe('parseCommandSpec', () => {
  it('fills optional fields', () => {
    const spec = parseCommandSpec({
      name: 'noop',
      version: '0.1.0',
      metadata: { critical: false },
      implementation: { timeout: 5 },
    });
    expect(spec).toEqual({
      name: 'noop',
      version: '0.1.0',
      description: '',
      category: 'general',
      parameters: {},
      metadata: { critical: false, failsafe: null, max_retries: 0, timeout_behavior: 'continue' },
      implementation: { timeout: 5 },
    });
  });

  it('names the offending field path', () => {
    expect(() =>
      parseCommandSpec(makeRecord('climb', { parameters: { altitude: { type: 'double' } } }), 'climb.command.json'),
    ).toThrow('climb.command.json(climb).parameters.altitude.type must be float|int|bool|string');

    expect(() =>
      parseCommandSpec(
        makeRecord('climb', { metadata: { critical: true, failsafe: 'parachute', max_retries: 0 } }),
        'climb.command.json',
      ),
    ).toThrow('climb.command.json(climb).metadata.failsafe must be land|rtl|emergency_stop');
  });

  it.each([-1, 1.5, '2'])('rejects max_retries of %s', (maxRetries) => {
    const record = makeRecord('climb', {
      metadata: { critical: false, failsafe: null, max_retries: maxRetries, timeout_behavior: 'continue' },
    });
    expect(() => parseCommandSpec(record, 'climb.command.json')).toThrow(
      new ConfigurationError('climb.command.json(climb).metadata.max_retries must be a non-negative integer'),
    );
  });

  it('requires an implementation timeout', () => {
    expect(() => parseCommandSpec(makeRecord('climb', { implementation: {} }))).toThrow(
      'command(climb).implementation.timeout must be numeric',
    );
  });
});

describe('catalogFromSpecs / lookupSpec', () => {
  it('returns null for unknown names', () => {
    const catalog = catalogFromSpecs([parseCommandSpec(makeRecord('climb'))]);
    expect(lookupSpec(catalog, 'climb')?.name).toBe('climb');
    expect(lookupSpec(catalog, 'flip')).toBeNull();
  });
});
