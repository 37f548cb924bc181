/**
 * Skyhand Agent — Command Registry
 *
 * Compile-time table from command name to factory. The registry value is
 * built once at startup against the loaded catalog and handed to the
 * runner; it refuses to start if the two disagree in either direction.
 */

import { lookupSpec } from '../catalog/lookup.js';
import type { CommandCatalog, CommandSpec } from '../catalog/types.js';
import { ConfigurationError, ValidationError } from '../types/errors.js';
import type { ValidatedCommand } from '../types/models.js';
import { COMMAND_NAMES, isCommandName, type CommandFactory, type CommandName, type DroneCommand } from './command.js';
import { GotoCommand } from './goto.js';
import { LandCommand } from './land.js';
import { OrbitCommand } from './orbit.js';
import { ReturnToLaunchCommand } from './rtl.js';
import { TakeoffCommand } from './takeoff.js';
import { WaitCommand } from './wait.js';

export const COMMAND_FACTORIES: Readonly<Record<CommandName, CommandFactory>> = {
  takeoff: (params) => new TakeoffCommand(params),
  land: (params) => new LandCommand(params),
  rtl: (params) => new ReturnToLaunchCommand(params),
  wait: (params) => new WaitCommand(params),
  goto: (params) => new GotoCommand(params),
  orbit: (params) => new OrbitCommand(params),
};

export interface CommandRegistry {
  readonly catalog: CommandCatalog;
  /** Catalog record for a registered command */
  spec(name: string): CommandSpec;
  /** A fresh instance; the runner calls this once per attempt. */
  create(command: ValidatedCommand): DroneCommand;
  names(): CommandName[];
}

/**
 * Pair every catalog record with a factory.
 *
 * @throws ConfigurationError when a catalog command has no factory or a
 *   factory has no catalog record
 */
export function createCommandRegistry(
  catalog: CommandCatalog,
  factories: Readonly<Record<CommandName, CommandFactory>> = COMMAND_FACTORIES,
): CommandRegistry {
  const issues: string[] = [];
  for (const name of catalog.specs.keys()) {
    if (!isCommandName(name)) issues.push(`catalog command "${name}" has no implementation`);
  }
  for (const name of COMMAND_NAMES) {
    if (!catalog.specs.has(name)) issues.push(`command "${name}" is missing from the catalog`);
  }
  if (issues.length > 0) {
    throw new ConfigurationError(`command registry mismatch: ${issues.join('; ')}`);
  }

  return {
    catalog,
    spec(name) {
      const spec = lookupSpec(catalog, name);
      if (!spec) throw new ValidationError([`unknown command "${name}"`]);
      return spec;
    },
    create(command) {
      if (!isCommandName(command.name)) throw new ValidationError([`unknown command "${command.name}"`]);
      return factories[command.name](command.params);
    },
    names() {
      return COMMAND_NAMES.filter((name) => catalog.specs.has(name));
    },
  };
}
