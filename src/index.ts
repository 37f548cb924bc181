/**
 * Skyhand Agent — Public API
 */

export * from './agent/agent.js';
export * from './agent/runner.js';
export * from './agent/telemetry-poller.js';

export * from './backends/backend.js';
export * from './backends/session.js';
export * from './backends/sim-session.js';
export * from './backends/mavlink.js';
export * from './backends/rest-bridge.js';
export * from './backends/connection-string.js';
export * from './backends/factory.js';

export * from './catalog/types.js';
export * from './catalog/lookup.js';
export * from './catalog/validate.js';

export * from './commands/command.js';
export * from './commands/registry.js';
export * from './commands/takeoff.js';
export * from './commands/land.js';
export * from './commands/rtl.js';
export * from './commands/wait.js';
export * from './commands/goto.js';
export * from './commands/orbit.js';

export * from './core/config.js';
export * from './core/logger.js';
export * from './core/async.js';

export * from './types/errors.js';
export * from './types/models.js';
export * from './types/geo.js';
export * from './types/state-machine.js';
