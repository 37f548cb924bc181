/**
 * Skyhand Agent — Wait
 */

import { CancellationError, TimeoutError } from '../types/errors.js';
import { failed, succeeded, type CommandResult } from '../types/models.js';
import { BaseCommand, numberParam, type CommandContext } from './command.js';

export class WaitCommand extends BaseCommand {
  readonly name = 'wait';

  protected async execute(ctx: CommandContext): Promise<CommandResult> {
    const duration = numberParam(this.params, 'duration');
    const startedAt = Date.now();
    const elapsedS = () => (Date.now() - startedAt) / 1000;

    try {
      await this.pause(ctx, duration * 1000);
    } catch (err) {
      if (err instanceof CancellationError && !(ctx.signal.reason instanceof TimeoutError)) {
        return failed('cancelled', `Wait cancelled after ${elapsedS().toFixed(1)}s of ${duration}s`, {
          error: err.message,
          data: { requestedS: duration, elapsedS: elapsedS() },
        });
      }
      throw err;
    }

    const actual = elapsedS();
    return succeeded(`Wait complete (${duration}s requested, ${actual.toFixed(2)}s actual)`, {
      requestedS: duration,
      actualS: actual,
    });
  }
}
