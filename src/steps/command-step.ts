import chalk from 'chalk';
import { execute, isFailure, type CommandExecutor } from '../executor/index.js';
import { tail } from '../lib/utils/format.js';
import type { CommandResult, Step, StepContext, StepOutcome } from './types.js';

/** Characters of stderr kept on a `command:failed` event */
const STDERR_EVENT_TAIL = 500;

/**
 * Step made of shell commands, run strictly in order.
 *
 * A failing command does not stop the ones after it. The step fails
 * when at least one command failed; commands whose binary is missing
 * are soft-skipped and count as success.
 */
export class CommandStep implements Step {
  readonly commands: readonly string[];

  constructor(
    readonly name: string,
    commands: readonly string[],
    private readonly executor: CommandExecutor = execute,
  ) {
    this.commands = Object.freeze([...commands]);
  }

  async run(ctx: StepContext): Promise<StepOutcome> {
    const start = Date.now();
    const total = this.commands.length;
    const results: CommandResult[] = [];

    for (const [index, command] of this.commands.entries()) {
      if (total > 1) {
        ctx.progress.setMessage(chalk.dim(`${this.name} (step ${index + 1} of ${total})`));
      }

      const outcome = await this.executor(command, {
        onLine: (line) => ctx.progress.println(line),
      });
      results.push({ command, index, outcome });

      switch (outcome.status) {
        case 'succeeded':
          ctx.progress.println(chalk.green(`✅ Command succeeded: ${command}`));
          break;
        case 'not_found':
          ctx.progress.println(chalk.yellow(`${outcome.binary} not found, skipping.`));
          ctx.logger.record({
            type: 'command:not_found',
            level: 'info',
            step: this.name,
            command,
            binary: outcome.binary,
          });
          break;
        case 'failed':
          ctx.progress.println(chalk.red(`⚠️ Command failed: ${command} - ${outcome.error ?? `exit ${outcome.exitCode ?? '?'}`}`));
          ctx.logger.record({
            type: 'command:failed',
            level: 'error',
            step: this.name,
            command,
            exit_code: outcome.exitCode,
            stderr_tail: tail(outcome.stderr, STDERR_EVENT_TAIL),
            error: outcome.error,
          });
          break;
      }
    }

    return {
      name: this.name,
      status: results.some((r) => isFailure(r.outcome)) ? 'failed' : 'completed',
      results,
      durationMs: Date.now() - start,
    };
  }
}
