import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { buildSteps, loadCatalog } from '../../catalog/index.js';
import { configPath, loadConfig } from '../../config/index.js';
import type { Step } from '../../steps/index.js';

export function formatStepList(steps: readonly Step[], skipped: readonly string[]): string[] {
  const lines = [`Steps (${steps.length}):`];
  const nameWidth = Math.max(4, ...steps.map((s) => s.name.length));

  for (const [i, step] of steps.entries()) {
    lines.push(`  ${String(i + 1).padStart(2)}. ${step.name.padEnd(nameWidth)}  ${chalk.dim(`${step.commands.length} commands`)}`);
    for (const command of step.commands) {
      lines.push(chalk.dim(`        $ ${command}`));
    }
  }

  if (skipped.length > 0) {
    lines.push('');
    lines.push(chalk.dim(`Skipped by config: ${skipped.join(', ')}`));
  }
  return lines;
}

export const stepsCommand = new Command('steps')
  .description('List the maintenance steps after config is applied')
  .option('-c, --config <path>', 'Path to config file')
  .option('--catalog <path>', 'Use another step catalog')
  .option('--json', 'Output as JSON')
  .action(
    withErrorHandler(async (options: { config?: string; catalog?: string; json?: boolean }) => {
      const config = loadConfig(options.config ?? configPath());
      const steps = buildSteps(loadCatalog(options.catalog), config);

      if (options.json) {
        console.log(JSON.stringify({
          steps: steps.map((s) => ({ name: s.name, commands: s.commands })),
          skip_steps: config.skip_steps,
        }));
        return;
      }

      for (const line of formatStepList(steps, config.skip_steps)) {
        console.log(line);
      }
    }),
  );
