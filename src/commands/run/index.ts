import { Command } from 'commander';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { installShutdownHandlers } from '../../orchestrator/shutdown.js';
import { runMaintenance, type RunMaintenanceOptions } from './run-maintenance.js';

export const runCommand = new Command('run')
  .description('Run the maintenance steps (default command)')
  .option('-i, --interactive', 'Ask for confirmation before each step')
  .option('-q, --quiet', 'Reduce output to a compact progress line')
  .option('-c, --config <path>', 'Path to config file')
  .option('--catalog <path>', 'Use another step catalog')
  .option('--dry-run', 'List the steps that would run, do not execute')
  .option('--json', 'Output run statistics as JSON')
  .option('--no-notify', 'Do not send a desktop notification')
  .action(
    withErrorHandler(async (options: RunMaintenanceOptions) => {
      const controller = new AbortController();
      const uninstall = installShutdownHandlers(controller);
      try {
        // Step failures are reported in the summary; the exit code stays 0
        await runMaintenance(options, { signal: controller.signal });
      } finally {
        uninstall();
      }
    }),
  );
