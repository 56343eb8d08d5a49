import chalk from 'chalk';
import { buildSteps, loadCatalog } from '../../catalog/index.js';
import { configPath, loadConfig, type NotificationSettings } from '../../config/index.js';
import type { CommandExecutor } from '../../executor/index.js';
import { JsonlEventLogger, defaultLogPath, type EventLogger } from '../../integration/event-log.js';
import {
  buildNotification,
  sendNotification,
  type NotificationSender,
} from '../../integration/notification.js';
import { UpdaterError, ErrorCode } from '../../lib/errors.js';
import { QuietRenderer, type ProgressRenderer } from '../../lib/ui/progress.js';
import { SpinnerRenderer } from '../../lib/ui/spinner.js';
import { isInteractive } from '../../lib/utils/prompt-utils.js';
import {
  closingLine,
  formatSummary,
  runAll,
  statisticsToJson,
  type ConfirmationGate,
  type RunStatistics,
} from '../../orchestrator/index.js';
import { askConfirmation } from '../../prompt/confirm.js';

export interface RunMaintenanceOptions {
  interactive?: boolean;
  quiet?: boolean;
  config?: string;
  catalog?: string;
  dryRun?: boolean;
  json?: boolean;
  notify?: boolean;
}

/** Collaborators, replaceable in tests */
export interface RunMaintenanceDeps {
  confirm?: ConfirmationGate;
  notify?: NotificationSender;
  executor?: CommandExecutor;
  logger?: EventLogger;
  renderer?: ProgressRenderer;
  print?: (line: string) => void;
  signal?: AbortSignal;
  pauseMs?: number;
  env?: NodeJS.ProcessEnv;
}

/** Pause between steps in the full renderer */
const STEP_PAUSE_MS = 150;

/**
 * Load config and catalog, run every step, print the summary and send
 * the notification. Returns null for --dry-run.
 */
export async function runMaintenance(
  options: RunMaintenanceOptions,
  deps: RunMaintenanceDeps = {},
): Promise<RunStatistics | null> {
  const env = deps.env ?? process.env;
  const print = deps.print ?? ((line: string) => console.log(line));

  const config = loadConfig(options.config ?? configPath(env), env);
  const steps = buildSteps(loadCatalog(options.catalog), config, { executor: deps.executor });

  if (options.dryRun) {
    if (options.json) {
      print(JSON.stringify({ steps: steps.map((s) => ({ name: s.name, commands: s.commands })) }));
    } else {
      print(chalk.cyan.bold(`🔧 ${steps.length} maintenance steps would run:`));
      for (const [i, step] of steps.entries()) {
        print(`  ${String(i + 1).padStart(2)}. ${step.name} ${chalk.dim(`(${step.commands.length} commands)`)}`);
      }
    }
    return null;
  }

  let confirm: ConfirmationGate | undefined;
  if (options.interactive) {
    if (!deps.confirm && !isInteractive()) {
      throw new UpdaterError(
        ErrorCode.INTERACTIVE_REQUIRED,
        '--interactive needs a terminal to ask for confirmation',
        'Run without --interactive, or from an interactive shell',
      );
    }
    confirm = deps.confirm ?? ((question) => askConfirmation(question));
  }

  const logger = deps.logger ?? new JsonlEventLogger(defaultLogPath(env));
  const renderer = deps.renderer
    ?? (options.quiet || options.json ? new QuietRenderer(options.json ? process.stderr : process.stdout) : new SpinnerRenderer());

  if (!options.quiet && !options.json) {
    print(chalk.cyan.bold('🔧 Starting macOS maintenance and updates...'));
  }

  const stats = await runAll(steps, {
    confirm,
    renderer,
    logger,
    signal: deps.signal,
    pauseMs: deps.pauseMs ?? (options.quiet ? 0 : STEP_PAUSE_MS),
  });

  if (options.json) {
    print(JSON.stringify(statisticsToJson(stats)));
  } else {
    print('');
    for (const line of formatSummary(stats)) print(line);
    print(closingLine(stats));
  }

  if (options.notify !== false) {
    await deliverNotification(stats, config.notification_settings, deps.notify ?? sendNotification);
  }

  return stats;
}

/** Notification failures are reported and otherwise ignored */
async function deliverNotification(
  stats: RunStatistics,
  settings: NotificationSettings,
  notify: NotificationSender,
): Promise<void> {
  const message = buildNotification(stats, settings);
  if (!message) return;

  try {
    await notify(message.title, message.body);
  } catch (err) {
    console.error(chalk.yellow(`⚠️ ${err instanceof Error ? err.message : String(err)}`));
  }
}
