import chalk from 'chalk';
import { isFailure } from '../executor/index.js';
import { nullEventLogger, type EventLogger } from '../integration/event-log.js';
import { QuietRenderer, type ProgressRenderer } from '../lib/ui/progress.js';
import { debug } from '../lib/utils/debug.js';
import { sleep } from '../lib/utils/sleep.js';
import type { Step, StepOutcome } from '../steps/index.js';
import { StepTracker } from './state.js';
import {
  createRunStatistics,
  finalizeStatistics,
  recordStep,
  type RunStatistics,
  type SkipReason,
} from './statistics.js';

/** Yes/no checkpoint before a step. Rejects when the prompt itself fails. */
export type ConfirmationGate = (question: string) => Promise<boolean>;

export interface RunOptions {
  /** Enables the confirmation gate */
  confirm?: ConfirmationGate;
  renderer?: ProgressRenderer;
  logger?: EventLogger;
  /** Pause after each executed step, for presentation */
  pauseMs?: number;
  /** Checked before each step; remaining steps are skipped once aborted */
  signal?: AbortSignal;
}

export function confirmationPrompt(step: Step): string {
  return `Proceed with: ${step.name}?`;
}

/**
 * Run every step in order and return the run's statistics.
 *
 * Steps never run concurrently. A failed step does not stop the run;
 * only a failing confirmation prompt does.
 */
export async function runAll(steps: readonly Step[], options: RunOptions = {}): Promise<RunStatistics> {
  const renderer = options.renderer ?? new QuietRenderer();
  const logger = options.logger ?? nullEventLogger;
  const total = steps.length;
  const stats = createRunStatistics(total);

  logger.record({ type: 'run:start', level: 'info', step_count: total, interactive: Boolean(options.confirm) });
  renderer.runStarted(total);

  for (const [index, step] of steps.entries()) {
    const tracker = new StepTracker(step.name);

    const skip = (reason: SkipReason): void => {
      tracker.transition('skipped');
      renderer.stepFinished(index, total, step.name, 'skipped');
      logger.record({ type: 'step:skipped', level: 'info', step: step.name, reason });
      recordStep(stats, { name: step.name, status: 'skipped', reason });
    };

    if (options.signal?.aborted) {
      skip('interrupted');
      continue;
    }

    if (options.confirm) {
      tracker.transition('gated');
      const proceed = await options.confirm(confirmationPrompt(step));
      if (!proceed) {
        skip('declined');
        continue;
      }
    }

    tracker.transition('running');
    logger.record({ type: 'step:started', level: 'info', step: step.name, command_count: step.commands.length });
    const progress = renderer.stepStarted(index, total, step.name);
    const start = Date.now();

    let outcome: StepOutcome;
    let error: string | undefined;
    try {
      outcome = await step.run({ progress, logger });
    } catch (err) {
      // Steps report failures through their outcome; a throw is still only this step's failure
      error = err instanceof Error ? err.message : String(err);
      progress.println(chalk.red(`⚠️ Step error: ${error}`));
      outcome = { name: step.name, status: 'failed', results: [], durationMs: Date.now() - start };
    }

    tracker.transition(outcome.status);
    renderer.stepFinished(index, total, step.name, outcome.status);
    recordStep(stats, { name: step.name, status: outcome.status, durationMs: outcome.durationMs });

    if (outcome.status === 'failed') {
      logger.record({
        type: 'step:failed',
        level: 'error',
        step: step.name,
        duration_ms: outcome.durationMs,
        failed_commands: outcome.results.filter((r) => isFailure(r.outcome)).length,
        error,
      });
    } else {
      logger.record({ type: 'step:completed', level: 'info', step: step.name, duration_ms: outcome.durationMs });
    }

    if (options.pauseMs && index < total - 1) {
      await sleep(options.pauseMs, options.signal);
    }
  }

  renderer.runFinished();
  finalizeStatistics(stats);
  debug('updater', 'run finished', stats);

  logger.record({
    type: 'run:finished',
    level: stats.failed > 0 ? 'warn' : 'info',
    total: stats.totalSteps,
    completed: stats.completed,
    skipped: stats.skipped,
    failed: stats.failed,
    duration_ms: stats.durationMs ?? 0,
  });

  return stats;
}
