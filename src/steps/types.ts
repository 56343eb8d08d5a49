import type { ExecutionOutcome } from '../executor/types.js';
import type { EventLogger } from '../integration/event-log.js';
import type { StepProgress } from '../lib/ui/progress.js';

/** One command's result inside a step */
export interface CommandResult {
  command: string;
  index: number;
  outcome: ExecutionOutcome;
}

/** Summary of everything a step ran */
export interface StepOutcome {
  name: string;
  status: 'completed' | 'failed';
  results: CommandResult[];
  durationMs: number;
}

/** What a running step gets from the orchestrator */
export interface StepContext {
  progress: StepProgress;
  logger: EventLogger;
}

/**
 * A named maintenance action.
 * Implementations report internal failures through the outcome, not by throwing.
 */
export interface Step {
  readonly name: string;
  /** Commands shown in listings; empty for steps that spawn nothing */
  readonly commands: readonly string[];
  run(ctx: StepContext): Promise<StepOutcome>;
}
