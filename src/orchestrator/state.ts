import { UpdaterError, ErrorCode } from '../lib/errors.js';

// ── Types ──

export type StepStatus = 'pending' | 'gated' | 'running' | 'skipped' | 'completed' | 'failed';
export type TerminalStatus = 'skipped' | 'completed' | 'failed';

// ── Transitions ──

/** Valid transition map: from → allowed to states */
const VALID_TRANSITIONS: Record<StepStatus, StepStatus[]> = {
  pending: ['gated', 'running', 'skipped'],
  gated: ['running', 'skipped'],
  running: ['completed', 'failed'],
  skipped: [],    // terminal
  completed: [],  // terminal
  failed: [],     // terminal
};

export function isTerminal(status: StepStatus): status is TerminalStatus {
  return VALID_TRANSITIONS[status].length === 0;
}

/** Lifecycle of one step within a run. No retries, no re-entry. */
export class StepTracker {
  private current: StepStatus = 'pending';

  constructor(readonly name: string) {}

  get status(): StepStatus {
    return this.current;
  }

  transition(to: StepStatus): void {
    if (!VALID_TRANSITIONS[this.current].includes(to)) {
      throw new UpdaterError(
        ErrorCode.STEP_TRANSITION_INVALID,
        `invalid transition: "${this.name}" ${this.current} → ${to}`,
      );
    }
    this.current = to;
  }
}
