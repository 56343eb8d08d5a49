import type { TerminalStatus } from './state.js';

export type SkipReason = 'declined' | 'interrupted';

export interface StepRecord {
  name: string;
  status: TerminalStatus;
  reason?: SkipReason;
  durationMs?: number;
}

/** Aggregate counters for one run */
export interface RunStatistics {
  totalSteps: number;
  completed: number;
  skipped: number;
  failed: number;
  startedAt: Date;
  finishedAt: Date | null;
  durationMs: number | null;
  steps: StepRecord[];
}

export function createRunStatistics(totalSteps: number, now: Date = new Date()): RunStatistics {
  return {
    totalSteps,
    completed: 0,
    skipped: 0,
    failed: 0,
    startedAt: now,
    finishedAt: null,
    durationMs: null,
    steps: [],
  };
}

/** Fold one step's terminal state into the counters */
export function recordStep(stats: RunStatistics, record: StepRecord): void {
  stats.steps.push(record);
  switch (record.status) {
    case 'completed':
      stats.completed += 1;
      break;
    case 'skipped':
      stats.skipped += 1;
      break;
    case 'failed':
      stats.failed += 1;
      break;
  }
}

export function finalizeStatistics(stats: RunStatistics, now: Date = new Date()): RunStatistics {
  stats.finishedAt = now;
  stats.durationMs = now.getTime() - stats.startedAt.getTime();
  return stats;
}

/** completed + skipped + failed == totalSteps */
export function isBalanced(stats: RunStatistics): boolean {
  return stats.completed + stats.skipped + stats.failed === stats.totalSteps;
}

/** Elapsed time so far, or the final duration once finalized */
export function elapsedMs(stats: RunStatistics, now: Date = new Date()): number {
  return stats.durationMs ?? now.getTime() - stats.startedAt.getTime();
}

/** JSON form printed by `--json` */
export function statisticsToJson(stats: RunStatistics): Record<string, unknown> {
  return {
    total: stats.totalSteps,
    completed: stats.completed,
    skipped: stats.skipped,
    failed: stats.failed,
    started_at: stats.startedAt.toISOString(),
    finished_at: stats.finishedAt?.toISOString() ?? null,
    duration_ms: elapsedMs(stats),
    steps: stats.steps.map((s) => ({
      name: s.name,
      status: s.status,
      ...(s.reason ? { reason: s.reason } : {}),
      ...(s.durationMs !== undefined ? { duration_ms: s.durationMs } : {}),
    })),
  };
}
