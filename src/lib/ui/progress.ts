import type { Writable } from 'node:stream';

/** Terminal state a step's progress line finishes in */
export type StepDisplayStatus = 'completed' | 'failed' | 'skipped';

/** Handle a running step uses to report on itself */
export interface StepProgress {
  /** Replace the running step's status text */
  setMessage(text: string): void;
  /** Print a line above the running step's status */
  println(line: string): void;
}

/** Renders the run: one entry per step, in order */
export interface ProgressRenderer {
  runStarted(total: number): void;
  stepStarted(index: number, total: number, name: string): StepProgress;
  stepFinished(index: number, total: number, name: string, status: StepDisplayStatus): void;
  runFinished(): void;
}

export function stepLabel(index: number, total: number): string {
  return `[${index + 1}/${total}]`;
}

export const STATUS_GLYPH: Record<StepDisplayStatus, string> = {
  completed: '✅',
  failed: '❌',
  skipped: '⏭️',
};

/** Hidden progress handle, used in quiet mode */
export const hiddenProgress: StepProgress = {
  setMessage: () => {},
  println: () => {},
};

/**
 * Compact renderer: one line per step, rewritten in place,
 * with command output suppressed.
 */
export class QuietRenderer implements ProgressRenderer {
  constructor(private readonly out: Writable = process.stdout) {}

  runStarted(): void {}

  stepStarted(index: number, total: number, name: string): StepProgress {
    this.out.write(`\r🔧 ${stepLabel(index, total)} ${name}...`);
    return hiddenProgress;
  }

  stepFinished(index: number, total: number, name: string, status: StepDisplayStatus): void {
    if (status === 'skipped') {
      this.out.write(`\r🔧 ${stepLabel(index, total)} ${name}...`);
    }
    this.out.write(` ${STATUS_GLYPH[status]}`);
  }

  runFinished(): void {
    this.out.write('\n');
  }
}
