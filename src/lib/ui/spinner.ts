import type { Writable } from 'node:stream';
import chalk from 'chalk';
import {
  stepLabel,
  type ProgressRenderer,
  type StepDisplayStatus,
  type StepProgress,
} from './progress.js';

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧'] as const;
export const SPINNER_INTERVAL_MS = 120;

const CLEAR_LINE = '\r\x1b[2K';

/**
 * Indeterminate spinner for the running step.
 * Output lines printed through it appear above the spinner line.
 * Without a TTY it only prints, no animation.
 */
class Spinner implements StepProgress {
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly out: Writable,
    private message: string,
    private readonly animate: boolean,
  ) {}

  start(): void {
    if (!this.animate) {
      this.out.write(`${this.message}\n`);
      return;
    }
    this.render();
    this.timer = setInterval(() => {
      this.frame = (this.frame + 1) % SPINNER_FRAMES.length;
      this.render();
    }, SPINNER_INTERVAL_MS);
  }

  setMessage(text: string): void {
    this.message = text;
    if (this.animate) this.render();
  }

  println(line: string): void {
    if (this.animate) {
      this.out.write(`${CLEAR_LINE}${line}\n`);
      this.render();
    } else {
      this.out.write(`${line}\n`);
    }
  }

  stop(finalLine: string): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.out.write(this.animate ? `${CLEAR_LINE}${finalLine}\n` : `${finalLine}\n`);
  }

  private render(): void {
    this.out.write(`${CLEAR_LINE}${chalk.green.bold(SPINNER_FRAMES[this.frame])} ${this.message}`);
  }
}

/** Full renderer: a spinner per step and a status line when it ends */
export class SpinnerRenderer implements ProgressRenderer {
  private current: Spinner | null = null;
  private readonly animate: boolean;

  constructor(private readonly out: Writable & { isTTY?: boolean } = process.stdout) {
    this.animate = Boolean(out.isTTY);
  }

  runStarted(total: number): void {
    this.out.write(`🔧 Starting ${total} maintenance steps...\n\n`);
  }

  stepStarted(index: number, total: number, name: string): StepProgress {
    const spinner = new Spinner(this.out, chalk.white(`${stepLabel(index, total)} ${name}...`), this.animate);
    spinner.start();
    this.current = spinner;
    return spinner;
  }

  stepFinished(index: number, total: number, name: string, status: StepDisplayStatus): void {
    const label = stepLabel(index, total);
    const line = finalLine(label, name, status);

    if (this.current) {
      this.current.stop(line);
      this.current = null;
    } else {
      this.out.write(`${line}\n`);
    }
  }

  runFinished(): void {}
}

function finalLine(label: string, name: string, status: StepDisplayStatus): string {
  switch (status) {
    case 'completed':
      return chalk.green.bold(`${label} ✅ ${name}`);
    case 'failed':
      return chalk.red.bold(`${label} ❌ Failed: ${name}`);
    case 'skipped':
      return `⏭️ ${label} ${chalk.yellow('Skipped.')}`;
  }
}
