import { appendFileSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import chalk from 'chalk';
import { debug } from '../lib/utils/debug.js';
import { formatDuration } from '../lib/utils/format.js';

// ── Event types ──

export type EventLevel = 'info' | 'warn' | 'error';

export type UpdaterEvent =
  | {
      type: 'run:start';
      level: 'info';
      step_count: number;
      interactive: boolean;
      seq: number;
      ts: string;
    }
  | {
      type: 'step:started';
      level: 'info';
      step: string;
      command_count: number;
      seq: number;
      ts: string;
    }
  | {
      type: 'step:completed';
      level: 'info';
      step: string;
      duration_ms: number;
      seq: number;
      ts: string;
    }
  | {
      type: 'step:failed';
      level: 'error';
      step: string;
      duration_ms: number;
      failed_commands: number;
      error?: string;
      seq: number;
      ts: string;
    }
  | {
      type: 'step:skipped';
      level: 'info';
      step: string;
      reason: string;
      seq: number;
      ts: string;
    }
  | {
      type: 'command:failed';
      level: 'error';
      step: string;
      command: string;
      exit_code: number | null;
      stderr_tail: string;
      error?: string;
      seq: number;
      ts: string;
    }
  | {
      type: 'command:not_found';
      level: 'info';
      step: string;
      command: string;
      binary: string;
      seq: number;
      ts: string;
    }
  | {
      type: 'run:finished';
      level: 'info' | 'warn';
      total: number;
      completed: number;
      skipped: number;
      failed: number;
      duration_ms: number;
      seq: number;
      ts: string;
    };

/** Distributive Omit for union types */
type DistributiveOmit<T, K extends keyof T> = T extends unknown ? Omit<T, K> : never;

export type UpdaterEventInput = DistributiveOmit<UpdaterEvent, 'seq' | 'ts'>;

/** Structured append-only sink for run events */
export interface EventLogger {
  record(event: UpdaterEventInput): void;
}

// ── Log location ──

/** Directory holding the event log (MAC_UPDATER_LOG_DIR overrides) */
export function logDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.MAC_UPDATER_LOG_DIR ?? join(homedir(), 'Library', 'Logs', 'mac-updater');
}

export function defaultLogPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(logDir(env), 'events.jsonl');
}

// ── JSONL writer ──

/**
 * Appends one JSON line per event.
 * A write failure is reported once on stderr; after that events are dropped.
 */
export class JsonlEventLogger implements EventLogger {
  private seq = 0;
  private broken = false;

  constructor(readonly path: string) {}

  record(event: UpdaterEventInput): void {
    debug('event', formatEventMessage(event));
    if (this.broken) return;

    const fullEvent = {
      ...event,
      seq: this.seq++,
      ts: new Date().toISOString(),
    };

    try {
      mkdirSync(dirname(this.path), { recursive: true });
      appendFileSync(this.path, JSON.stringify(fullEvent) + '\n');
    } catch (err) {
      this.broken = true;
      console.error(
        chalk.yellow(`⚠️ Event log disabled, cannot write ${this.path}: ${err instanceof Error ? err.message : String(err)}`),
      );
    }
  }
}

/** Discards every event */
export const nullEventLogger: EventLogger = {
  record: () => {},
};

// ── Message formatting ──

export function formatEventMessage(event: UpdaterEvent | UpdaterEventInput): string {
  switch (event.type) {
    case 'run:start':
      return `run:start (${event.step_count} steps${event.interactive ? ', interactive' : ''})`;

    case 'step:started':
      return `step:started ${event.step} (${event.command_count} commands)`;

    case 'step:completed':
      return `step:completed ${event.step} (${formatDuration(event.duration_ms)})`;

    case 'step:failed':
      return `step:failed ${event.step} (${event.failed_commands} failed commands)`;

    case 'step:skipped':
      return `step:skipped ${event.step} — ${event.reason}`;

    case 'command:failed':
      return `command:failed \`${event.command}\` — ${event.error ?? `exit ${event.exit_code ?? '?'}`}`;

    case 'command:not_found':
      return `command:not_found \`${event.command}\` — ${event.binary} not installed`;

    case 'run:finished': {
      const parts = [`${event.completed} completed`];
      if (event.skipped > 0) parts.push(`${event.skipped} skipped`);
      if (event.failed > 0) parts.push(`${event.failed} failed`);
      return `run:finished ${event.total} steps (${formatDuration(event.duration_ms)}, ${parts.join(', ')})`;
    }
  }
}
