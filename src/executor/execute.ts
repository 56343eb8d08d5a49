import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { debug } from '../lib/utils/debug.js';
import { tail } from '../lib/utils/format.js';
import { isBinaryAvailable, isXcodeAvailable, targetBinary } from './resolve.js';
import {
  OUTPUT_TAIL_CHARS,
  SHELL_NOT_FOUND_EXIT,
  type ExecuteOptions,
  type ExecutionOutcome,
  type OutputStream,
} from './types.js';

const DEFAULT_SHELL = '/bin/sh';

// ── Bounded capture ──

class OutputBuffer {
  private text = '';

  push(line: string): void {
    this.text = tail(this.text ? `${this.text}\n${line}` : line, OUTPUT_TAIL_CHARS);
  }

  toString(): string {
    return this.text;
  }
}

// ── Stream draining ──

/** Read a stream line by line until it closes */
function drain(
  stream: Readable | null,
  name: OutputStream,
  sink: OutputBuffer,
  onLine?: ExecuteOptions['onLine'],
): Promise<void> {
  if (!stream) return Promise.resolve();

  return new Promise((resolve) => {
    const rl = createInterface({ input: stream, crlfDelay: Infinity });
    let closed = false;
    const close = (): void => {
      if (closed) return;
      closed = true;
      rl.close();
    };

    rl.on('line', (line) => {
      sink.push(line);
      onLine?.(line, name);
    });
    rl.once('close', () => resolve());
    stream.once('close', close);
    stream.once('error', (err) => {
      sink.push(`[${name} error] ${err.message}`);
      close();
    });
  });
}

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

function waitForExit(child: ChildProcess): Promise<ProcessExit> {
  return new Promise((resolve) => {
    child.once('error', (error) => resolve({ code: null, signal: null, error }));
    child.once('close', (code, signal) => resolve({ code, signal }));
  });
}

// ── Missing-command detection ──

/**
 * The shell's own report of a missing command, e.g.
 * `sh: 1: mas: not found` or `/bin/sh: line 1: composer: command not found`.
 * Only lines prefixed by the shell's name match, so a tool's own output does not.
 */
const NOT_FOUND_PATTERN =
  /^(?:\S*\/)?(?:sh|bash|dash|zsh)(?:: line \d+|: \d+)?: (.+?): (?:command not found|not found|No such file or directory)$/m;

/** Name of the command the shell could not find, from its stderr */
export function missingCommandFromStderr(stderr: string): string | null {
  return NOT_FOUND_PATTERN.exec(stderr)?.[1] ?? null;
}

// ── Executor ──

/**
 * Run one command string through the shell and wait for it to finish.
 *
 * Never rejects for a failing child: a non-zero exit or a spawn error
 * comes back as a `failed` outcome. A target binary that is absent from
 * the search path comes back as `not_found` without spawning anything;
 * so does an `xcrun` command on a host without Xcode.
 */
export async function execute(command: string, options: ExecuteOptions = {}): Promise<ExecutionOutcome> {
  const start = Date.now();

  if (command.trim() === '') {
    return { status: 'failed', exitCode: null, stdout: '', stderr: '', error: 'empty command', durationMs: 0 };
  }

  const searchPath = options.searchPath ?? process.env.PATH ?? '';
  const binary = targetBinary(command);

  if (binary !== null) {
    if (!isBinaryAvailable(binary, searchPath, options.cwd)) {
      debug('executor', `${binary} not on search path, skipping: ${command}`);
      return { status: 'not_found', binary, durationMs: Date.now() - start };
    }
    if (binary === 'xcrun' && !isXcodeAvailable(searchPath)) {
      debug('executor', `Xcode not installed, skipping: ${command}`);
      return { status: 'not_found', binary: 'Xcode', durationMs: Date.now() - start };
    }
  }

  const env = { ...(options.env ?? process.env), PATH: searchPath };
  const stdout = new OutputBuffer();
  const stderr = new OutputBuffer();

  let child: ChildProcess;
  try {
    child = spawn(options.shell ?? DEFAULT_SHELL, ['-c', command], {
      cwd: options.cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (err) {
    return {
      status: 'failed',
      exitCode: null,
      stdout: '',
      stderr: '',
      error: `failed to spawn process: ${err instanceof Error ? err.message : String(err)}`,
      durationMs: Date.now() - start,
    };
  }

  // Both readers and the exit are joined before the outcome is known
  const readers = Promise.all([
    drain(child.stdout, 'stdout', stdout, options.onLine),
    drain(child.stderr, 'stderr', stderr, options.onLine),
  ]);
  const exit = await waitForExit(child);
  if (exit.error) {
    child.stdout?.destroy();
    child.stderr?.destroy();
  }
  await readers;

  const durationMs = Date.now() - start;
  debug('executor', `\`${command}\` exited with code=${exit.code} signal=${exit.signal}`);

  if (exit.error) {
    return {
      status: 'failed',
      exitCode: null,
      stdout: stdout.toString(),
      stderr: stderr.toString(),
      error: `failed to spawn process: ${exit.error.message}`,
      durationMs,
    };
  }

  if (exit.code === 0) {
    return { status: 'succeeded', exitCode: 0, stdout: stdout.toString(), stderr: stderr.toString(), durationMs };
  }

  // 127 is only a soft-skip when the shell itself says what it could not find
  const missing = exit.code === SHELL_NOT_FOUND_EXIT ? missingCommandFromStderr(stderr.toString()) : null;
  if (missing !== null) {
    return { status: 'not_found', binary: missing, durationMs };
  }

  return {
    status: 'failed',
    exitCode: exit.code,
    stdout: stdout.toString(),
    stderr: stderr.toString(),
    error: exit.signal ? `terminated by ${exit.signal}` : `exit ${exit.code ?? '?'}`,
    durationMs,
  };
}
