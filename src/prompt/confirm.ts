import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import chalk from 'chalk';
import { UpdaterError, ErrorCode } from '../lib/errors.js';

export interface ConfirmStreams {
  input?: Readable;
  output?: Writable;
}

/** Interpret an answer: true/false, or null when it should be asked again */
export function parseAnswer(answer: string, defaultYes = true): boolean | null {
  const normalized = answer.trim().toLowerCase();
  if (normalized === '') return defaultYes;
  if (normalized === 'y' || normalized === 'yes') return true;
  if (normalized === 'n' || normalized === 'no') return false;
  return null;
}

/**
 * Ask a yes/no question on the terminal. Empty answer means yes.
 * Throws UpdaterError(CONFIRMATION_FAILED) when input closes or fails.
 */
export async function askConfirmation(question: string, streams: ConfirmStreams = {}): Promise<boolean> {
  const rl = createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stdout,
  });

  // question() never settles once input has ended, so closing must reject it
  const closed = new Promise<never>((_resolve, reject) => {
    rl.once('close', () =>
      reject(
        new UpdaterError(
          ErrorCode.CONFIRMATION_FAILED,
          'confirmation input closed before an answer was given',
          'Run without --interactive to skip confirmations',
        ),
      ),
    );
  });
  // Keeps the rejection handled when an answer arrives first
  closed.catch(() => undefined);

  try {
    for (;;) {
      const answer = await Promise.race([rl.question(`${chalk.bold('?')} ${question} ${chalk.dim('(Y/n)')} `), closed]);
      const decision = parseAnswer(answer);
      if (decision !== null) return decision;
    }
  } catch (err) {
    if (err instanceof UpdaterError) throw err;
    throw new UpdaterError(
      ErrorCode.CONFIRMATION_FAILED,
      `confirmation prompt failed: ${err instanceof Error ? err.message : String(err)}`,
    );
  } finally {
    rl.close();
  }
}
