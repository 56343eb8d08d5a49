import { describe, it, expect } from 'vitest';
import { stripVTControlCharacters } from 'node:util';
import { CommandStep } from '../src/steps/command-step.js';
import type { ExecutionOutcome } from '../src/executor/types.js';
import { failed, notFound, recordingContext, scriptedExecutor, succeeded } from './helpers/fakes.js';

describe('CommandStep', () => {
  it('exposes name and a frozen copy of its commands', () => {
    const commands = ['brew update'];
    const step = new CommandStep('Updating Homebrew', commands);
    commands.push('brew upgrade');

    expect(step.name).toBe('Updating Homebrew');
    expect(step.commands).toEqual(['brew update']);
    expect(Object.isFrozen(step.commands)).toBe(true);
  });

  it('completes vacuously with zero commands', async () => {
    const { executor, calls } = scriptedExecutor();
    const { ctx } = recordingContext();
    const outcome = await new CommandStep('Nothing', [], executor).run(ctx);

    expect(outcome.status).toBe('completed');
    expect(outcome.results).toEqual([]);
    expect(calls).toEqual([]);
  });

  it('runs commands in order', async () => {
    const { executor, calls } = scriptedExecutor();
    const { ctx } = recordingContext();
    await new CommandStep('Homebrew', ['brew update', 'brew upgrade', 'brew cleanup'], executor).run(ctx);

    expect(calls).toEqual(['brew update', 'brew upgrade', 'brew cleanup']);
  });

  it('never dispatches a command before the previous one finished', async () => {
    const events: string[] = [];
    const executor = async (command: string): Promise<ExecutionOutcome> => {
      events.push(`start ${command}`);
      await new Promise((r) => setTimeout(r, 5));
      events.push(`end ${command}`);
      return command === 'B' ? failed() : succeeded();
    };
    const { ctx } = recordingContext();
    await new CommandStep('Ordered', ['A', 'B', 'C'], executor).run(ctx);

    expect(events).toEqual(['start A', 'end A', 'start B', 'end B', 'start C', 'end C']);
  });

  it('keeps going after a failing command and fails the step', async () => {
    const { executor, calls } = scriptedExecutor({ 'gem update': failed(1, 'network down') });
    const { ctx } = recordingContext();
    const outcome = await new CommandStep('Ruby gems', ['gem update', 'gem cleanup'], executor).run(ctx);

    expect(calls).toEqual(['gem update', 'gem cleanup']);
    expect(outcome.status).toBe('failed');
    expect(outcome.results.map((r) => r.outcome.status)).toEqual(['failed', 'succeeded']);
  });

  it('fails when only the first of several commands fails (any-fail policy)', async () => {
    const { executor } = scriptedExecutor({ A: failed() });
    const { ctx } = recordingContext();
    const outcome = await new CommandStep('Mixed', ['A', 'B', 'C'], executor).run(ctx);
    expect(outcome.status).toBe('failed');
  });

  it('completes when a binary is missing', async () => {
    const { executor } = scriptedExecutor({ 'mas upgrade': notFound('mas') });
    const { ctx, lines, logger } = recordingContext();
    const outcome = await new CommandStep('App Store', ['mas upgrade'], executor).run(ctx);

    expect(outcome.status).toBe('completed');
    expect(lines.map((l) => stripVTControlCharacters(l))).toContain('mas not found, skipping.');
    expect(logger.events).toEqual([
      { type: 'command:not_found', level: 'info', step: 'App Store', command: 'mas upgrade', binary: 'mas' },
    ]);
  });

  it('reports each command result individually', async () => {
    const { executor } = scriptedExecutor({ 'brew upgrade': failed(2, 'conflict') });
    const { ctx, lines } = recordingContext();
    await new CommandStep('Homebrew', ['brew update', 'brew upgrade'], executor).run(ctx);

    expect(lines.map((l) => stripVTControlCharacters(l))).toEqual([
      'output of brew update',
      '✅ Command succeeded: brew update',
      'output of brew upgrade',
      '⚠️ Command failed: brew upgrade - exit 2',
    ]);
  });

  it('logs failed commands with the stderr tail', async () => {
    const { executor } = scriptedExecutor({ 'brew upgrade': failed(2, 'conflict') });
    const { ctx, logger } = recordingContext();
    await new CommandStep('Homebrew', ['brew upgrade'], executor).run(ctx);

    expect(logger.events).toEqual([
      {
        type: 'command:failed',
        level: 'error',
        step: 'Homebrew',
        command: 'brew upgrade',
        exit_code: 2,
        stderr_tail: 'conflict',
        error: 'exit 2',
      },
    ]);
  });

  it('shows "(step i of N)" only for multi-command steps', async () => {
    const { executor } = scriptedExecutor();

    const multi = recordingContext();
    await new CommandStep('Xcode', ['a', 'b'], executor).run(multi.ctx);
    expect(multi.messages.map((m) => stripVTControlCharacters(m))).toEqual([
      'Xcode (step 1 of 2)',
      'Xcode (step 2 of 2)',
    ]);

    const single = recordingContext();
    await new CommandStep('npm', ['npm update -g'], executor).run(single.ctx);
    expect(single.messages).toEqual([]);
  });

  it('yields identical outcomes when run twice', async () => {
    const { executor } = scriptedExecutor();
    const step = new CommandStep('No-op', ['true'], executor);

    const first = await step.run(recordingContext().ctx);
    const second = await step.run(recordingContext().ctx);
    expect(first.status).toBe('completed');
    expect(second.status).toBe('completed');
    expect(second.results).toEqual(first.results);
  });

  it('uses the real executor by default', async () => {
    const { ctx } = recordingContext();
    const outcome = await new CommandStep('Shell', ['true', 'false', 'nonexistent-binary-xyz']).run(ctx);

    expect(outcome.status).toBe('failed');
    expect(outcome.results.map((r) => r.outcome.status)).toEqual(['succeeded', 'failed', 'not_found']);
  });
});
