import { describe, it, expect, vi } from 'vitest';
import { runAll, confirmationPrompt } from '../src/orchestrator/updater.js';
import { isBalanced } from '../src/orchestrator/statistics.js';
import { CommandStep } from '../src/steps/command-step.js';
import { UpdaterError, ErrorCode } from '../src/lib/errors.js';
import { FixedStep, MemoryEventLogger, RecordingRenderer, failed, scriptedExecutor } from './helpers/fakes.js';

function counts(stats: { totalSteps: number; completed: number; skipped: number; failed: number }) {
  return { total: stats.totalSteps, completed: stats.completed, skipped: stats.skipped, failed: stats.failed };
}

describe('runAll', () => {
  it('runs the mixed catalog non-interactively', async () => {
    const steps = [
      new CommandStep('Cache flush', ['true']),
      new CommandStep('Bad op', ['false']),
      new CommandStep('Missing bin', ['nonexistent-binary-xyz']),
    ];

    const stats = await runAll(steps, { renderer: new RecordingRenderer() });

    expect(counts(stats)).toEqual({ total: 3, completed: 2, skipped: 0, failed: 1 });
    expect(stats.steps.map((s) => [s.name, s.status])).toEqual([
      ['Cache flush', 'completed'],
      ['Bad op', 'failed'],
      ['Missing bin', 'completed'],
    ]);
  });

  it('keeps completed + skipped + failed equal to the step count', async () => {
    for (const n of [0, 1, 4, 9]) {
      const steps = Array.from({ length: n }, (_, i) =>
        new FixedStep(`step ${i}`, i % 3 === 0 ? 'failed' : 'completed'),
      );
      const stats = await runAll(steps, {
        renderer: new RecordingRenderer(),
        confirm: async (q) => !q.includes('step 2'),
      });
      expect(stats.totalSteps).toBe(n);
      expect(isBalanced(stats)).toBe(true);
    }
  });

  it('treats a step with zero commands as completed', async () => {
    const stats = await runAll([new CommandStep('Empty', [])], { renderer: new RecordingRenderer() });
    expect(counts(stats)).toEqual({ total: 1, completed: 1, skipped: 0, failed: 0 });
  });

  it('does not stop after a failed step', async () => {
    const later = new FixedStep('later');
    const stats = await runAll([new FixedStep('broken', 'failed'), later], { renderer: new RecordingRenderer() });

    expect(later.runs).toBe(1);
    expect(counts(stats)).toEqual({ total: 2, completed: 1, skipped: 0, failed: 1 });
  });

  it('counts a step that throws as failed and continues', async () => {
    const later = new FixedStep('later');
    const renderer = new RecordingRenderer();
    const stats = await runAll([new FixedStep('explodes', 'throw'), later], { renderer });

    expect(counts(stats)).toEqual({ total: 2, completed: 1, skipped: 0, failed: 1 });
    expect(later.runs).toBe(1);
    expect(renderer.log).toContain('failed 1/2 explodes');
  });

  it('skips every step when confirmation always says no', async () => {
    const { executor, calls } = scriptedExecutor();
    const steps = [
      new CommandStep('One', ['brew update'], executor),
      new CommandStep('Two', ['gem update'], executor),
      new CommandStep('Three', ['mas upgrade'], executor),
    ];

    const stats = await runAll(steps, { confirm: async () => false, renderer: new RecordingRenderer() });

    expect(counts(stats)).toEqual({ total: 3, completed: 0, skipped: 3, failed: 0 });
    expect(stats.steps.every((s) => s.reason === 'declined')).toBe(true);
    expect(calls).toEqual([]);
  });

  it('asks once per step with the step name', async () => {
    const confirm = vi.fn(async () => true);
    const steps = [new FixedStep('Updating Homebrew'), new FixedStep('Updating Ruby gems')];
    await runAll(steps, { confirm, renderer: new RecordingRenderer() });

    expect(confirm.mock.calls).toEqual([
      ['Proceed with: Updating Homebrew?'],
      ['Proceed with: Updating Ruby gems?'],
    ]);
  });

  it('never runs a declined step', async () => {
    const declined = new FixedStep('declined');
    const accepted = new FixedStep('accepted');
    const stats = await runAll([declined, accepted], {
      confirm: async (q) => q === confirmationPrompt(accepted),
      renderer: new RecordingRenderer(),
    });

    expect(declined.runs).toBe(0);
    expect(accepted.runs).toBe(1);
    expect(counts(stats)).toEqual({ total: 2, completed: 1, skipped: 1, failed: 0 });
  });

  it('aborts the run when confirmation fails', async () => {
    const second = new FixedStep('second');
    const confirm = async (): Promise<boolean> => {
      throw new UpdaterError(ErrorCode.CONFIRMATION_FAILED, 'stdin closed');
    };

    await expect(runAll([new FixedStep('first'), second], { confirm, renderer: new RecordingRenderer() }))
      .rejects.toMatchObject({ code: 'CONFIRMATION_FAILED' });
    expect(second.runs).toBe(0);
  });

  it('skips the remaining steps once the signal is aborted', async () => {
    const controller = new AbortController();
    const first = new FixedStep('first');
    const second = new FixedStep('second');
    const third = new FixedStep('third');
    vi.spyOn(first, 'run').mockImplementation(async () => {
      controller.abort();
      return { name: 'first', status: 'completed', results: [], durationMs: 0 };
    });

    const stats = await runAll([first, second, third], {
      signal: controller.signal,
      renderer: new RecordingRenderer(),
    });

    expect(second.runs).toBe(0);
    expect(third.runs).toBe(0);
    expect(counts(stats)).toEqual({ total: 3, completed: 1, skipped: 2, failed: 0 });
    expect(stats.steps.slice(1).map((s) => s.reason)).toEqual(['interrupted', 'interrupted']);
  });

  it('gives identical statistics deltas for repeated no-op runs', async () => {
    const step = new CommandStep('No-op', ['true']);
    const first = await runAll([step], { renderer: new RecordingRenderer() });
    const second = await runAll([step], { renderer: new RecordingRenderer() });

    expect(counts(first)).toEqual({ total: 1, completed: 1, skipped: 0, failed: 0 });
    expect(counts(second)).toEqual(counts(first));
  });

  it('renders each step in order', async () => {
    const { executor } = scriptedExecutor({ 'gem update': failed() });
    const renderer = new RecordingRenderer();
    await runAll(
      [
        new CommandStep('Homebrew', ['brew update'], executor),
        new CommandStep('Gems', ['gem update'], executor),
        new FixedStep('Declined'),
      ],
      { renderer, confirm: async (q) => !q.includes('Declined') },
    );

    expect(renderer.log.filter((l) => !l.startsWith('line'))).toEqual([
      'start 3',
      'started 1/3 Homebrew',
      'completed 1/3 Homebrew',
      'started 2/3 Gems',
      'failed 2/3 Gems',
      'skipped 3/3 Declined',
      'finish',
    ]);
  });

  it('records run and step events', async () => {
    const { executor } = scriptedExecutor({ 'gem update': failed() });
    const logger = new MemoryEventLogger();
    await runAll(
      [new CommandStep('Homebrew', ['brew update'], executor), new CommandStep('Gems', ['gem update'], executor)],
      { logger, renderer: new RecordingRenderer() },
    );

    expect(logger.types()).toEqual([
      'run:start',
      'step:started',
      'step:completed',
      'step:started',
      'command:failed',
      'step:failed',
      'run:finished',
    ]);
    expect(logger.events.at(-1)).toMatchObject({
      type: 'run:finished',
      level: 'warn',
      total: 2,
      completed: 1,
      skipped: 0,
      failed: 1,
    });
  });

  it('finalizes the duration', async () => {
    const stats = await runAll([new FixedStep('a')], { renderer: new RecordingRenderer() });
    expect(stats.finishedAt).toBeInstanceOf(Date);
    expect(stats.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('pauses between steps but not after the last', async () => {
    vi.useFakeTimers();
    try {
      const second = new FixedStep('second');
      const run = runAll([new FixedStep('first'), second], { pauseMs: 1000, renderer: new RecordingRenderer() });

      await vi.advanceTimersByTimeAsync(500);
      expect(second.runs).toBe(0);

      await vi.advanceTimersByTimeAsync(500);
      const stats = await run;
      expect(second.runs).toBe(1);
      expect(stats.completed).toBe(2);
    } finally {
      vi.useRealTimers();
    }
  });
});
