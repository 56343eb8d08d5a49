import { describe, it, expect } from 'vitest';
import { stripVTControlCharacters } from 'node:util';
import { QuietRenderer, stepLabel } from '../src/lib/ui/progress.js';
import { SpinnerRenderer } from '../src/lib/ui/spinner.js';
import { memoryStream } from './helpers/fakes.js';

describe('stepLabel', () => {
  it('is one-based', () => {
    expect(stepLabel(0, 16)).toBe('[1/16]');
  });
});

describe('QuietRenderer', () => {
  it('rewrites one line and appends a glyph per step', () => {
    const out = memoryStream();
    const renderer = new QuietRenderer(out.stream);

    renderer.runStarted();
    const progress = renderer.stepStarted(0, 3, 'Updating Homebrew');
    progress.println('hidden output');
    renderer.stepFinished(0, 3, 'Updating Homebrew', 'completed');
    renderer.stepStarted(1, 3, 'Updating npm packages');
    renderer.stepFinished(1, 3, 'Updating npm packages', 'failed');
    renderer.stepFinished(2, 3, 'Optimizing Xcode', 'skipped');
    renderer.runFinished();

    expect(out.text()).toBe(
      '\r🔧 [1/3] Updating Homebrew... ✅' +
        '\r🔧 [2/3] Updating npm packages... ❌' +
        '\r🔧 [3/3] Optimizing Xcode... ⏭️' +
        '\n',
    );
  });
});

describe('SpinnerRenderer', () => {
  it('prints plain lines without a terminal', () => {
    const out = memoryStream();
    const renderer = new SpinnerRenderer(out.stream);

    renderer.runStarted(3);
    const progress = renderer.stepStarted(0, 3, 'Updating Homebrew');
    progress.setMessage('Updating Homebrew (step 2 of 2)');
    progress.println('Already up-to-date.');
    renderer.stepFinished(0, 3, 'Updating Homebrew', 'completed');
    renderer.stepStarted(1, 3, 'Updating npm packages');
    renderer.stepFinished(1, 3, 'Updating npm packages', 'failed');
    renderer.stepFinished(2, 3, 'Optimizing Xcode', 'skipped');
    renderer.runFinished();

    expect(stripVTControlCharacters(out.text()).split('\n')).toEqual([
      '🔧 Starting 3 maintenance steps...',
      '',
      '[1/3] Updating Homebrew...',
      'Already up-to-date.',
      '[1/3] ✅ Updating Homebrew',
      '[2/3] Updating npm packages...',
      '[2/3] ❌ Failed: Updating npm packages',
      '⏭️ [3/3] Skipped.',
      '',
    ]);
  });
});
