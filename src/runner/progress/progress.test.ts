import { afterEach, describe, expect, it, vi } from 'vitest';

import { pad } from '@/runner/ui/printer';
import { memoryPrinter } from '@/test-support/session';

import { HIDE_CURSOR, SHOW_CURSOR } from './cursor';
import { withProgress } from './index';

describe('withProgress', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('writes the label, one dot per interval and a final newline', async () => {
    vi.useFakeTimers();
    const mem = memoryPrinter();
    const pending = withProgress(
      'Loading',
      () => new Promise<number>((r) => setTimeout(() => r(5), 2500)),
      { printer: mem.printer, intervalMs: 1000 },
    );
    await vi.advanceTimersByTimeAsync(2500);
    await expect(pending).resolves.toBe(5);
    expect(mem.text()).toBe(`${pad('Loading')} . . . . . \n`);
    // stopped: no more dots
    await vi.advanceTimersByTimeAsync(5000);
    expect(mem.text()).toBe(`${pad('Loading')} . . . . . \n`);
  });

  it('hides the cursor on a terminal and restores it when the call rejects', async () => {
    const mem = memoryPrinter(true);
    const exitListeners = process.listenerCount('exit');
    await expect(
      withProgress(
        'Build',
        async () => {
          throw new Error('boom');
        },
        { printer: mem.printer, intervalMs: 60_000 },
      ),
    ).rejects.toThrow('boom');
    expect(mem.text()).toBe(
      `${HIDE_CURSOR}${pad('Build')} . . . ${SHOW_CURSOR}\n`,
    );
    expect(process.listenerCount('exit')).toBe(exitListeners);
  });

  it('leaves the cursor alone on non-interactive output', async () => {
    const mem = memoryPrinter(false);
    await withProgress('Step', async () => 1, {
      printer: mem.printer,
      intervalMs: 60_000,
    });
    expect(mem.text()).toBe(`${pad('Step')} . . . \n`);
  });
});
