/* src/runner/progress/index.ts
 * Progress reporter: animate a recurring indicator while a long-running call
 * is awaited. The animation is a timer on the event loop; the only state it
 * shares with the wrapped call is the handle used to stop it.
 */
import type { HighlightLevel } from '@/runner/util/color';
import { highlight } from '@/runner/util/color';
import type { Printer } from '@/runner/ui/printer';
import { pad } from '@/runner/ui/printer';

import { hideCursor } from './cursor';

export const DEFAULT_DOT_INTERVAL_MS = 1000;

export type ProgressOptions = {
  printer: Printer;
  /** Highlight for the label and the dots. */
  level?: HighlightLevel;
  /** Animation interval (ms). */
  intervalMs?: number;
  /** Indicator written on every tick. */
  dot?: string;
};

/**
 * Run `fn` under an animated progress row.
 * The cursor is hidden for the duration and always restored, followed by a
 * newline, whether `fn` resolves, rejects or the run is interrupted.
 */
export const withProgress = async <T>(
  label: string,
  fn: () => Promise<T>,
  opts: ProgressOptions,
): Promise<T> => {
  const { printer } = opts;
  const level = opts.level ?? 'step';
  const dot = highlight(level, opts.dot ?? '. ', printer.isTTY);
  const intervalMs = opts.intervalMs ?? DEFAULT_DOT_INTERVAL_MS;

  const release = hideCursor(printer);
  printer.write(highlight(level, `${pad(label)} . . . `, printer.isTTY));
  const timer = setInterval(() => printer.write(dot), intervalMs);
  try {
    return await fn();
  } finally {
    clearInterval(timer);
    release();
    printer.line();
  }
};
