/* src/runner/ui/printer.ts
 * Operator-facing output. Everything the orchestrator shows goes through a
 * Printer so tests can capture it without touching process.stdout.
 */
import { highlight, type HighlightLevel } from '@/runner/util/color';

export type Printer = {
  /** Whether the underlying output is an interactive terminal. */
  readonly isTTY: boolean;
  /** Write raw text (no newline). */
  write(s: string): void;
  /** Write a full line. */
  line(s?: string): void;
};

export const stdoutPrinter = (): Printer => ({
  get isTTY() {
    return Boolean(process.stdout.isTTY);
  },
  write(s) {
    process.stdout.write(s);
  },
  line(s = '') {
    process.stdout.write(`${s}\n`);
  },
});

/** Highlighted line helper bound to the printer's TTY-ness. */
export const say = (
  printer: Printer,
  level: HighlightLevel,
  s: string,
): void => {
  printer.line(highlight(level, s, printer.isTTY));
};

/** Right-pad a label to the fixed column used for step/build rows. */
export const pad = (s: string, width = 27): string =>
  s.length >= width ? s : s + ' '.repeat(width - s.length);
