/* src/runner/progress/cursor.ts
 * Scoped "cursor hidden" state. Hiding returns a release function that shows
 * the cursor again; release is idempotent and also runs on process exit.
 */
import { installExitHook } from '@/runner/exit';
import type { Printer } from '@/runner/ui/printer';

const CSI = '\x1b['; // Control Sequence Introducer
export const HIDE_CURSOR = `${CSI}?25l`;
export const SHOW_CURSOR = `${CSI}?25h`;

/** Write the show-cursor sequence (no-op on non-interactive output). */
export const showCursor = (printer: Printer): void => {
  if (printer.isTTY) printer.write(SHOW_CURSOR);
};

export const hideCursor = (printer: Printer): (() => void) => {
  if (!printer.isTTY) return () => undefined;
  printer.write(HIDE_CURSOR);
  let released = false;
  const release = (): void => {
    if (released) return;
    released = true;
    uninstall();
    printer.write(SHOW_CURSOR);
  };
  const uninstall = installExitHook(release);
  return release;
};
