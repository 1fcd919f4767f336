/** Shared Commander helpers for the relcheck CLI. */
import type { Option } from 'commander';

import { loadConfigSync } from '@/cli/config/load';
import type { CliDefaults } from '@/cli/config/schema';
import { FatalError } from '@/runner/errors';
import { showCursor } from '@/runner/progress/cursor';
import { type Printer, say } from '@/runner/ui/printer';

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}

/** cliDefaults from the config, or {} when the config cannot be read. */
export const safeCliDefaults = (cwd: string): CliDefaults => {
  try {
    return loadConfigSync(cwd).config.cliDefaults ?? {};
  } catch {
    // reported by the action that loads the config for real
    return {};
  }
};

/**
 * Final error boundary of an action: make the cursor visible, show the
 * failure once and set the exit code. Never rethrows.
 */
export const reportFatal = (e: unknown, printer: Printer): void => {
  showCursor(printer);
  if (e instanceof FatalError) {
    if (!e.reported) say(printer, 'failure', e.message);
    process.exitCode = e.exitCode;
    return;
  }
  const msg = e instanceof Error ? e.message : String(e);
  say(printer, 'failure', `relcheck: error: ${msg}`);
  process.exitCode = 1;
};
