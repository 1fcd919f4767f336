/* src/runner/util/color.ts
 * Meaning-based highlighting that respects RELCHECK_BORING/NO_COLOR/FORCE_COLOR.
 * BORING or non‑TTY => unstyled strings.
 */
import chalk from 'chalk';

export type HighlightLevel =
  | 'info'
  | 'success'
  | 'failure'
  | 'warning'
  | 'step'
  | 'heading';

export function isBoring(tty: boolean = Boolean(process.stdout.isTTY)): boolean {
  return (
    process.env.RELCHECK_BORING === '1' ||
    process.env.NO_COLOR === '1' ||
    process.env.FORCE_COLOR === '0' ||
    !tty
  );
}

const styles: Record<HighlightLevel, (s: string) => string> = {
  info: (s) => chalk.cyan(s),
  success: (s) => chalk.green(s),
  failure: (s) => chalk.red(s),
  warning: (s) => chalk.hex('#FFA500')(s), // orange
  step: (s) => chalk.magenta(s),
  heading: (s) => chalk.bgBlue(s),
};

/** Style `s` for the given level; identity in BORING/non‑TTY. */
export const highlight = (
  level: HighlightLevel,
  s: string,
  tty?: boolean,
): string => (isBoring(tty) ? s : styles[level](s));
