/* src/runner/session/invocation.ts
 * Structured session command line (no shell string).
 */
import { resolve } from 'node:path';

export type SessionInvocation = {
  command: string;
  args: readonly string[];
  cwd?: string;
};

export type SessionSettings = {
  /** Launcher, relative to the environment root unless absolute. */
  command: string;
  /** Workspace ceiling passed with -m. */
  memory: string;
  verbose?: boolean;
};

export const DEFAULT_SESSION: SessionSettings = {
  command: 'bin/gap.sh',
  memory: '1g',
};

/** Non-interactive flags, fixed workspace (-m), quiet (-q) unless verbose. */
export const buildSessionInvocation = (
  root: string,
  settings: SessionSettings = DEFAULT_SESSION,
): SessionInvocation => ({
  command: resolve(root, settings.command),
  args: [
    '-r',
    '-A',
    '-T',
    '-m',
    settings.memory,
    ...(settings.verbose ? [] : ['-q']),
  ],
});
