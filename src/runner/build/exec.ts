/* src/runner/build/exec.ts
 * Run one external build operation with its output discarded.
 * Non-zero status or a launch failure is fatal to the whole run.
 */
import { spawn } from 'node:child_process';

import { FatalError } from '@/runner/errors';
import type { ProcessSupervisor } from '@/runner/session/supervisor';
import { waitForChild } from '@/runner/session/wait';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_BUILD_EXEC } from '@/runner/util/debug-scopes';

/** argv of an external operation, e.g. ['make', 'clean']. */
export type Operation = readonly string[];

export const runOperation = async (
  op: Operation,
  cwd: string,
  supervisor: ProcessSupervisor,
  signal: AbortSignal,
): Promise<void> => {
  const [command, ...args] = op;
  const printable = op.join(' ');
  if (!command) throw new FatalError('relcheck: error: empty build operation');
  const child = spawn(command, args, {
    cwd,
    stdio: 'ignore',
    windowsHide: true,
  });
  supervisor.track(child);
  const exit = await waitForChild(child, signal);
  if (exit.kind === 'launch-error') {
    throw new FatalError(`relcheck: error: ${printable} failed!`, {
      cause: exit.error,
    });
  }
  debugLog(
    DBG_SCOPE_BUILD_EXEC,
    `${printable} in ${cwd}: exit ${String(exit.code)}`,
  );
  if (exit.code !== 0) {
    throw new FatalError(`relcheck: error: ${printable} failed!`);
  }
};
