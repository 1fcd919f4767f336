/* src/runner/session/wait.ts
 * Await a child's termination, racing the run's abort signal.
 */
import type { ChildProcess } from 'node:child_process';

import { InterruptedError } from '@/runner/errors';

export type ChildExit =
  | { kind: 'exited'; code: number | null; signal: NodeJS.Signals | null }
  | { kind: 'launch-error'; error: Error };

/**
 * Resolve with how the child ended: exited (any status) or failed to launch.
 * Rejects with InterruptedError when `signal` aborts first.
 */
export const waitForChild = (
  child: ChildProcess,
  signal?: AbortSignal,
): Promise<ChildExit> =>
  new Promise<ChildExit>((resolveP, rejectP) => {
    if (signal?.aborted) {
      rejectP(new InterruptedError());
      return;
    }
    const cleanup = (): void => {
      signal?.removeEventListener('abort', onAbort);
      child.off('error', onError);
      child.off('close', onClose);
    };
    const onAbort = (): void => {
      cleanup();
      rejectP(new InterruptedError());
    };
    const onError = (error: Error): void => {
      cleanup();
      resolveP({ kind: 'launch-error', error });
    };
    const onClose = (
      code: number | null,
      sig: NodeJS.Signals | null,
    ): void => {
      cleanup();
      resolveP({ kind: 'exited', code, signal: sig });
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    child.once('error', onError);
    child.once('close', onClose);
  });
