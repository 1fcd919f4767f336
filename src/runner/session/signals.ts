/* src/runner/session/signals.ts
 * Run-wide interrupt handling. SIGINT terminates every tracked child and
 * aborts the run signal; whoever is waiting on a child observes the abort
 * and ends the run.
 */
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_SESSION_SPAWN } from '@/runner/util/debug-scopes';

import type { ProcessSupervisor } from './supervisor';

export type Interrupts = {
  readonly signal: AbortSignal;
  /** Remove the SIGINT handler (idempotent). */
  detach(): void;
};

/** Interrupt source: the process, or any emitter of 'SIGINT'. */
export type SignalSource = {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
};

export const attachInterrupts = (
  supervisor: ProcessSupervisor,
  source: SignalSource = process,
): Interrupts => {
  const controller = new AbortController();
  const onSigint = (): void => {
    debugLog(DBG_SCOPE_SESSION_SPAWN, 'SIGINT received');
    supervisor.killAll();
    controller.abort();
  };
  source.on('SIGINT', onSigint);
  let attached = true;
  return {
    signal: controller.signal,
    detach: () => {
      if (!attached) return;
      attached = false;
      source.off('SIGINT', onSigint);
    },
  };
};
