/* src/runner/session/supervisor.ts
 * Tracks live child processes so an interrupt can terminate all of them.
 * SIGTERM first; a process tree still alive after the grace period is
 * SIGKILLed.
 */
import type { ChildProcess } from 'node:child_process';

import treeKill from 'tree-kill';

import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_SESSION_SPAWN } from '@/runner/util/debug-scopes';

const alive = (child: ChildProcess): boolean =>
  child.exitCode === null && child.signalCode === null;

export class ProcessSupervisor {
  private readonly live = new Set<ChildProcess>();

  constructor(private readonly graceMs = 2000) {}

  track(child: ChildProcess): void {
    this.live.add(child);
    const drop = (): void => {
      this.live.delete(child);
    };
    child.once('exit', drop);
    child.once('error', drop);
  }

  /** Number of tracked processes that have not exited yet. */
  get size(): number {
    return this.live.size;
  }

  killAll(): void {
    for (const child of this.live) {
      debugLog(
        DBG_SCOPE_SESSION_SPAWN,
        `terminating pid ${String(child.pid ?? '?')}`,
      );
      child.kill('SIGTERM');
      const pid = child.pid;
      if (typeof pid !== 'number') continue;
      const escalate = setTimeout(() => {
        if (!alive(child)) return;
        treeKill(pid, 'SIGKILL', (err) => {
          if (err)
            debugLog(
              DBG_SCOPE_SESSION_SPAWN,
              `SIGKILL ${String(pid)}: ${err.message}`,
            );
        });
      }, this.graceMs);
      escalate.unref();
      child.once('exit', () => clearTimeout(escalate));
    }
  }

  /** Resolve once every tracked process has exited (or after timeoutMs). */
  async waitAll(timeoutMs = 3000): Promise<void> {
    const pending = [...this.live].filter(alive);
    if (pending.length === 0) return;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((r) => {
      timer = setTimeout(r, timeoutMs);
    });
    const exits = Promise.all(
      pending.map(
        (c) => new Promise<void>((r) => c.once('exit', () => r())),
      ),
    ).then(() => undefined);
    await Promise.race([exits, timeout]);
    clearTimeout(timer);
  }
}
