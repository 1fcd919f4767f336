/* src/runner/session/transcripts.ts
 * Where transcripts live and when they are removed.
 * - default: a fresh mkdtemp directory, removed after a successful run unless kept
 * - --log-dir: a caller-owned directory, created when missing, never removed
 */
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { ensureDir, remove } from 'fs-extra/esm';

import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_TRANSCRIPTS } from '@/runner/util/debug-scopes';

export type RunEnd = 'success' | 'failure';

export class TranscriptStore {
  private constructor(
    readonly dir: string,
    readonly temporary: boolean,
  ) {}

  static async create(opts?: { logDir?: string }): Promise<TranscriptStore> {
    if (opts?.logDir) {
      const dir = resolve(opts.logDir);
      await ensureDir(dir);
      return new TranscriptStore(dir, false);
    }
    const dir = await mkdtemp(join(tmpdir(), 'relcheck-'));
    return new TranscriptStore(dir, true);
  }

  /** Transcript file for step number `n`. */
  pathFor(n: number): string {
    return join(this.dir, `test-${String(n)}.log`);
  }

  /**
   * Apply the retention policy at the end of a run.
   * @returns true when the directory was removed.
   */
  async finish(end: RunEnd, keep = false): Promise<boolean> {
    if (!this.temporary || keep || end === 'failure') {
      debugLog(DBG_SCOPE_TRANSCRIPTS, `keeping ${this.dir} (${end})`);
      return false;
    }
    await remove(this.dir);
    debugLog(DBG_SCOPE_TRANSCRIPTS, `removed ${this.dir}`);
    return true;
  }
}
