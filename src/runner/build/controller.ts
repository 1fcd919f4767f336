/* src/runner/build/controller.ts
 * Build controller: clean / configure+build a native dependency located by
 * name prefix. Every operation runs with the working directory switched to
 * the dependency and restored afterwards, on every path.
 */
import { InterruptedError } from '@/runner/errors';
import { withProgress } from '@/runner/progress';
import type { ProcessSupervisor } from '@/runner/session/supervisor';
import { type Printer, say } from '@/runner/ui/printer';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_BUILD_EXEC } from '@/runner/util/debug-scopes';

import { type Operation, runOperation } from './exec';
import { locateTarget } from './locate';

export type BuildState = 'compiled' | 'uncompiled' | 'unknown';

export type BuildTarget = {
  name: string;
  directory: string;
  state: BuildState;
};

export type BuildOperations = {
  clean: Operation;
  configure: Operation;
  make: Operation;
};

export const DEFAULT_BUILD_OPERATIONS: BuildOperations = {
  clean: ['make', 'clean'],
  configure: ['./configure'],
  make: ['make'],
};

/** Run `fn` with process.cwd() switched to `dir`; always switch back. */
export const withWorkingDirectory = async <T>(
  dir: string,
  fn: () => Promise<T>,
): Promise<T> => {
  const prior = process.cwd();
  process.chdir(dir);
  try {
    return await fn();
  } finally {
    process.chdir(prior);
  }
};

export type BuildControllerOptions = {
  printer: Printer;
  supervisor: ProcessSupervisor;
  signal: AbortSignal;
  operations?: BuildOperations;
  progressIntervalMs?: number;
};

export class BuildController {
  private readonly targets = new Map<string, BuildTarget>();
  private readonly operations: BuildOperations;

  constructor(private readonly opts: BuildControllerOptions) {
    this.operations = opts.operations ?? DEFAULT_BUILD_OPERATIONS;
  }

  /** Remove the dependency's compiled artifacts. */
  async clean(rootDir: string, name: string): Promise<BuildTarget> {
    return this.perform(`Deleting ${name} binary`, rootDir, name, 'uncompiled', [
      this.operations.clean,
    ]);
  }

  /** Configure and compile the dependency. */
  async build(rootDir: string, name: string): Promise<BuildTarget> {
    return this.perform(`Compiling ${name}`, rootDir, name, 'compiled', [
      this.operations.configure,
      this.operations.make,
    ]);
  }

  /** Last recorded state of `name` ('unknown' before any operation). */
  state(name: string): BuildState {
    return this.targets.get(name)?.state ?? 'unknown';
  }

  private async perform(
    label: string,
    rootDir: string,
    name: string,
    after: BuildState,
    ops: readonly Operation[],
  ): Promise<BuildTarget> {
    const { printer, supervisor, signal } = this.opts;
    if (signal.aborted) throw new InterruptedError();
    try {
      const directory = await withProgress(
        label,
        async () => {
          const dir = await locateTarget(rootDir, name);
          debugLog(DBG_SCOPE_BUILD_EXEC, `${name} -> ${dir}`);
          await withWorkingDirectory(dir, async () => {
            for (const op of ops) await runOperation(op, dir, supervisor, signal);
          });
          return dir;
        },
        {
          printer,
          level: 'info',
          intervalMs: this.opts.progressIntervalMs,
        },
      );
      const target: BuildTarget = { name, directory, state: after };
      this.targets.set(name, target);
      return target;
    } catch (e) {
      if (e instanceof InterruptedError) {
        await supervisor.waitAll();
        say(printer, 'failure', e.message);
      }
      throw e;
    }
  }
}
