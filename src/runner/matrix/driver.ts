/* src/runner/matrix/driver.ts
 * Walk a matrix plan strictly in order. A step or build operation that
 * throws ends the walk; nothing after it runs.
 */
import { InterruptedError } from '@/runner/errors';
import type { StepResult, TestStep } from '@/runner/session/run-step';
import { type Printer, say } from '@/runner/ui/printer';

import type { MatrixEntry } from './plan';

export type MatrixDeps = {
  runStep: (step: TestStep) => Promise<StepResult>;
  clean: (target: string) => Promise<unknown>;
  build: (target: string) => Promise<unknown>;
  printer: Printer;
  signal?: AbortSignal;
};

/** @returns results of the steps that ran, in order. */
export const executeMatrix = async (
  entries: readonly MatrixEntry[],
  deps: MatrixDeps,
): Promise<StepResult[]> => {
  const { printer } = deps;
  const results: StepResult[] = [];
  for (const entry of entries) {
    if (deps.signal?.aborted) throw new InterruptedError();
    switch (entry.kind) {
      case 'heading':
        printer.line();
        say(printer, 'heading', entry.text);
        break;
      case 'step':
        results.push(await deps.runStep(entry.step));
        break;
      case 'clean':
        await deps.clean(entry.target);
        break;
      case 'build':
        await deps.build(entry.target);
        break;
      case 'success':
        printer.line();
        say(printer, 'success', 'SUCCESS!');
        break;
    }
  }
  return results;
};
