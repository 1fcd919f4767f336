/* src/runner/run/service.ts
 * Run one or more matrix plans: wire the shared run state (step counter,
 * transcript store, child supervision, interrupt handling) and hand every
 * entry to the driver in order.
 */
import { BuildController } from '@/runner/build/controller';
import { executeMatrix } from '@/runner/matrix/driver';
import { StepCounter } from '@/runner/session/counter';
import { buildSessionInvocation } from '@/runner/session/invocation';
import { runStep, type SessionContext } from '@/runner/session/run-step';
import { attachInterrupts } from '@/runner/session/signals';
import { ProcessSupervisor } from '@/runner/session/supervisor';
import { type RunEnd, TranscriptStore } from '@/runner/session/transcripts';
import { say, stdoutPrinter } from '@/runner/ui/printer';

import type { RootPlan, RunOutcome, RunSettings } from './types';

export const runPlans = async (
  plans: readonly RootPlan[],
  settings: RunSettings,
): Promise<RunOutcome> => {
  const printer = settings.printer ?? stdoutPrinter();
  const supervisor = new ProcessSupervisor();
  const interrupts = attachInterrupts(supervisor);
  const counter = new StepCounter();
  let end: RunEnd = 'failure';
  let transcripts: TranscriptStore | undefined;
  try {
    transcripts = await TranscriptStore.create({ logDir: settings.logDir });
    const controller = new BuildController({
      printer,
      supervisor,
      signal: interrupts.signal,
      operations: settings.build,
      progressIntervalMs: settings.progressIntervalMs,
    });
    const results: RunOutcome['results'] = [];
    for (const plan of plans) {
      const ctx: SessionContext = {
        invocation:
          settings.invocationFor?.(plan.root) ??
          buildSessionInvocation(plan.root, settings.session),
        counter,
        transcripts,
        markers: settings.markers,
        supervisor,
        signal: interrupts.signal,
        printer,
        verbose: settings.session.verbose,
        progressIntervalMs: settings.progressIntervalMs,
      };
      const ran = await executeMatrix(plan.entries, {
        runStep: (step) => runStep(step, ctx),
        clean: (target) => controller.clean(plan.pkgDir, target),
        build: (target) => controller.build(plan.pkgDir, target),
        printer,
        signal: interrupts.signal,
      });
      results.push(...ran);
    }
    end = 'success';
    return { results, transcriptsDir: transcripts.dir, steps: counter.current };
  } finally {
    interrupts.detach();
    if (transcripts) {
      const removed = await transcripts.finish(end, settings.keep);
      if (!removed && counter.current > 0) {
        say(printer, 'info', `transcripts: ${transcripts.dir}`);
      }
    }
  }
};
