/* src/runner/session/run-step.ts
 * Execute one test step: feeder | session, then classify the transcript.
 *
 * Topology (no shell):
 *   feeder  = node -e <write $RELCHECK_SCRIPT to stdout>
 *   session = <invocation>, stdin <- feeder.stdout, stdout/stderr discarded
 */
import { spawn } from 'node:child_process';
import { readFile } from 'node:fs/promises';

import { FatalError, InterruptedError } from '@/runner/errors';
import { withProgress } from '@/runner/progress';
import { type Printer, say } from '@/runner/ui/printer';
import { debugLog } from '@/runner/util/debug';
import {
  DBG_SCOPE_SESSION_CLASSIFY,
  DBG_SCOPE_SESSION_SPAWN,
} from '@/runner/util/debug-scopes';

import { type Classification, classify, transcriptLines } from './classify';
import type { StepCounter } from './counter';
import type { SessionInvocation } from './invocation';
import { buildCommandScript } from './script';
import type { ProcessSupervisor } from './supervisor';
import type { TranscriptStore } from './transcripts';
import { type ChildExit, waitForChild } from './wait';

export type TestStep = {
  description: string;
  statements: readonly string[];
  stopOnFailure: boolean;
};

export type SessionContext = {
  invocation: SessionInvocation;
  counter: StepCounter;
  transcripts: TranscriptStore;
  markers: readonly string[];
  supervisor: ProcessSupervisor;
  signal: AbortSignal;
  printer: Printer;
  verbose?: boolean;
  progressIntervalMs?: number;
};

export type StepResult = {
  step: TestStep;
  transcriptPath: string;
  classification: Classification;
  /** The feeder or session could not be started. */
  launchFailed: boolean;
};

const SCRIPT_ENV = 'RELCHECK_SCRIPT';
const FEEDER_SOURCE = `process.stdout.write(process.env.${SCRIPT_ENV} ?? '')`;

/** Spawn feeder and session and wait for the session to terminate. */
const launchSession = async (
  script: string,
  ctx: SessionContext,
): Promise<ChildExit> => {
  const feeder = spawn(process.execPath, ['-e', FEEDER_SOURCE], {
    stdio: ['ignore', 'pipe', 'ignore'],
    env: { ...process.env, [SCRIPT_ENV]: script },
    windowsHide: true,
  });
  ctx.supervisor.track(feeder);
  const { command, args, cwd } = ctx.invocation;
  const session = spawn(command, [...args], {
    stdio: [feeder.stdout, 'ignore', 'ignore'],
    cwd,
    windowsHide: true,
  });
  ctx.supervisor.track(session);
  // The session holds its own copy of the pipe; ours would keep the feeder
  // from ever emitting 'close'.
  feeder.stdout.destroy();
  debugLog(
    DBG_SCOPE_SESSION_SPAWN,
    `feeder pid ${String(feeder.pid ?? '?')} | ${command} ${args.join(' ')} (pid ${String(session.pid ?? '?')})`,
  );

  // Only the session wait observes the interrupt; the feeder is terminated
  // by the supervisor and its wait settles on its own.
  const feederDone = waitForChild(feeder);
  const sessionExit = await waitForChild(session, ctx.signal);
  if (sessionExit.kind === 'launch-error') feeder.kill();
  const feederExit = await feederDone;
  return feederExit.kind === 'launch-error' ? feederExit : sessionExit;
};

/**
 * Run `step` once. Returns normally on pass, and on fail when the step does
 * not stop on failure; every other outcome is fatal (FatalError /
 * InterruptedError).
 */
export const runStep = async (
  step: TestStep,
  ctx: SessionContext,
): Promise<StepResult> => {
  const { printer } = ctx;
  if (ctx.signal.aborted) throw new InterruptedError();

  const transcriptPath = ctx.transcripts.pathFor(ctx.counter.next());
  const script = buildCommandScript(transcriptPath, step.statements);

  let exit: ChildExit;
  try {
    exit = await withProgress(
      step.description,
      () => launchSession(script, ctx),
      {
        printer,
        level: 'step',
        intervalMs: ctx.progressIntervalMs,
      },
    );
  } catch (e) {
    if (e instanceof InterruptedError) {
      await ctx.supervisor.waitAll();
      say(printer, 'failure', e.message);
    }
    throw e;
  }

  let launchFailed = false;
  if (exit.kind === 'launch-error') {
    launchFailed = true;
    say(printer, 'failure', 'FAILED!');
    if (step.stopOnFailure) {
      throw new FatalError(
        `relcheck: error: could not start the session (${exit.error.message})`,
        { cause: exit.error },
      );
    }
  } else {
    debugLog(
      DBG_SCOPE_SESSION_SPAWN,
      `session exited (code ${String(exit.code)}, signal ${String(exit.signal)})`,
    );
  }

  let text: string;
  try {
    text = await readFile(transcriptPath, 'utf8');
  } catch (e) {
    throw new FatalError(`relcheck: error: ${transcriptPath} not found!`, {
      cause: e,
    });
  }

  const classification = classify(text, ctx.markers);
  debugLog(
    DBG_SCOPE_SESSION_CLASSIFY,
    `${transcriptPath}: ${classification.outcome}${
      classification.markers.length
        ? ` (${classification.markers.map((m) => JSON.stringify(m)).join(', ')})`
        : ''
    }`,
  );
  if (ctx.verbose) say(printer, 'info', `transcript: ${transcriptPath}`);
  if (classification.emptyWarning) {
    say(printer, 'warning', `relcheck: warning: ${transcriptPath} is empty!`);
  }

  if (classification.outcome === 'fail') {
    say(printer, 'failure', 'FAILED!');
    for (const line of transcriptLines(text)) say(printer, 'failure', line);
    if (step.stopOnFailure) {
      throw new FatalError(
        `relcheck: error: ${step.description} failed (transcript: ${transcriptPath})`,
      );
    }
  }

  return { step, transcriptPath, classification, launchFailed };
};
