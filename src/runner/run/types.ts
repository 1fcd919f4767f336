// src/runner/run/types.ts
import type { BuildOperations } from '@/runner/build/controller';
import type { MatrixEntry } from '@/runner/matrix/plan';
import type { SessionInvocation, SessionSettings } from '@/runner/session/invocation';
import type { StepResult } from '@/runner/session/run-step';
import type { Printer } from '@/runner/ui/printer';

/** One environment root and the plan to walk against it. */
export type RootPlan = {
  root: string;
  /** Directory holding the native dependencies for this root. */
  pkgDir: string;
  entries: readonly MatrixEntry[];
};

export type RunSettings = {
  session: SessionSettings;
  /** Failure markers (fixed for the whole run). */
  markers: readonly string[];
  build?: BuildOperations;
  printer?: Printer;
  /** Keep the temporary transcript directory after a successful run. */
  keep?: boolean;
  /** Write transcripts here instead of a temporary directory. */
  logDir?: string;
  progressIntervalMs?: number;
  /** Override the session command line (defaults to the root's launcher). */
  invocationFor?: (root: string) => SessionInvocation;
};

export type RunOutcome = {
  results: StepResult[];
  transcriptsDir: string;
  /** Steps executed (last step number handed out). */
  steps: number;
};
