/* src/cli/run/action.ts
 * The `run` command: resolve options, check the setup, build one matrix
 * plan per root and hand them to the runner.
 */
import type { Command } from 'commander';

import { reportFatal } from '@/cli/cli-utils';
import { loadConfigSync } from '@/cli/config/load';
import { FatalError } from '@/runner/errors';
import { buildMatrix } from '@/runner/matrix/plan';
import { packageStatements } from '@/runner/matrix/statements';
import { type RootPlan, type RunOutcome, runPlans } from '@/runner/run';
import type { RunSettings } from '@/runner/run/types';
import { failureMarkerSet } from '@/runner/session/classify';
import type { SessionInvocation } from '@/runner/session/invocation';
import { type Printer, stdoutPrinter } from '@/runner/ui/printer';

import {
  addRunOptions,
  checkSetup,
  pkgDirFor,
  type ResolvedRun,
  resolveRunOptions,
  type RunFlags,
} from './options';

/** Injection points for embedding and tests. */
export type RunDeps = {
  cwd?: string;
  printer?: Printer;
  invocationFor?: (root: string) => SessionInvocation;
};

/** Load config, resolve flags over it and validate the setup. */
export const prepareRun = (flags: RunFlags, cwd: string): ResolvedRun => {
  const opts = resolveRunOptions(flags, loadConfigSync(cwd), cwd);
  checkSetup(opts);
  return opts;
};

export const settingsFor = (opts: ResolvedRun, deps: RunDeps): RunSettings => ({
  session: opts.session,
  markers: failureMarkerSet(packageStatements(opts.loadName).load),
  build: opts.build,
  printer: deps.printer,
  keep: opts.keep,
  logDir: opts.logDir,
  progressIntervalMs: opts.progressIntervalMs,
  invocationFor: deps.invocationFor,
});

/** First configured root (doc and coverage act on one root). */
export const primaryRoot = (opts: ResolvedRun): string => {
  const [root] = opts.roots;
  if (root === undefined) {
    throw new FatalError('relcheck: error: no environment root given');
  }
  return root;
};

export const planFor = (opts: ResolvedRun, root: string): RootPlan => ({
  root,
  pkgDir: pkgDirFor(opts, root),
  entries: buildMatrix({
    root,
    pkgName: opts.pkgName,
    loadName: opts.loadName,
    companion: opts.companion,
    dependencies: opts.dependencies,
    toggle: opts.toggle,
    quickTests: opts.quickTests,
  }),
});

export const performRun = async (
  flags: RunFlags,
  deps: RunDeps = {},
): Promise<RunOutcome> => {
  const opts = prepareRun(flags, deps.cwd ?? process.cwd());
  return runPlans(
    opts.roots.map((root) => planFor(opts, root)),
    settingsFor(opts, deps),
  );
};

export const registerRun = (cli: Command, deps: RunDeps = {}): Command => {
  const cmd = cli
    .command('run', { isDefault: true })
    .description('run the full release validation matrix');
  addRunOptions(cmd);
  cmd.action(async () => {
    const printer = deps.printer ?? stdoutPrinter();
    try {
      await performRun(cmd.opts<RunFlags>(), { ...deps, printer });
    } catch (e) {
      reportFatal(e, printer);
    }
  });
  return cli;
};
