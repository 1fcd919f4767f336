/* src/cli/doc.ts
 * The `doc` command: build the package documentation against the first root.
 */
import type { Command } from 'commander';

import { docStep } from '@/runner/matrix/plan';
import { type RunOutcome, runPlans } from '@/runner/run';
import { stdoutPrinter } from '@/runner/ui/printer';

import { reportFatal } from './cli-utils';
import {
  prepareRun,
  primaryRoot,
  type RunDeps,
  settingsFor,
} from './run/action';
import { addRunOptions, pkgDirFor, type RunFlags } from './run/options';

export const performDoc = async (
  flags: RunFlags,
  deps: RunDeps = {},
): Promise<RunOutcome> => {
  const opts = prepareRun(flags, deps.cwd ?? process.cwd());
  const root = primaryRoot(opts);
  return runPlans(
    [
      {
        root,
        pkgDir: pkgDirFor(opts, root),
        entries: [
          { kind: 'heading', text: `Building documentation in ${root}` },
          docStep(opts.loadName),
          { kind: 'success' },
        ],
      },
    ],
    settingsFor(opts, deps),
  );
};

export const registerDoc = (cli: Command, deps: RunDeps = {}): Command => {
  const cmd = cli
    .command('doc')
    .description('build the package documentation only');
  addRunOptions(cmd);
  cmd.action(async () => {
    const printer = deps.printer ?? stdoutPrinter();
    try {
      await performDoc(cmd.opts<RunFlags>(), { ...deps, printer });
    } catch (e) {
      reportFatal(e, printer);
    }
  });
  return cli;
};
