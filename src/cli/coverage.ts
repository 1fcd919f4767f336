/* src/cli/coverage.ts
 * The `coverage <file>` command: profile one test file line by line and
 * write annotated coverage pages to a fresh directory.
 */
import { existsSync } from 'node:fs';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join, resolve } from 'node:path';

import type { Command } from 'commander';

import { FatalError } from '@/runner/errors';
import {
  coverageStatements,
  packageStatements,
} from '@/runner/matrix/statements';
import { type RunOutcome, runPlans } from '@/runner/run';
import { say, stdoutPrinter } from '@/runner/ui/printer';

import { reportFatal } from './cli-utils';
import {
  prepareRun,
  primaryRoot,
  type RunDeps,
  settingsFor,
} from './run/action';
import { addRunOptions, pkgDirFor, type RunFlags } from './run/options';

export type CoverageOutcome = RunOutcome & {
  outDir: string;
  /** Entry page of the annotated sources. */
  index: string;
};

export const performCoverage = async (
  file: string,
  flags: RunFlags,
  deps: RunDeps = {},
): Promise<CoverageOutcome> => {
  const cwd = deps.cwd ?? process.cwd();
  const opts = prepareRun(flags, cwd);
  const root = primaryRoot(opts);
  const testFile = resolve(cwd, file);
  if (!existsSync(testFile)) {
    throw new FatalError(`relcheck: error: ${testFile} not found!`);
  }
  const outDir = await mkdtemp(join(tmpdir(), 'relcheck-coverage-'));
  const statements = coverageStatements({
    load: packageStatements(opts.loadName).load,
    testFile,
    sourcesDir: join(root, 'pkg', opts.pkgName, 'gap'),
    outDir,
  });
  const settings = settingsFor(opts, deps);
  const outcome = await runPlans(
    [
      {
        root,
        pkgDir: pkgDirFor(opts, root),
        entries: [
          {
            kind: 'step',
            step: {
              description: `Profiling ${basename(testFile)}`,
              statements,
              stopOnFailure: true,
            },
          },
        ],
      },
    ],
    settings,
  );
  const index = join(outDir, 'index.html');
  say(settings.printer ?? stdoutPrinter(), 'success', `coverage: ${index}`);
  return { ...outcome, outDir, index };
};

export const registerCoverage = (
  cli: Command,
  deps: RunDeps = {},
): Command => {
  const cmd = cli
    .command('coverage')
    .description('profile a single test file and annotate the sources')
    .argument('<file>', 'test file to profile');
  addRunOptions(cmd);
  cmd.action(async (file: string) => {
    const printer = deps.printer ?? stdoutPrinter();
    try {
      await performCoverage(file, cmd.opts<RunFlags>(), { ...deps, printer });
    } catch (e) {
      reportFatal(e, printer);
    }
  });
  return cli;
};
