/* src/cli/index.ts
 * Root CLI factory for relcheck: global -d/--debug and -b/--boring, the
 * default `run` command plus `doc` and `coverage`. No side effects until
 * parsed; Commander errors (help included) are thrown, never exited on.
 */
import { Command, Option } from 'commander';

import { safeCliDefaults, tagDefault } from './cli-utils';
import { registerCoverage } from './coverage';
import { registerDoc } from './doc';
import { registerRun, type RunDeps } from './run/action';

type RootFlags = { debug?: boolean; boring?: boolean };

/** Map the resolved -d/-b values onto the environment read by the runner. */
export const applyRootFlags = (debug: boolean, boring: boolean): void => {
  if (debug) process.env.RELCHECK_DEBUG = '1';
  else delete process.env.RELCHECK_DEBUG;
  if (boring) process.env.RELCHECK_BORING = '1';
  else delete process.env.RELCHECK_BORING;
};

/**
 * Build the root CLI.
 *
 * @param deps - injection points forwarded to every command (tests).
 */
export const makeCli = (deps: RunDeps = {}): Command => {
  const cwd = () => deps.cwd ?? process.cwd();
  const defaults = safeCliDefaults(cwd());
  const cli = new Command();

  cli
    .name('relcheck')
    .description(
      'Run a package release validation matrix against one or more environments.',
    );

  const optDebug = new Option('-d, --debug', 'enable verbose debug logging');
  const optNoDebug = new Option('-D, --no-debug', 'disable debug logging');
  tagDefault(defaults.debug ? optDebug : optNoDebug, true);
  cli.addOption(optDebug).addOption(optNoDebug);

  const optBoring = new Option('-b, --boring', 'disable color and styling');
  const optNoBoring = new Option('-B, --no-boring', 'keep color and styling');
  tagDefault(defaults.boring ? optBoring : optNoBoring, true);
  cli.addOption(optBoring).addOption(optNoBoring);

  // Throw instead of exiting; set before subcommands so they inherit it.
  cli.exitOverride();

  // flag > config > environment
  cli.hook('preAction', () => {
    const opts = cli.opts<RootFlags>();
    const fromConfig = safeCliDefaults(cwd());
    const debug =
      opts.debug ?? fromConfig.debug ?? process.env.RELCHECK_DEBUG === '1';
    const boring =
      opts.boring ?? fromConfig.boring ?? process.env.RELCHECK_BORING === '1';
    applyRootFlags(debug, boring);
  });

  registerRun(cli, deps);
  registerDoc(cli, deps);
  registerCoverage(cli, deps);
  return cli;
};
