// src/cli/bin/relcheck.ts
// CLI bootstrap (executes the parser).
import { CommanderError } from 'commander';

import { makeCli } from '..';

makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    // Commander has already printed help and usage errors.
    if (!(e instanceof CommanderError)) console.error(e);
    process.exitCode = e instanceof CommanderError ? e.exitCode : 1;
  });
