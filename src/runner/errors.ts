/* src/runner/errors.ts
 * Fatal conditions end the whole run. They are thrown, never handled by
 * process.exit below the CLI layer, so callers (and tests) observe them.
 */

export class FatalError extends Error {
  readonly exitCode: number;
  /** True once the message has been shown to the operator. */
  readonly reported: boolean;

  constructor(
    message: string,
    opts?: { exitCode?: number; reported?: boolean; cause?: unknown },
  ) {
    super(message, { cause: opts?.cause });
    this.name = 'FatalError';
    this.exitCode = opts?.exitCode ?? 1;
    this.reported = opts?.reported ?? false;
  }
}

/** Operator interrupt (SIGINT). Always fatal to the entire run. */
export class InterruptedError extends FatalError {
  constructor() {
    super('Killed!', { reported: true });
    this.name = 'InterruptedError';
  }
}
