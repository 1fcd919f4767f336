/* src/runner/exit.ts
 * Process exit hooks: synchronous cleanup that must run however the process
 * ends (normal completion, process.exit, uncaught error).
 */

/** Install `fn` on process 'exit'; returns an idempotent uninstaller. */
export const installExitHook = (fn: () => void): (() => void) => {
  const handler = (): void => {
    try {
      fn();
    } catch {
      /* exiting anyway */
    }
  };
  process.on('exit', handler);
  let installed = true;
  return () => {
    if (!installed) return;
    installed = false;
    process.off('exit', handler);
  };
};
