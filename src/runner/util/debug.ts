/* src/runner/util/debug.ts
 * Centralized, opt-in debug logger.
 * Emits only when RELCHECK_DEBUG=1 to avoid noisy output in normal mode.
 */

export const debugOn = (): boolean => process.env.RELCHECK_DEBUG === '1';

/** Log a concise debug line under RELCHECK_DEBUG=1 (scope: module:function). */
export const debugLog = (scope: string, message: string): void => {
  if (!debugOn()) return;
  // stderr to keep separation from operator output
  console.error(`relcheck: debug: ${scope}: ${message}`);
};
