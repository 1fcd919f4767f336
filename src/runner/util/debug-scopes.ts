/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugLog(...).
 * Keeping these in one place ensures logs and tests remain consistent.
 */

/** session runner: spawn/exit of feeder and session processes */
export const DBG_SCOPE_SESSION_SPAWN = 'session.run:spawn';

/** session runner: transcript path and classification */
export const DBG_SCOPE_SESSION_CLASSIFY = 'session.run:classify';

/** build controller: located directory and operation results */
export const DBG_SCOPE_BUILD_EXEC = 'build.controller:exec';

/** transcript store: retention decisions */
export const DBG_SCOPE_TRANSCRIPTS = 'session.transcripts:retain';

/** cli config loader */
export const DBG_SCOPE_CLI_CONFIG_LOAD = 'cli.config:load';
