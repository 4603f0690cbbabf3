/* src/util/debug-scopes.ts
 * Centralized labels for debugTrace.
 * Keeping these in one place ensures logs and tests remain consistent.
 */

/** monitor loop phase changes */
export const DBG_SCOPE_LOOP = 'monitor.loop';

/** per-tick source reads */
export const DBG_SCOPE_SOURCE = 'monitor.source';

/** notification dispatch and fallbacks */
export const DBG_SCOPE_NOTIFY = 'monitor.notify';

/** state file writes/removals */
export const DBG_SCOPE_STATE = 'monitor.state';

/** config file discovery and merge */
export const DBG_SCOPE_CONFIG = 'cli.config:load';
