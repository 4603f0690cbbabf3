/* src/util/debug.ts
 * Centralized, opt-in debug logger.
 * Emits only when WFMON_DEBUG=1 to avoid noisy output in normal mode.
 */

export const debugEnabled = (): boolean => process.env.WFMON_DEBUG === '1';

/** Log a concise trace line under WFMON_DEBUG=1 (scope: module:function). */
export const debugTrace = (scope: string, message: string): void => {
  if (!debugEnabled()) return;
  // stderr to keep separation from the dashboard
  console.error(`wfmon: debug: ${scope}: ${message}`);
};
