/* src/runner/util/debug.ts
 * Opt-in debug logger for fallback paths.
 * Emits only when DOCBRANCH_DEBUG=1 to avoid noisy output in normal mode.
 */

export const debugOn = (): boolean => process.env.DOCBRANCH_DEBUG === '1';

/** Log a concise fallback notice (scope: module:function; reason/message). */
export const debugFallback = (scope: string, reason: string): void => {
  if (!debugOn()) return;
  // stderr to keep separation from normal logs
  console.error(`docbranch: debug: fallback: ${scope}: ${reason}`);
};

/** Log a debug trace line. */
export const debugTrace = (scope: string, message: string): void => {
  if (!debugOn()) return;
  console.error(`docbranch: debug: ${scope}: ${message}`);
};
