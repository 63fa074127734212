/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugFallback/debugTrace.
 * Keeping these in one place ensures logs and tests remain consistent.
 */

/** process runner (kill / stdin plumbing) */
export const DBG_SCOPE_EXEC = 'exec:command';

/** git wrapper (every invocation) */
export const DBG_SCOPE_GIT = 'git:run';

/** cache store (corrupt or unreadable notes) */
export const DBG_SCOPE_CACHE_LOOKUP = 'cache:lookup';

/** snapshot executor (temp area cleanup) */
export const DBG_SCOPE_EXECUTOR_CLEANUP = 'executor:cleanup';

/** cli config loader */
export const DBG_SCOPE_CLI_CONFIG_LOAD = 'cli.config:load';
