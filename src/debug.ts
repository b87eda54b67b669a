/**
 * @fileoverview Debug Logging Utilities
 *
 * Provides opt-in debug logging gated by an environment flag. When debug
 * mode is enabled (`<PREFIX>_DEBUG_MODE=true`), all debug calls forward to
 * the console. When disabled, they are dropped.
 *
 * The prefix is configurable via {@link _setDebugPrefix} (set by
 * {@link setup.ts#createSyncEngine}) so several engines in one process
 * can be toggled independently.
 *
 * @example
 * // Enable debug mode for a single run:
 * //   TIDEWATER_DEBUG_MODE=true node app.js
 *
 * // Or programmatically:
 * import { setDebugMode } from 'tidewater-sync';
 * setDebugMode(true);
 */

// =============================================================================
// Internal State
// =============================================================================

/** Cached result of the environment check (avoids repeated reads). */
let debugEnabled: boolean | null = null;

/** Configurable prefix for the environment flag (default: `'tidewater'`). */
let debugPrefix = 'tidewater';

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Set the prefix used for the debug environment flag.
 *
 * Resets the cached flag so the next check reads the new variable.
 *
 * @param prefix - Application-specific prefix (e.g., `'myapp'`).
 * @internal
 */
export function _setDebugPrefix(prefix: string) {
  debugPrefix = prefix;
  debugEnabled = null;
}

/** Name of the environment variable consulted for the current prefix. */
export function debugEnvVar(): string {
  return `${debugPrefix.toUpperCase()}_DEBUG_MODE`;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Check whether debug mode is currently enabled.
 *
 * Reads `process.env.<PREFIX>_DEBUG_MODE` on the first call and caches the
 * result. Returns `false` where `process` is unavailable.
 */
export function isDebugMode(): boolean {
  if (debugEnabled !== null) return debugEnabled;
  debugEnabled =
    typeof process !== 'undefined' && process.env[debugEnvVar()]?.toLowerCase() === 'true';
  return debugEnabled;
}

/**
 * Enable or disable debug mode at runtime.
 *
 * Overrides the environment flag until the prefix changes.
 */
export function setDebugMode(enabled: boolean) {
  debugEnabled = enabled;
}

/**
 * Log a debug message at the `console.log` level.
 *
 * No-op when debug mode is disabled.
 */
export function debugLog(...args: unknown[]) {
  if (isDebugMode()) console.log(...args);
}

/**
 * Log a debug message at the `console.warn` level.
 *
 * No-op when debug mode is disabled.
 */
export function debugWarn(...args: unknown[]) {
  if (isDebugMode()) console.warn(...args);
}

/**
 * Log a debug message at the `console.error` level.
 *
 * No-op when debug mode is disabled.
 */
export function debugError(...args: unknown[]) {
  if (isDebugMode()) console.error(...args);
}
