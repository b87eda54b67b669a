/**
 * Delay computations shared by the outbox, the realtime reconnection loop
 * and the offline message queue.
 */

import type { ReconnectConfig, SyncConfig } from './config';

/**
 * Delay before retrying a whole sync pass.
 *
 * Called after the failed operations had their retry counts bumped, so an
 * average of 1 is the first retry: `initialRetryDelayMs * backoffMultiplier ^
 * (averageRetryCount - 1)`, clamped to `[initialRetryDelayMs, maxRetryDelayMs]`.
 */
export function passRetryDelay(
  averageRetryCount: number,
  config: Pick<SyncConfig, 'initialRetryDelayMs' | 'maxRetryDelayMs' | 'backoffMultiplier'>
): number {
  const exponent = Math.max(averageRetryCount - 1, 0);
  const raw = config.initialRetryDelayMs * Math.pow(config.backoffMultiplier, exponent);
  return Math.round(Math.min(Math.max(raw, config.initialRetryDelayMs), config.maxRetryDelayMs));
}

/**
 * Delay before the n-th (1-based) reconnect attempt of a channel.
 */
export function reconnectDelay(
  attempt: number,
  config: Pick<ReconnectConfig, 'baseDelayMs' | 'multiplier' | 'maxDelayMs'>
): number {
  const exponent = Math.max(attempt - 1, 0);
  return Math.round(Math.min(config.baseDelayMs * Math.pow(config.multiplier, exponent), config.maxDelayMs));
}

/**
 * Linear per-message backoff: `stepMs * retryCount`.
 */
export function linearRetryDelay(retryCount: number, stepMs: number): number {
  return stepMs * Math.max(retryCount, 0);
}
