/**
 * @fileoverview Engine Configuration
 *
 * Timing and retry parameters for the sync engine, plus the top-level
 * {@link SyncEngineConfig} accepted by {@link setup.ts#createSyncEngine}.
 *
 * Every `resolve*Config` function merges overrides over the defaults,
 * validates the result and returns a frozen object. A value out of range
 * throws {@link ConfigError}; the engine never runs with a half-valid
 * configuration.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { KeyValueStore } from './storage';
import type { ConnectivitySource } from './stores/network';
import type { RowPayload } from './types';
import { ConfigError } from './errors';

// =============================================================================
// Sync Timing
// =============================================================================

/**
 * Outbox delivery and conflict-handling parameters.
 */
export interface SyncConfig {
  /** Seconds between periodic passes (only run when online with pending work). Default: 300. */
  syncIntervalSeconds: number;
  /** Failed attempts after which a retryable operation is dropped. Default: 3. */
  maxRetries: number;
  /** Delay (ms) before the first pass retry. Default: 2000. */
  initialRetryDelayMs: number;
  /** Upper bound (ms) for the pass retry delay. Default: 300000 (5 min). */
  maxRetryDelayMs: number;
  /** Growth factor applied per average retry. Default: 2. */
  backoffMultiplier: number;
  /** Seconds during which a local operation can lose to a newer remote change. Default: 30. */
  conflictResolutionWindowSeconds: number;
  /** Delay (ms) after a local write before triggering a pass. Default: 1000. */
  syncDebounceMs: number;
  /** Time (ms) a single remote call may take before it counts as a timeout. Default: 30000. */
  requestTimeoutMs: number;
}

export const DEFAULT_SYNC_CONFIG: Readonly<SyncConfig> = Object.freeze({
  syncIntervalSeconds: 300,
  maxRetries: 3,
  initialRetryDelayMs: 2000,
  maxRetryDelayMs: 300_000,
  backoffMultiplier: 2,
  conflictResolutionWindowSeconds: 30,
  syncDebounceMs: 1000,
  requestTimeoutMs: 30_000
});

// =============================================================================
// Realtime Reconnection
// =============================================================================

export interface ReconnectConfig {
  /** Delay (ms) before the first reconnect attempt. Default: 2000. */
  baseDelayMs: number;
  /** Growth factor per attempt. Default: 1.5. */
  multiplier: number;
  /** Upper bound (ms) for a single delay. Default: 30000. */
  maxDelayMs: number;
  /** Consecutive attempts before a channel is abandoned. Default: 5. */
  maxAttempts: number;
  /** Pause (ms) between teardown and resubscribe in `reconnectAll`. Default: 1000. */
  settleDelayMs: number;
}

export const DEFAULT_RECONNECT_CONFIG: Readonly<ReconnectConfig> = Object.freeze({
  baseDelayMs: 2000,
  multiplier: 1.5,
  maxDelayMs: 30_000,
  maxAttempts: 5,
  settleDelayMs: 1000
});

// =============================================================================
// Offline Message Queue
// =============================================================================

export interface MessageQueueConfig {
  /** Failed sends after which a message moves to the dead-letter bucket. Default: 3. */
  maxRetryAttempts: number;
  /** Linear backoff step (ms): a message waits `retryDelayMs * retryCount`. Default: 5000. */
  retryDelayMs: number;
  /** Age (ms) after which a queued message is reported stale. Default: 24 h. */
  staleAfterMs: number;
}

export const DEFAULT_MESSAGE_QUEUE_CONFIG: Readonly<MessageQueueConfig> = Object.freeze({
  maxRetryAttempts: 3,
  retryDelayMs: 5000,
  staleAfterMs: 24 * 60 * 60 * 1000
});

// =============================================================================
// Validation
// =============================================================================

function requirePositive(field: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(field, `expected a positive number, got ${value}`);
  }
}

function requireNonNegative(field: string, value: number) {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(field, `expected a non-negative number, got ${value}`);
  }
}

function requireInteger(field: string, value: number, min: number) {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(field, `expected an integer >= ${min}, got ${value}`);
  }
}

/**
 * Merge overrides over {@link DEFAULT_SYNC_CONFIG}, validate and freeze.
 *
 * @throws {ConfigError} When a value is out of range.
 */
export function resolveSyncConfig(overrides: Partial<SyncConfig> = {}): Readonly<SyncConfig> {
  const config: SyncConfig = { ...DEFAULT_SYNC_CONFIG, ...overrides };

  requirePositive('syncIntervalSeconds', config.syncIntervalSeconds);
  requireInteger('maxRetries', config.maxRetries, 1);
  requirePositive('initialRetryDelayMs', config.initialRetryDelayMs);
  requirePositive('maxRetryDelayMs', config.maxRetryDelayMs);
  if (config.maxRetryDelayMs < config.initialRetryDelayMs) {
    throw new ConfigError('maxRetryDelayMs', 'must not be smaller than initialRetryDelayMs');
  }
  if (!Number.isFinite(config.backoffMultiplier) || config.backoffMultiplier < 1) {
    throw new ConfigError('backoffMultiplier', `expected a number >= 1, got ${config.backoffMultiplier}`);
  }
  requirePositive('conflictResolutionWindowSeconds', config.conflictResolutionWindowSeconds);
  requireNonNegative('syncDebounceMs', config.syncDebounceMs);
  requirePositive('requestTimeoutMs', config.requestTimeoutMs);

  return Object.freeze(config);
}

export function resolveReconnectConfig(
  overrides: Partial<ReconnectConfig> = {}
): Readonly<ReconnectConfig> {
  const config: ReconnectConfig = { ...DEFAULT_RECONNECT_CONFIG, ...overrides };

  requirePositive('baseDelayMs', config.baseDelayMs);
  if (!Number.isFinite(config.multiplier) || config.multiplier < 1) {
    throw new ConfigError('multiplier', `expected a number >= 1, got ${config.multiplier}`);
  }
  requirePositive('maxDelayMs', config.maxDelayMs);
  requireInteger('maxAttempts', config.maxAttempts, 1);
  requireNonNegative('settleDelayMs', config.settleDelayMs);

  return Object.freeze(config);
}

export function resolveMessageQueueConfig(
  overrides: Partial<MessageQueueConfig> = {}
): Readonly<MessageQueueConfig> {
  const config: MessageQueueConfig = { ...DEFAULT_MESSAGE_QUEUE_CONFIG, ...overrides };

  requireInteger('maxRetryAttempts', config.maxRetryAttempts, 1);
  requireNonNegative('retryDelayMs', config.retryDelayMs);
  requirePositive('staleAfterMs', config.staleAfterMs);

  return Object.freeze(config);
}

// =============================================================================
// Engine Configuration
// =============================================================================

/**
 * Per-table realtime configuration.
 */
export interface TableConfig {
  /** Remote table name. */
  supabaseName: string;
  /** Row filter in PostgREST form (`column=eq.value`). */
  filter?: string;
  /** Called after a pushed change for this table has been applied locally. */
  onRemoteChange?: (table: string, record: RowPayload) => void;
}

/**
 * Top-level configuration for {@link setup.ts#createSyncEngine}.
 *
 * @example
 * const engine = createSyncEngine({
 *   prefix: 'myapp',
 *   connection: { url: 'https://project.supabase.co', anonKey: '...' },
 *   tables: [{ supabaseName: 'tasks', filter: 'user_id=eq.42' }],
 *   sync: { syncDebounceMs: 500 }
 * });
 * await engine.start();
 */
export interface SyncEngineConfig {
  /** Application prefix used for the debug flag and the client info header. Default: `'tidewater'`. */
  prefix?: string;
  /** Pre-created Supabase client. Mutually exclusive with `connection`. */
  supabase?: SupabaseClient;
  /** Engine creates its own Supabase client from these settings. */
  connection?: { url: string; anonKey: string; fetch?: typeof fetch };
  /** Durable key-value store for the outbox, message queue and cache. Default: in memory. */
  storage?: KeyValueStore;
  /** Connectivity signal. Default: a DNS probe. */
  connectivity?: ConnectivitySource;
  /** Tables to watch for pushed changes once started. */
  tables?: TableConfig[];
  sync?: Partial<SyncConfig>;
  reconnect?: Partial<ReconnectConfig>;
  messageQueue?: Partial<MessageQueueConfig>;
  /** Delay (ms) after the network returns before reconnect handlers run. Default: 500. */
  networkSettleMs?: number;
}
