/**
 * @fileoverview Main entry point: `tidewater-sync`
 *
 * Re-exports the public API surface:
 *
 * - **Engine Assembly**: `createSyncEngine` wires every part on top of a
 *   Supabase client.
 * - **Orchestrator**: outbox draining, pushed-change reconciliation,
 *   status and events.
 * - **Outbox & Message Queue**: durable pending operations and the
 *   per-message offline queue.
 * - **Realtime**: per-id push channels with reconnection.
 * - **Conflict Resolution**: the pure last-write-wins decision.
 * - **Stores**: Svelte-compatible stores for sync status and connectivity.
 * - **Persistence**: key-value stores (memory, Dexie) and the table cache.
 * - **Errors, Config & Debug**: taxonomy, defaults, logging.
 */

// =============================================================================
//  Engine Assembly
// =============================================================================

export { createSyncEngine } from './setup';
export type { SyncEngine } from './setup';

// =============================================================================
//  Configuration
// =============================================================================

export {
  DEFAULT_SYNC_CONFIG,
  DEFAULT_RECONNECT_CONFIG,
  DEFAULT_MESSAGE_QUEUE_CONFIG,
  resolveSyncConfig,
  resolveReconnectConfig,
  resolveMessageQueueConfig
} from './config';
export type {
  SyncConfig,
  ReconnectConfig,
  MessageQueueConfig,
  SyncEngineConfig,
  TableConfig
} from './config';

// =============================================================================
//  Orchestrator
// =============================================================================

export { SyncOrchestrator } from './engine';
export type {
  SyncEvent,
  SyncEventType,
  SyncEventListener,
  SyncPassResult,
  SyncOrchestratorOptions,
  SyncHealth,
  WatchTableOptions,
  DropReason
} from './engine';

// =============================================================================
//  Outbox & Message Queue
// =============================================================================

export { PendingOperationStore, PENDING_OPERATIONS_KEY } from './queue';
export { OfflineMessageQueue, MESSAGE_QUEUE_KEY, FAILED_MESSAGES_KEY } from './messageQueue';
export type {
  MessageRecord,
  MessageContext,
  MessageSender,
  QueuedMessage,
  ProcessQueueResult
} from './messageQueue';

// =============================================================================
//  Realtime
// =============================================================================

export { SubscriptionManager } from './realtime';
export type { SubscriptionConfig, SubscriptionHealth, ChannelAbandonedListener } from './realtime';

// =============================================================================
//  Conflict Resolution
// =============================================================================

export {
  resolveConflicts,
  findConflictingOperations,
  extractRemoteTimestamp,
  isWithinConflictWindow
} from './conflicts';
export type { ConflictResolution, ConflictWindow } from './conflicts';

// =============================================================================
//  Stores
// =============================================================================

export { createSyncStatusStore } from './stores/sync';
export type { SyncState, SyncStatusStore, SyncErrorEntry } from './stores/sync';
export {
  createConnectivityMonitor,
  createManualConnectivitySource,
  createProbeConnectivitySource
} from './stores/network';
export type {
  ConnectivityMonitor,
  ConnectivitySource,
  ManualConnectivitySource,
  ProbeConnectivityOptions,
  NetworkCallback
} from './stores/network';

// =============================================================================
//  Persistence
// =============================================================================

export { MemoryKeyValueStore } from './storage';
export type { KeyValueStore } from './storage';
export { SyncDatabase, DexieKeyValueStore, createDatabase } from './database';
export type { DatabaseConfig, KeyValueRow } from './database';
export { TableCache } from './cache';

// =============================================================================
//  Supabase
// =============================================================================

export { createSupabaseClient } from './supabase/client';
export type { SupabaseConnectionConfig } from './supabase/client';
export { SupabaseRemoteApi } from './supabase/remote';
export { SupabaseChannelTransport, normalizeFilter } from './supabase/channels';

// =============================================================================
//  Errors
// =============================================================================

export {
  SyncError,
  RemoteError,
  InvalidOperationError,
  ConfigError,
  classifySyncError,
  extractErrorMessage,
  friendlyErrorMessage
} from './errors';
export type { ErrorCategory, ClassifiedError } from './errors';

// =============================================================================
//  Debug & Utilities
// =============================================================================

export { debugLog, debugWarn, debugError, isDebugMode, setDebugMode } from './debug';
export { passRetryDelay, reconnectDelay, linearRetryDelay } from './backoff';
export { createKeyedSerializer, now } from './utils';

// =============================================================================
//  Types
// =============================================================================

export type {
  RowPayload,
  OperationKind,
  PendingOperation,
  SyncStatus,
  ChangeKind,
  SubscriptionState,
  ChannelAck,
  ChannelHandlers,
  ChannelSpec,
  ChannelHandle,
  RemoteDataApi,
  PushTransport,
  LocalCache
} from './types';
