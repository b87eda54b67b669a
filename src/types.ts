/**
 * Shared types for the sync engine.
 *
 * Rows travel as plain JSON objects (`RowPayload`); the engine never
 * interprets domain columns beyond `id` and `updated_at`.
 */

/** A table row as sent to or received from the remote store. */
export type RowPayload = Record<string, unknown>;

// ============================================================
// OUTBOX TYPES
// ============================================================

/**
 * Operation kinds recorded in the outbox:
 * - 'create': insert the full payload
 * - 'update': patch the row identified by `recordId`
 * - 'delete': remove the row identified by `recordId`
 */
export type OperationKind = 'create' | 'update' | 'delete';

/**
 * A locally-originated mutation awaiting delivery.
 *
 * Instances are immutable; the store replaces an entry when its retry
 * counter changes.
 */
export interface PendingOperation {
  readonly id: string; // sync_<epochMs>_<counter>
  readonly table: string; // Target table (generic string, not hardcoded union)
  readonly kind: OperationKind;
  readonly payload: RowPayload; // Full row (create) or changed columns (update)
  readonly recordId?: string; // Required for update and delete
  readonly queuedAt: string; // ISO timestamp of when the operation was queued
  readonly retryCount: number; // Number of failed delivery attempts
}

// ============================================================
// SYNC STATUS TYPES
// ============================================================

export type SyncStatus = 'idle' | 'syncing' | 'success' | 'error' | 'offline';

/** Kind of change pushed by the remote store. */
export type ChangeKind = 'insert' | 'update' | 'delete';

// ============================================================
// REALTIME TYPES
// ============================================================

/** Per-channel connection state. */
export type SubscriptionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/** Acknowledgement a transport reports for an opened channel. */
export type ChannelAck = 'subscribed' | 'timed_out' | 'channel_error' | 'closed';

/** Callback receiving the row carried by a pushed change. */
export type RowCallback = (record: RowPayload) => void;

export interface ChannelHandlers {
  onInsert?: RowCallback;
  onUpdate?: RowCallback;
  onDelete?: RowCallback; // Receives the old row
}

export interface ChannelSpec {
  name: string;
  table: string;
  filter?: string; // PostgREST form, e.g. `user_id=eq.42`
}

/** Opaque reference to a channel opened by a {@link PushTransport}. */
export interface ChannelHandle {
  readonly name: string;
}

// ============================================================
// CONSUMED INTERFACES
// ============================================================

/**
 * Remote authoritative store. Every method rejects on failure; the engine
 * classifies the rejection with `classifySyncError`.
 */
export interface RemoteDataApi {
  create(table: string, record: RowPayload): Promise<void>;
  update(table: string, recordId: string, patch: RowPayload): Promise<void>;
  delete(table: string, recordId: string): Promise<void>;
}

/** Push channel provider used by the subscription manager. */
export interface PushTransport {
  openChannel(spec: ChannelSpec, handlers: ChannelHandlers): ChannelHandle;
  /** Start the channel; `onStatus` may be called any number of times later. */
  subscribe(handle: ChannelHandle, onStatus: (ack: ChannelAck, error?: Error) => void): void;
  close(handle: ChannelHandle): Promise<void>;
}

/** Local mirror of remote rows, updated by pushed changes. */
export interface LocalCache {
  apply(table: string, changeKind: ChangeKind, record: RowPayload): Promise<void>;
}
