/**
 * @fileoverview Sync Orchestrator
 *
 * Drains the outbox ({@link PendingOperationStore}) to the remote store,
 * reconciles pushed changes with queued local operations and reports
 * progress through a status store and an event stream.
 *
 * ## Triggers
 *
 * A sync pass runs when:
 *   - a local operation was queued while online (debounced by `syncDebounceMs`),
 *   - connectivity returns (debounced),
 *   - the periodic timer fires with work pending,
 *   - a pass retry timer fires after a failed pass,
 *   - a caller invokes {@link SyncOrchestrator.sync} directly.
 *
 * ## Pass semantics
 *
 * Single-flight: a pass requested while another runs is skipped. A pass
 * works on a snapshot taken at its start, in FIFO order, awaiting each
 * remote call before the next. Operations removed while the pass runs (a
 * pushed change won a conflict) are skipped when reached; operations
 * queued during the pass wait for the next one.
 *
 * Per operation:
 *   - success: removed;
 *   - non-retryable failure (conflict, validation, auth): removed and
 *     reported with `operation_dropped`;
 *   - retryable failure: `retryCount` grows; at `maxRetries` the operation
 *     is dropped and reported as data loss.
 *
 * The outbox is persisted once per pass. A pass with failures schedules a
 * retry of the whole pass after
 * `clamp(initial * multiplier^avgRetryCount, initial, max)`.
 *
 * In-flight remote calls are never cancelled, not even by {@link SyncOrchestrator.dispose}.
 *
 * @see {@link ./conflicts.ts} for the last-write-wins decision
 * @see {@link ./realtime.ts} for the push channels feeding handleRealtimeChange
 */

import { get, type Readable } from 'svelte/store';
import { passRetryDelay } from './backoff';
import { resolveSyncConfig, type SyncConfig } from './config';
import {
  extractRemoteTimestamp,
  findConflictingOperations,
  resolveConflicts
} from './conflicts';
import { debugError, debugLog, debugWarn } from './debug';
import { classifySyncError, friendlyErrorMessage, type ErrorCategory } from './errors';
import type { PendingOperationStore } from './queue';
import type { SubscriptionManager } from './realtime';
import type { ConnectivityMonitor } from './stores/network';
import { createSyncStatusStore, type SyncState } from './stores/sync';
import type {
  ChangeKind,
  LocalCache,
  OperationKind,
  PendingOperation,
  RemoteDataApi,
  RowPayload,
  SyncStatus
} from './types';
import { createKeyedSerializer, now, readRecordId, withTimeout } from './utils';

// ============================================================
// EVENTS
// ============================================================

export type DropReason = ErrorCategory | 'max_retries';

export type SyncEvent =
  | {
      type: 'operation_queued';
      operation: PendingOperation;
      pendingCount: number;
      timestamp: string;
    }
  | {
      type: 'sync_completed';
      successCount: number;
      errorCount: number;
      durationMs: number;
      remainingOperations: number;
      timestamp: string;
    }
  | {
      type: 'realtime_change_processed';
      table: string;
      changeKind: ChangeKind;
      recordId: string | null;
      conflictsResolved: number;
      discarded: number;
      timestamp: string;
    }
  | { type: 'connectivity_changed'; isOnline: boolean; timestamp: string }
  | { type: 'pending_operations_cleared'; clearedCount: number; timestamp: string }
  | {
      type: 'operation_dropped';
      operation: PendingOperation;
      reason: DropReason;
      message: string;
      timestamp: string;
    }
  | { type: 'auth_required'; message: string; timestamp: string }
  | { type: 'retry_scheduled'; delayMs: number; averageRetryCount: number; timestamp: string };

export type SyncEventType = SyncEvent['type'];
export type SyncEventListener = (event: SyncEvent) => void;

/** Result of one completed pass. */
export interface SyncPassResult {
  successCount: number;
  errorCount: number;
  durationMs: number;
  remainingOperations: number;
}

export interface SyncOrchestratorOptions {
  store: PendingOperationStore;
  remote: RemoteDataApi;
  network: ConnectivityMonitor;
  subscriptions?: SubscriptionManager;
  cache?: LocalCache;
  config?: Partial<SyncConfig>;
}

export interface WatchTableOptions {
  filter?: string;
  /** Called after a pushed change has been reconciled and cached. */
  onRemoteChange?: (table: string, record: RowPayload) => void;
}

export interface SyncHealth {
  status: SyncStatus;
  isOnline: boolean;
  isSyncing: boolean;
  disposed: boolean;
  pendingOperations: number;
  averageRetryCount: number;
  retryScheduled: boolean;
  lastSyncTimes: Record<string, string>;
  subscriptions: ReturnType<SubscriptionManager['getHealthStatus']> | null;
  config: Readonly<SyncConfig>;
}

// ============================================================
// ORCHESTRATOR
// ============================================================

export class SyncOrchestrator {
  readonly config: Readonly<SyncConfig>;

  private readonly store: PendingOperationStore;
  private readonly remote: RemoteDataApi;
  private readonly network: ConnectivityMonitor;
  private readonly subscriptions: SubscriptionManager | null;
  private readonly cache: LocalCache | null;

  private readonly statusStore = createSyncStatusStore();
  private readonly listeners: Set<SyncEventListener> = new Set();
  private readonly lastSyncTimes = new Map<string, number>();
  // One pushed change per table at a time, in arrival order
  private readonly serializeChanges = createKeyedSerializer();
  private readonly detachNetwork: Array<() => void> = [];

  private periodicTimer: ReturnType<typeof setInterval> | null = null;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;

  private online = false;
  private syncing = false;
  private started = false;
  private disposed = false;

  constructor(options: SyncOrchestratorOptions) {
    this.config = resolveSyncConfig(options.config);
    this.store = options.store;
    this.remote = options.remote;
    this.network = options.network;
    this.subscriptions = options.subscriptions ?? null;
    this.cache = options.cache ?? null;
  }

  // ============================================================
  // STREAMS
  // ============================================================

  /** Full sync state; replays the latest value to new subscribers. */
  get state(): Readable<SyncState> {
    return { subscribe: this.statusStore.subscribe };
  }

  /** Status only; replays the latest value to new subscribers. */
  get status(): Readable<SyncStatus> {
    return this.statusStore.status;
  }

  get currentStatus(): SyncStatus {
    return this.statusStore.getStatus();
  }

  get isOnline(): boolean {
    return this.online;
  }

  get isSyncing(): boolean {
    return this.syncing;
  }

  get pendingOperationsCount(): number {
    return this.store.count;
  }

  /**
   * Listen to engine events. Past events are not replayed.
   *
   * @returns An unsubscribe function.
   */
  onEvent(listener: SyncEventListener): () => void {
    this.listeners.add(listener);
    debugLog(`[SYNC] Event listener registered (total: ${this.listeners.size})`);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: SyncEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (e) {
        debugError(`[SYNC] ${event.type} listener error:`, e);
      }
    }
  }

  // ============================================================
  // LIFECYCLE
  // ============================================================

  /**
   * Load the outbox, read connectivity, start the periodic timer and follow
   * connectivity transitions. Idempotent.
   */
  async start(): Promise<void> {
    if (this.started || this.disposed) return;
    this.started = true;

    const loaded = await this.store.load();
    this.statusStore.setPendingCount(this.store.count);

    await this.network.init();
    this.online = this.network.isOnline();
    this.statusStore.setStatus(this.online ? 'idle' : 'offline');

    this.detachNetwork.push(
      this.network.onDisconnect(() => this.handleOffline()),
      this.network.onReconnect(() => this.handleOnline())
    );

    this.periodicTimer = setInterval(() => {
      if (this.online && this.store.count > 0) {
        this.sync().catch((e) => debugError('[SYNC] Periodic sync failed:', e));
      }
    }, this.config.syncIntervalSeconds * 1000);

    debugLog(
      `[SYNC] Started (${loaded} pending, ${this.online ? 'online' : 'offline'}, ` +
        `interval ${this.config.syncIntervalSeconds}s)`
    );

    if (this.online && this.store.count > 0) {
      this.scheduleSyncAttempt();
    }
  }

  /**
   * Cancel every timer, stop following connectivity and drop listeners.
   * A pass already awaiting the remote store finishes on its own.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    if (this.periodicTimer) clearInterval(this.periodicTimer);
    if (this.retryTimer) clearTimeout(this.retryTimer);
    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.periodicTimer = null;
    this.retryTimer = null;
    this.debounceTimer = null;

    for (const detach of this.detachNetwork.splice(0)) detach();
    this.listeners.clear();
    debugLog('[SYNC] Orchestrator disposed');
  }

  // ============================================================
  // CONNECTIVITY
  // ============================================================

  private handleOffline(): void {
    if (this.disposed || !this.online) return;
    this.online = false;
    debugLog('[SYNC] Offline: pausing realtime, deferring sync');

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    this.subscriptions?.pause();
    this.statusStore.setStatus('offline');
    this.emit({ type: 'connectivity_changed', isOnline: false, timestamp: now() });
  }

  private async handleOnline(): Promise<void> {
    if (this.disposed || this.online) return;
    this.online = true;
    debugLog('[SYNC] Online: reconnecting realtime, scheduling sync');

    this.statusStore.setStatus('idle');
    this.emit({ type: 'connectivity_changed', isOnline: true, timestamp: now() });
    this.scheduleSyncAttempt();

    if (this.subscriptions) {
      await this.subscriptions.reconnectAll();
    }
  }

  // ============================================================
  // QUEUEING
  // ============================================================

  /**
   * Record a local mutation and, when online, schedule a debounced pass.
   *
   * @returns The queued operation, or `null` after dispose.
   * @throws {InvalidOperationError} When an update/delete has no `recordId`.
   */
  async queueOperation(
    table: string,
    kind: OperationKind,
    payload: RowPayload,
    recordId?: string
  ): Promise<PendingOperation | null> {
    if (this.disposed) {
      debugWarn(`[SYNC] Ignoring ${kind} on ${table}: orchestrator disposed`);
      return null;
    }

    const operation = await this.store.enqueue(table, kind, payload, recordId);
    this.statusStore.setPendingCount(this.store.count);
    this.emit({
      type: 'operation_queued',
      operation,
      pendingCount: this.store.count,
      timestamp: now()
    });

    if (this.online) {
      this.scheduleSyncAttempt();
    }
    return operation;
  }

  /** Discard the whole outbox. */
  async clearPendingOperations(): Promise<number> {
    const clearedCount = await this.store.clear();
    this.statusStore.setPendingCount(0);
    this.emit({ type: 'pending_operations_cleared', clearedCount, timestamp: now() });
    return clearedCount;
  }

  // ============================================================
  // SCHEDULING
  // ============================================================

  // Debounced: rapid writes collapse into one pass
  private scheduleSyncAttempt(): void {
    if (this.disposed) return;
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      if (!this.online) return;
      this.sync().catch((e) => debugError('[SYNC] Debounced sync failed:', e));
    }, this.config.syncDebounceMs);
  }

  private scheduleRetry(): void {
    if (this.disposed) return;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
    }

    const averageRetryCount = this.store.averageRetryCount();
    const delayMs = passRetryDelay(averageRetryCount, this.config);
    debugLog(`[SYNC] Retrying pass in ${delayMs}ms (average retry count ${averageRetryCount})`);

    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.online && this.store.count > 0) {
        this.sync().catch((e) => debugError('[SYNC] Retry sync failed:', e));
      }
    }, delayMs);

    this.emit({ type: 'retry_scheduled', delayMs, averageRetryCount, timestamp: now() });
  }

  // ============================================================
  // SYNC PASS
  // ============================================================

  /**
   * Deliver the queued operations.
   *
   * @param options.force - Run even while offline.
   * @returns The pass summary, or `null` when the pass was skipped.
   */
  async sync(options: { force?: boolean } = {}): Promise<SyncPassResult | null> {
    if (this.disposed) return null;
    if (this.syncing) {
      debugLog('[SYNC] Pass already running, skipping');
      return null;
    }
    if (!this.online && !options.force) {
      debugLog('[SYNC] Offline, skipping pass');
      return null;
    }

    this.syncing = true;
    this.statusStore.setStatus('syncing');
    const startedAt = Date.now();
    let successCount = 0;
    let errorCount = 0;

    try {
      const snapshot = this.store.list();
      debugLog(`[SYNC] Pass started with ${snapshot.length} operation(s)`);

      for (const operation of snapshot) {
        if (!this.store.has(operation.id)) {
          debugLog(`[SYNC] ${operation.id} was removed during the pass, skipping`);
          continue;
        }

        try {
          await withTimeout(
            this.deliver(operation),
            this.config.requestTimeoutMs,
            `${operation.kind} on ${operation.table}`
          );
          this.store.remove(operation.id);
          successCount++;
        } catch (error) {
          errorCount++;
          this.handleOperationFailure(operation, error);
        }
      }

      await this.store.persist();
    } catch (e) {
      // Only reachable through a bug in store bookkeeping
      errorCount++;
      debugError('[SYNC] Pass aborted:', e);
      this.statusStore.setError('Sync failed. Will retry.', e instanceof Error ? e.message : String(e));
    } finally {
      this.syncing = false;
    }

    const result: SyncPassResult = {
      successCount,
      errorCount,
      durationMs: Date.now() - startedAt,
      remainingOperations: this.store.count
    };

    this.statusStore.setPendingCount(result.remainingOperations);
    if (errorCount === 0) {
      this.statusStore.setLastSyncTime(now());
    }
    // Connectivity may have dropped while the pass was awaiting the remote store
    if (!this.online) {
      this.statusStore.setStatus('offline');
    } else {
      this.statusStore.setStatus(errorCount === 0 ? 'success' : 'error');
    }

    debugLog(
      `[SYNC] Pass finished: ${successCount} ok, ${errorCount} failed, ` +
        `${result.remainingOperations} remaining (${result.durationMs}ms)`
    );
    this.emit({ type: 'sync_completed', ...result, timestamp: now() });

    if (errorCount > 0 && this.store.count > 0) {
      this.scheduleRetry();
    }
    return result;
  }

  private async deliver(operation: PendingOperation): Promise<void> {
    const { table, kind, payload, recordId } = operation;

    switch (kind) {
      case 'create':
        await this.remote.create(table, payload);
        break;
      case 'update':
      case 'delete':
        if (!recordId) {
          // Rejected by the store on enqueue; only a hand-edited outbox gets here
          throw new Error(`${kind} on ${table} has no recordId`);
        }
        if (kind === 'update') {
          await this.remote.update(table, recordId, payload);
        } else {
          await this.remote.delete(table, recordId);
        }
        break;
    }
  }

  private handleOperationFailure(operation: PendingOperation, error: unknown): void {
    const classified = classifySyncError(error);
    const friendly = friendlyErrorMessage(classified);

    this.statusStore.setError(friendly, classified.message);
    this.statusStore.addSyncError({
      table: operation.table,
      operation: operation.kind,
      recordId: operation.recordId ?? null,
      category: classified.category,
      message: classified.message,
      timestamp: now()
    });

    if (!classified.retryable) {
      this.store.remove(operation.id);
      debugWarn(
        `[SYNC] Dropping ${operation.kind} on ${operation.table} (${classified.category}): ${classified.message}`
      );
      this.emit({
        type: 'operation_dropped',
        operation,
        reason: classified.category,
        message: classified.message,
        timestamp: now()
      });
      if (classified.category === 'auth') {
        this.emit({ type: 'auth_required', message: classified.message, timestamp: now() });
      }
      return;
    }

    const retryCount = this.store.incrementRetry(operation.id);
    if (retryCount === undefined) return;

    if (retryCount >= this.config.maxRetries) {
      this.store.remove(operation.id);
      debugError(
        `[SYNC] DATA LOSS: ${operation.kind} on ${operation.table}` +
          `${operation.recordId ? `/${operation.recordId}` : ''} dropped after ${retryCount} attempts: ` +
          classified.message
      );
      this.emit({
        type: 'operation_dropped',
        operation,
        reason: 'max_retries',
        message: classified.message,
        timestamp: now()
      });
    } else {
      debugWarn(
        `[SYNC] ${operation.kind} on ${operation.table} failed (attempt ${retryCount}/${this.config.maxRetries}):`,
        classified.message
      );
    }
  }

  // ============================================================
  // PUSHED CHANGES
  // ============================================================

  /**
   * Reconcile a change pushed by the remote store.
   *
   * Queued local operations on the same row that lose under last-write-wins
   * are removed; the cache receives the pushed row regardless. Changes to one
   * table are reconciled one at a time, in call order.
   */
  async handleRealtimeChange(table: string, changeKind: ChangeKind, record: RowPayload): Promise<void> {
    if (this.disposed) return;
    await this.serializeChanges(table, () => this.reconcileChange(table, changeKind, record));
  }

  private async reconcileChange(table: string, changeKind: ChangeKind, record: RowPayload): Promise<void> {
    if (this.disposed) return;

    const recordId = readRecordId(record);
    let conflictsResolved = 0;
    let discarded = 0;

    try {
      if (recordId !== null) {
        const currentTime = Date.now();
        const window = {
          now: currentTime,
          windowMs: this.config.conflictResolutionWindowSeconds * 1000
        };
        const candidates = findConflictingOperations(this.store.list(), table, recordId, window);

        if (candidates.length > 0) {
          const remoteUpdatedAt = extractRemoteTimestamp(record, currentTime);
          const resolution = resolveConflicts(candidates, remoteUpdatedAt, window);
          conflictsResolved = candidates.length;
          discarded = this.store.removeMany(resolution.discarded.map((op) => op.id));

          debugLog(
            `[SYNC] ${table}/${recordId}: ${discarded} local operation(s) superseded, ` +
              `${resolution.retained.length} kept`
          );
          await this.store.persist();
          this.statusStore.setPendingCount(this.store.count);
        }
      } else {
        debugWarn(`[SYNC] Pushed ${changeKind} on ${table} has no id, skipping conflict check`);
      }

      if (this.cache) {
        await this.cache.apply(table, changeKind, record);
      }
      this.lastSyncTimes.set(table, Date.now());
    } catch (e) {
      debugError(`[SYNC] Failed to process pushed ${changeKind} on ${table}:`, e);
      return;
    }

    this.emit({
      type: 'realtime_change_processed',
      table,
      changeKind,
      recordId,
      conflictsResolved,
      discarded,
      timestamp: now()
    });
  }

  /**
   * Route a table's pushed changes into {@link handleRealtimeChange}.
   *
   * @returns The subscription id (`sync_<table>`).
   */
  async watchTable(table: string, options: WatchTableOptions = {}): Promise<string> {
    if (!this.subscriptions) {
      throw new Error('watchTable requires a SubscriptionManager');
    }

    const id = `sync_${table}`;
    const route = (changeKind: ChangeKind) => (record: RowPayload) => {
      this.handleRealtimeChange(table, changeKind, record)
        .then(() => options.onRemoteChange?.(table, record))
        .catch((e) => debugError(`[SYNC] Pushed ${changeKind} on ${table} failed:`, e));
    };

    await this.subscriptions.subscribe(id, {
      table,
      filter: options.filter,
      onInsert: route('insert'),
      onUpdate: route('update'),
      onDelete: route('delete')
    });
    return id;
  }

  // ============================================================
  // INSPECTION
  // ============================================================

  getLastSyncTime(table: string): Date | null {
    const time = this.lastSyncTimes.get(table);
    return time === undefined ? null : new Date(time);
  }

  /**
   * Whether the table has not received a pushed change within `maxAgeMs`
   * (default: the periodic interval).
   */
  needsSync(table: string, maxAgeMs = this.config.syncIntervalSeconds * 1000): boolean {
    const last = this.lastSyncTimes.get(table);
    if (last === undefined) return true;
    return Date.now() - last > maxAgeMs;
  }

  getHealthStatus(): SyncHealth {
    const lastSyncTimes: Record<string, string> = {};
    for (const [table, time] of this.lastSyncTimes) {
      lastSyncTimes[table] = new Date(time).toISOString();
    }

    return {
      status: this.currentStatus,
      isOnline: this.online,
      isSyncing: this.syncing,
      disposed: this.disposed,
      pendingOperations: this.store.count,
      averageRetryCount: this.store.averageRetryCount(),
      retryScheduled: this.retryTimer !== null,
      lastSyncTimes,
      subscriptions: this.subscriptions?.getHealthStatus() ?? null,
      config: this.config
    };
  }

  /** Snapshot of the current state (same value the `state` store holds). */
  getState(): SyncState {
    return get(this.statusStore);
  }
}
