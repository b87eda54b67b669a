/**
 * @fileoverview Pending Operation Store (Outbox)
 *
 * Ordered, durable list of local mutations awaiting delivery to the remote
 * store. Operations are kept in insertion order; the sync pass drains them
 * FIFO.
 *
 * ## Persistence
 *
 * The full list is serialized as JSON under {@link PENDING_OPERATIONS_KEY}.
 * `enqueue` and `clear` write through immediately so a freshly queued
 * mutation survives a crash. `remove`, `removeMany` and `incrementRetry` only
 * touch memory; the orchestrator flushes with {@link PendingOperationStore.persist}
 * once per sync pass and after each conflict resolution.
 *
 * A failed write is logged and swallowed: the in-memory list stays
 * authoritative for the current process.
 *
 * ## Retry accounting
 *
 * `retryCount` only grows. Entries are immutable; `incrementRetry` replaces
 * the entry with a copy.
 */

import { debugError, debugLog, debugWarn } from './debug';
import { InvalidOperationError } from './errors';
import type { KeyValueStore } from './storage';
import type { OperationKind, PendingOperation, RowPayload } from './types';
import { isRecord } from './utils';

// =============================================================================
// Constants
// =============================================================================

/** Storage key holding the serialized outbox. */
export const PENDING_OPERATIONS_KEY = 'pending_sync_operations';

const OPERATION_KINDS: readonly OperationKind[] = ['create', 'update', 'delete'];

function isOperationKind(value: unknown): value is OperationKind {
  return OPERATION_KINDS.some((kind) => kind === value);
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Rebuild an operation from its persisted form.
 *
 * @returns `null` when the entry is malformed.
 */
function parseOperation(raw: unknown): PendingOperation | null {
  if (!isRecord(raw)) return null;
  const { id, table, kind, payload, recordId, queuedAt, retryCount } = raw;

  if (typeof id !== 'string' || !id) return null;
  if (typeof table !== 'string' || !table) return null;
  if (!isOperationKind(kind)) return null;
  if (!isRecord(payload)) return null;
  if (typeof queuedAt !== 'string' || Number.isNaN(Date.parse(queuedAt))) return null;
  if (typeof retryCount !== 'number' || !Number.isInteger(retryCount) || retryCount < 0) return null;
  if (recordId !== undefined && (typeof recordId !== 'string' || !recordId)) return null;
  if (kind !== 'create' && recordId === undefined) return null;

  return { id, table, kind, payload, recordId, queuedAt, retryCount };
}

// =============================================================================
// Store
// =============================================================================

export class PendingOperationStore {
  private operations: PendingOperation[] = [];
  private sequence = 0;

  constructor(
    private readonly storage: KeyValueStore,
    private readonly storageKey: string = PENDING_OPERATIONS_KEY
  ) {}

  /** Number of queued operations. */
  get count(): number {
    return this.operations.length;
  }

  /**
   * Replace the in-memory list with the persisted one.
   *
   * Malformed entries are skipped. A missing or unreadable value leaves the
   * store empty.
   *
   * @returns The number of operations loaded.
   */
  async load(): Promise<number> {
    let serialized: string | null;
    try {
      serialized = await this.storage.get(this.storageKey);
    } catch (e) {
      debugError('[QUEUE] Failed to read pending operations:', e);
      return this.operations.length;
    }

    if (serialized === null) {
      this.operations = [];
      return 0;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(serialized);
    } catch (e) {
      debugError('[QUEUE] Persisted pending operations are not valid JSON, starting empty:', e);
      this.operations = [];
      return 0;
    }

    if (!Array.isArray(raw)) {
      debugWarn('[QUEUE] Persisted pending operations are not a list, starting empty');
      this.operations = [];
      return 0;
    }

    const loaded: PendingOperation[] = [];
    for (const entry of raw) {
      const operation = parseOperation(entry);
      if (operation) {
        loaded.push(operation);
      } else {
        debugWarn('[QUEUE] Skipping malformed pending operation:', entry);
      }
    }

    this.operations = loaded;
    debugLog(`[QUEUE] Loaded ${loaded.length} pending operation(s)`);
    return loaded.length;
  }

  /**
   * Write the full list to storage.
   *
   * @returns `false` when the write failed (the failure is logged).
   */
  async persist(): Promise<boolean> {
    try {
      await this.storage.set(this.storageKey, JSON.stringify(this.operations));
      return true;
    } catch (e) {
      debugError('[QUEUE] Failed to persist pending operations:', e);
      return false;
    }
  }

  /**
   * Validate, append and persist a new operation.
   *
   * @throws {InvalidOperationError} When the table is empty, the kind is
   *   unknown, or an update/delete has no `recordId`.
   */
  async enqueue(
    table: string,
    kind: OperationKind,
    payload: RowPayload,
    recordId?: string
  ): Promise<PendingOperation> {
    if (!table) {
      throw new InvalidOperationError('Operation table must not be empty');
    }
    if (!isOperationKind(kind)) {
      throw new InvalidOperationError(`Unknown operation kind: ${String(kind)}`);
    }
    if (kind !== 'create' && !recordId) {
      throw new InvalidOperationError(`A ${kind} operation on ${table} requires a recordId`);
    }

    const queuedAtMs = Date.now();
    const operation: PendingOperation = {
      id: `sync_${queuedAtMs}_${this.sequence++}`,
      table,
      kind,
      payload: { ...payload },
      recordId: recordId || undefined,
      queuedAt: new Date(queuedAtMs).toISOString(),
      retryCount: 0
    };

    this.operations.push(operation);
    await this.persist();

    debugLog(`[QUEUE] Queued ${kind} on ${table}${recordId ? `/${recordId}` : ''} (${operation.id})`);
    return operation;
  }

  /** Frozen snapshot of the queue in insertion order. */
  list(): readonly PendingOperation[] {
    return Object.freeze([...this.operations]);
  }

  has(id: string): boolean {
    return this.operations.some((op) => op.id === id);
  }

  get(id: string): PendingOperation | undefined {
    return this.operations.find((op) => op.id === id);
  }

  /** Operations targeting one row, in queue order. */
  findByRecord(table: string, recordId: string): PendingOperation[] {
    return this.operations.filter((op) => op.table === table && op.recordId === recordId);
  }

  /**
   * Drop an operation. Unknown ids are a no-op.
   *
   * @returns Whether an entry was removed.
   */
  remove(id: string): boolean {
    const before = this.operations.length;
    this.operations = this.operations.filter((op) => op.id !== id);
    return this.operations.length < before;
  }

  /** @returns The number of entries removed. */
  removeMany(ids: Iterable<string>): number {
    const doomed = new Set(ids);
    if (doomed.size === 0) return 0;
    const before = this.operations.length;
    this.operations = this.operations.filter((op) => !doomed.has(op.id));
    return before - this.operations.length;
  }

  /**
   * Record a failed delivery attempt.
   *
   * @returns The new retry count, or `undefined` for an unknown id.
   */
  incrementRetry(id: string): number | undefined {
    const index = this.operations.findIndex((op) => op.id === id);
    if (index === -1) return undefined;

    const current = this.operations[index];
    const updated: PendingOperation = { ...current, retryCount: current.retryCount + 1 };
    this.operations[index] = updated;
    return updated.retryCount;
  }

  /** Mean retry count across the queue, rounded to an integer. */
  averageRetryCount(): number {
    if (this.operations.length === 0) return 0;
    const total = this.operations.reduce((sum, op) => sum + op.retryCount, 0);
    return Math.round(total / this.operations.length);
  }

  /**
   * Drop every operation and persist the empty list.
   *
   * @returns The number of operations discarded.
   */
  async clear(): Promise<number> {
    const cleared = this.operations.length;
    this.operations = [];
    await this.persist();
    debugLog(`[QUEUE] Cleared ${cleared} pending operation(s)`);
    return cleared;
  }
}
