/**
 * @fileoverview Last-Write-Wins Conflict Resolution for Pushed Changes
 *
 * When the remote store pushes a change for a row that still has local
 * operations waiting in the outbox, the two sides disagree about the row's
 * latest state. This module decides which local operations lose.
 *
 * **Candidate selection** ({@link findConflictingOperations})
 *   A local operation is a candidate when it targets the same table and
 *   record id as the pushed row AND was queued within the conflict window
 *   (`now - queuedAt < windowMs`). Older operations are assumed to have
 *   been delivered or to be retrying on their own, and are left alone.
 *
 * **Decision** ({@link resolveConflicts})
 *   The remote row's `updated_at` is compared with each candidate's
 *   `queuedAt`. A strictly later remote timestamp wins and the local
 *   operation is discarded; an equal or earlier one leaves the local
 *   operation queued, so it will overwrite the remote row on the next pass.
 *
 * The functions here are pure: they never touch the store. The orchestrator
 * removes the discarded operations and persists the result.
 *
 * @see {@link engine.ts#handleRealtimeChange} for the caller
 */

import type { PendingOperation, RowPayload } from './types';

// =============================================================================
// Types
// =============================================================================

/** Reference point for the conflict window. */
export interface ConflictWindow {
  /** Current time, epoch ms. */
  now: number;
  /** Window length, ms. */
  windowMs: number;
}

/**
 * Outcome of comparing one pushed row with the local operations on it.
 */
export interface ConflictResolution {
  /** Local operations superseded by the remote row. */
  discarded: PendingOperation[];
  /** Local operations that stay queued. */
  retained: PendingOperation[];
  /** Timestamp used for the comparison, epoch ms. */
  remoteUpdatedAt: number;
}

// =============================================================================
// Helpers
// =============================================================================

/** Whether `operation` was queued inside the conflict window. */
export function isWithinConflictWindow(operation: PendingOperation, window: ConflictWindow): boolean {
  const queuedAt = Date.parse(operation.queuedAt);
  if (Number.isNaN(queuedAt)) return false;
  return window.now - queuedAt < window.windowMs;
}

/**
 * Read the remote row's last-modified time.
 *
 * Accepts an ISO string or epoch milliseconds in `updated_at`. A missing or
 * unparsable value yields `fallback` (normally "now"), which makes the
 * remote change win against every candidate queued before it.
 */
export function extractRemoteTimestamp(record: RowPayload, fallback: number): number {
  const value = record.updated_at;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    if (!Number.isNaN(parsed)) return parsed;
  }
  return fallback;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Select the queued operations that may conflict with a pushed row.
 *
 * @returns Matching operations in queue order.
 */
export function findConflictingOperations(
  operations: readonly PendingOperation[],
  table: string,
  recordId: string,
  window: ConflictWindow
): PendingOperation[] {
  return operations.filter(
    (op) => op.table === table && op.recordId === recordId && isWithinConflictWindow(op, window)
  );
}

/**
 * Decide which candidates lose to a remote row last modified at
 * `remoteUpdatedAt`.
 *
 * Candidates outside the window are always retained, so callers may pass
 * an unfiltered list.
 *
 * @example
 * const { discarded } = resolveConflicts(candidates, Date.parse(row.updated_at), {
 *   now: Date.now(),
 *   windowMs: 30_000
 * });
 * store.removeMany(discarded.map((op) => op.id));
 */
export function resolveConflicts(
  candidates: readonly PendingOperation[],
  remoteUpdatedAt: number,
  window: ConflictWindow
): ConflictResolution {
  const discarded: PendingOperation[] = [];
  const retained: PendingOperation[] = [];

  for (const op of candidates) {
    if (!isWithinConflictWindow(op, window)) {
      retained.push(op);
      continue;
    }
    if (remoteUpdatedAt > Date.parse(op.queuedAt)) {
      discarded.push(op);
    } else {
      retained.push(op);
    }
  }

  return { discarded, retained, remoteUpdatedAt };
}
