import { describe, expect, it } from 'vitest';
import {
  extractRemoteTimestamp,
  findConflictingOperations,
  isWithinConflictWindow,
  resolveConflicts
} from '../conflicts';
import type { PendingOperation } from '../types';

const T0 = Date.parse('2026-03-01T12:00:00.000Z');
const WINDOW_MS = 30_000;

function op(overrides: Partial<PendingOperation> & { id: string }): PendingOperation {
  return {
    table: 'tasks',
    kind: 'update',
    payload: { title: 'local' },
    recordId: 'r1',
    queuedAt: new Date(T0).toISOString(),
    retryCount: 0,
    ...overrides
  };
}

describe('isWithinConflictWindow', () => {
  it('includes operations younger than the window and excludes the boundary', () => {
    const candidate = op({ id: 'a' });
    expect(isWithinConflictWindow(candidate, { now: T0 + 29_999, windowMs: WINDOW_MS })).toBe(true);
    expect(isWithinConflictWindow(candidate, { now: T0 + 30_000, windowMs: WINDOW_MS })).toBe(false);
  });
});

describe('findConflictingOperations', () => {
  it('selects same-record operations inside the window', () => {
    const ops = [
      op({ id: 'match' }),
      op({ id: 'other-record', recordId: 'r2' }),
      op({ id: 'other-table', table: 'notes' }),
      op({ id: 'too-old', queuedAt: new Date(T0 - 60_000).toISOString() }),
      op({ id: 'create', kind: 'create', recordId: undefined })
    ];

    const found = findConflictingOperations(ops, 'tasks', 'r1', { now: T0 + 5_000, windowMs: WINDOW_MS });
    expect(found.map((o) => o.id)).toEqual(['match']);
  });
});

describe('resolveConflicts', () => {
  const window = { now: T0 + 5_000, windowMs: WINDOW_MS };

  it('discards local operations older than the remote change', () => {
    const local = op({ id: 'a' });
    const result = resolveConflicts([local], T0 + 5_000, window);
    expect(result.discarded).toEqual([local]);
    expect(result.retained).toEqual([]);
  });

  it('retains local operations newer than the remote change', () => {
    const local = op({ id: 'a' });
    const result = resolveConflicts([local], T0 - 10_000, window);
    expect(result.discarded).toEqual([]);
    expect(result.retained).toEqual([local]);
  });

  it('retains on equal timestamps', () => {
    const local = op({ id: 'a' });
    expect(resolveConflicts([local], T0, window).retained).toEqual([local]);
  });

  it('never discards operations outside the window', () => {
    const stale = op({ id: 'old', queuedAt: new Date(T0 - 40_000).toISOString() });
    const result = resolveConflicts([stale], T0 + 5_000, window);
    expect(result.retained).toEqual([stale]);
  });

  it('splits a mixed candidate list', () => {
    const early = op({ id: 'early', queuedAt: new Date(T0 - 1_000).toISOString() });
    const late = op({ id: 'late', queuedAt: new Date(T0 + 2_000).toISOString() });
    const result = resolveConflicts([early, late], T0, window);
    expect(result.discarded.map((o) => o.id)).toEqual(['early']);
    expect(result.retained.map((o) => o.id)).toEqual(['late']);
    expect(result.remoteUpdatedAt).toBe(T0);
  });
});

describe('extractRemoteTimestamp', () => {
  it('parses ISO strings and epoch numbers', () => {
    expect(extractRemoteTimestamp({ updated_at: '2026-03-01T12:00:05.000Z' }, 0)).toBe(T0 + 5_000);
    expect(extractRemoteTimestamp({ updated_at: T0 }, 0)).toBe(T0);
  });

  it('falls back when the column is missing or unparsable', () => {
    expect(extractRemoteTimestamp({ id: 'r1' }, 42)).toBe(42);
    expect(extractRemoteTimestamp({ updated_at: 'soon' }, 42)).toBe(42);
    expect(extractRemoteTimestamp({ updated_at: null }, 42)).toBe(42);
  });
});
