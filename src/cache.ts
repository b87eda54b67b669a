/**
 * Per-table row cache over a {@link KeyValueStore}.
 *
 * Each table is stored as one JSON object keyed by row id under
 * `cache_<table>`. Pushed changes overwrite (insert/update) or remove
 * (delete) the cached row. Writes to one table are applied one at a time, in
 * call order.
 */

import { debugWarn } from './debug';
import type { KeyValueStore } from './storage';
import type { ChangeKind, LocalCache, RowPayload } from './types';
import { createKeyedSerializer, isRecord, readRecordId } from './utils';

type TableRows = Record<string, RowPayload>;

export class TableCache implements LocalCache {
  private readonly serializeWrites = createKeyedSerializer();

  constructor(
    private readonly storage: KeyValueStore,
    private readonly keyPrefix = 'cache_'
  ) {}

  async apply(table: string, changeKind: ChangeKind, record: RowPayload): Promise<void> {
    const id = readRecordId(record);
    if (id === null) {
      debugWarn(`[CACHE] Ignoring ${changeKind} on ${table} without an id`);
      return;
    }

    await this.serializeWrites(table, async () => {
      const rows = await this.readTable(table);
      if (changeKind === 'delete') {
        if (!(id in rows)) return;
        delete rows[id];
      } else {
        rows[id] = { ...record };
      }
      await this.storage.set(this.key(table), JSON.stringify(rows));
    });
  }

  async get(table: string, id: string): Promise<RowPayload | null> {
    const rows = await this.readTable(table);
    return rows[id] ?? null;
  }

  async getAll(table: string): Promise<RowPayload[]> {
    return Object.values(await this.readTable(table));
  }

  async clear(table: string): Promise<void> {
    await this.storage.delete(this.key(table));
  }

  private key(table: string): string {
    return `${this.keyPrefix}${table}`;
  }

  private async readTable(table: string): Promise<TableRows> {
    const serialized = await this.storage.get(this.key(table));
    if (serialized === null) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(serialized);
    } catch (e) {
      debugWarn(`[CACHE] Discarding unreadable cache for ${table}:`, e);
      return {};
    }
    if (!isRecord(parsed)) return {};

    const rows: TableRows = {};
    for (const [id, row] of Object.entries(parsed)) {
      if (isRecord(row)) rows[id] = row;
    }
    return rows;
  }
}
