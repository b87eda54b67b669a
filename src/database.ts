/**
 * @fileoverview IndexedDB Persistence via Dexie
 *
 * Provides a durable {@link KeyValueStore} on top of a small Dexie database
 * with a single `kv` table. In Node the IndexedDB implementation is passed
 * in through the Dexie options (`indexedDB` / `IDBKeyRange`); in a browser
 * the global one is used.
 *
 * Recovery strategy:
 *   If the database fails to open (blocked upgrade, corrupted schema), it is
 *   deleted and recreated. The outbox is lost in that case, which is logged.
 */

import Dexie, { type Table } from 'dexie';
import type { KeyValueStore } from './storage';
import { debugError, debugLog } from './debug';
import { now } from './utils';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/** Options accepted by the Dexie constructor (IndexedDB factory, addons). */
export type DexieConstructorOptions = NonNullable<ConstructorParameters<typeof Dexie>[1]>;

export interface DatabaseConfig {
  /** IndexedDB database name (should be unique per app). */
  name: string;
  options?: DexieConstructorOptions;
}

/** A row of the `kv` table. */
export interface KeyValueRow {
  key: string;
  value: string;
  updatedAt: string;
}

// =============================================================================
// Database
// =============================================================================

export class SyncDatabase extends Dexie {
  kv!: Table<KeyValueRow, string>;

  constructor(name: string, options?: DexieConstructorOptions) {
    super(name, options);
    this.version(1).stores({
      kv: 'key, updatedAt'
    });
  }
}

/**
 * Create and open the engine database.
 *
 * Opens eagerly so upgrade errors surface here rather than on the first
 * write. On failure the database is deleted and rebuilt once; a second
 * failure propagates.
 */
export async function createDatabase(config: DatabaseConfig): Promise<SyncDatabase> {
  let db = new SyncDatabase(config.name, config.options);

  try {
    await db.open();
  } catch (e) {
    debugError('[DB] Failed to open database, deleting and recreating:', e);
    db.close();
    await db.delete();
    db = new SyncDatabase(config.name, config.options);
    await db.open();
  }

  debugLog(`[DB] Opened ${config.name} (version ${db.verno})`);
  return db;
}

// =============================================================================
// Key-Value Adapter
// =============================================================================

/**
 * {@link KeyValueStore} backed by the `kv` table of a {@link SyncDatabase}.
 */
export class DexieKeyValueStore implements KeyValueStore {
  constructor(private readonly db: SyncDatabase) {}

  async get(key: string): Promise<string | null> {
    const row = await this.db.kv.get(key);
    return row?.value ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    await this.db.kv.put({ key, value, updatedAt: now() });
  }

  async delete(key: string): Promise<void> {
    await this.db.kv.delete(key);
  }
}
