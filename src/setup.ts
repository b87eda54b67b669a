/**
 * @fileoverview Engine Assembly
 *
 * {@link createSyncEngine} wires the outbox, subscription manager,
 * connectivity monitor, cache and orchestrator into one object with a
 * shared lifecycle. Each part can also be constructed on its own for hosts
 * that bring their own transport or remote API.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { TableCache } from './cache';
import type { SyncEngineConfig } from './config';
import { _setDebugPrefix, debugLog } from './debug';
import { SyncOrchestrator } from './engine';
import { OfflineMessageQueue } from './messageQueue';
import { PendingOperationStore } from './queue';
import { SubscriptionManager } from './realtime';
import { MemoryKeyValueStore, type KeyValueStore } from './storage';
import {
  createConnectivityMonitor,
  createProbeConnectivitySource,
  type ConnectivityMonitor
} from './stores/network';
import { SupabaseChannelTransport } from './supabase/channels';
import { createSupabaseClient } from './supabase/client';
import { SupabaseRemoteApi } from './supabase/remote';

export interface SyncEngine {
  supabase: SupabaseClient;
  storage: KeyValueStore;
  network: ConnectivityMonitor;
  operations: PendingOperationStore;
  subscriptions: SubscriptionManager;
  messages: OfflineMessageQueue;
  cache: TableCache;
  orchestrator: SyncOrchestrator;
  /** Load persisted state, start the orchestrator and watch the configured tables. */
  start: () => Promise<void>;
  /** Stop timers and close every channel. */
  dispose: () => Promise<void>;
}

function resolveClient(config: SyncEngineConfig, prefix: string): SupabaseClient {
  if (config.supabase) return config.supabase;
  if (config.connection) {
    return createSupabaseClient({ ...config.connection, prefix });
  }
  throw new Error('createSyncEngine requires either `supabase` or `connection`');
}

export function createSyncEngine(config: SyncEngineConfig): SyncEngine {
  const prefix = config.prefix ?? 'tidewater';
  _setDebugPrefix(prefix);

  const supabase = resolveClient(config, prefix);
  const storage = config.storage ?? new MemoryKeyValueStore();
  const network = createConnectivityMonitor(config.connectivity ?? createProbeConnectivitySource(), {
    reconnectDelayMs: config.networkSettleMs
  });
  const operations = new PendingOperationStore(storage);
  const subscriptions = new SubscriptionManager(new SupabaseChannelTransport(supabase), config.reconnect);
  const messages = new OfflineMessageQueue(storage, config.messageQueue);
  const cache = new TableCache(storage);
  const orchestrator = new SyncOrchestrator({
    store: operations,
    remote: new SupabaseRemoteApi(supabase),
    network,
    subscriptions,
    cache,
    config: config.sync
  });

  async function start() {
    await messages.load();
    await orchestrator.start();
    for (const table of config.tables ?? []) {
      await orchestrator.watchTable(table.supabaseName, {
        filter: table.filter,
        onRemoteChange: table.onRemoteChange
      });
    }
    debugLog(`[SYNC] Engine "${prefix}" started`);
  }

  async function dispose() {
    orchestrator.dispose();
    messages.dispose();
    await subscriptions.dispose();
    network.destroy();
  }

  return {
    supabase,
    storage,
    network,
    operations,
    subscriptions,
    messages,
    cache,
    orchestrator,
    start,
    dispose
  };
}
