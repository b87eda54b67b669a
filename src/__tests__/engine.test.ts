import { get } from 'svelte/store';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TableCache } from '../cache';
import type { SyncConfig } from '../config';
import { SyncOrchestrator, type SyncEvent } from '../engine';
import { RemoteError } from '../errors';
import { PENDING_OPERATIONS_KEY, PendingOperationStore } from '../queue';
import { SubscriptionManager } from '../realtime';
import { MemoryKeyValueStore } from '../storage';
import { createConnectivityMonitor, createManualConnectivitySource } from '../stores/network';
import { FakeRemote, FakeTransport, settle } from './helpers';

const T0 = new Date('2026-03-01T12:00:00.000Z');

function at(offsetMs: number): string {
  return new Date(T0.getTime() + offsetMs).toISOString();
}

async function advance(ms: number) {
  await vi.advanceTimersByTimeAsync(ms);
  await settle();
}

function eventsOfType<T extends SyncEvent['type']>(events: SyncEvent[], type: T) {
  return events.filter((event): event is Extract<SyncEvent, { type: T }> => event.type === type);
}

async function createHarness(options: { online?: boolean; config?: Partial<SyncConfig> } = {}) {
  const storage = new MemoryKeyValueStore();
  const store = new PendingOperationStore(storage);
  const remote = new FakeRemote();
  const source = createManualConnectivitySource(options.online ?? true);
  const network = createConnectivityMonitor(source, { reconnectDelayMs: 10 });
  const transport = new FakeTransport();
  const subscriptions = new SubscriptionManager(transport, { settleDelayMs: 0 });
  const cache = new TableCache(storage);
  const orchestrator = new SyncOrchestrator({
    store,
    remote,
    network,
    subscriptions,
    cache,
    config: options.config
  });

  const events: SyncEvent[] = [];
  orchestrator.onEvent((event) => events.push(event));
  await orchestrator.start();

  return { storage, store, remote, source, network, transport, subscriptions, cache, orchestrator, events };
}

type Harness = Awaited<ReturnType<typeof createHarness>>;

describe('SyncOrchestrator', () => {
  let current: Harness | null = null;

  async function setup(options: Parameters<typeof createHarness>[0] = {}): Promise<Harness> {
    current = await createHarness(options);
    return current;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    current?.orchestrator.dispose();
    current?.network.destroy();
    current = null;
    vi.useRealTimers();
  });

  describe('queueing and debounced passes', () => {
    it('delivers a queued operation after the debounce delay', async () => {
      const h = await setup();
      const op = await h.orchestrator.queueOperation('tasks', 'create', { id: 't1', title: 'Buy milk' });

      expect(op?.table).toBe('tasks');
      expect(h.events[0]).toMatchObject({ type: 'operation_queued', pendingCount: 1 });

      await advance(999);
      expect(h.remote.calls).toHaveLength(0);

      await advance(1);
      expect(h.remote.calls).toEqual([{ method: 'create', table: 'tasks', payload: { id: 't1', title: 'Buy milk' } }]);
      expect(h.orchestrator.pendingOperationsCount).toBe(0);
      expect(h.orchestrator.currentStatus).toBe('success');
      expect(eventsOfType(h.events, 'sync_completed')).toEqual([
        {
          type: 'sync_completed',
          successCount: 1,
          errorCount: 0,
          durationMs: 0,
          remainingOperations: 0,
          timestamp: at(1000)
        }
      ]);
    });

    it('collapses rapid writes into one pass in queue order', async () => {
      const h = await setup();
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });
      await advance(500);
      await h.orchestrator.queueOperation('tasks', 'update', { done: true }, 't1');
      await advance(500);
      await h.orchestrator.queueOperation('tasks', 'delete', {}, 't1');

      await advance(1000);
      expect(h.remote.calls.map((call) => call.method)).toEqual(['create', 'update', 'delete']);
      expect(eventsOfType(h.events, 'sync_completed')).toHaveLength(1);
    });

    it('delivers operations already persisted when it starts online', async () => {
      const storage = new MemoryKeyValueStore();
      const previous = new PendingOperationStore(storage);
      await previous.enqueue('notes', 'update', { body: 'edited' }, 'n1');

      const store = new PendingOperationStore(storage);
      const remote = new FakeRemote();
      const network = createConnectivityMonitor(createManualConnectivitySource(true));
      const orchestrator = new SyncOrchestrator({ store, remote, network });
      await orchestrator.start();

      expect(orchestrator.getState().pendingCount).toBe(1);
      await advance(1000);
      expect(remote.calls).toEqual([{ method: 'update', table: 'notes', recordId: 'n1', payload: { body: 'edited' } }]);
      orchestrator.dispose();
      network.destroy();
    });

    it('returns null once disposed', async () => {
      const h = await setup();
      h.orchestrator.dispose();
      await expect(h.orchestrator.queueOperation('tasks', 'create', { id: 't1' })).resolves.toBeNull();
      await expect(h.orchestrator.sync()).resolves.toBeNull();
      expect(h.store.count).toBe(0);
    });
  });

  describe('retries', () => {
    it('retries failed passes with growing delays and drops the operation at maxRetries', async () => {
      const h = await setup();
      h.remote.failWith = new TypeError('fetch failed');
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });

      await advance(1000);
      expect(h.remote.calls).toHaveLength(1);
      expect(h.store.get(h.store.list()[0].id)?.retryCount).toBe(1);
      expect(h.orchestrator.currentStatus).toBe('error');

      await advance(1999);
      expect(h.remote.calls).toHaveLength(1);
      await advance(1);
      expect(h.remote.calls).toHaveLength(2);

      await advance(4000);
      expect(h.remote.calls).toHaveLength(3);
      expect(h.store.count).toBe(0);

      expect(eventsOfType(h.events, 'retry_scheduled').map((e) => e.delayMs)).toEqual([2000, 4000]);
      expect(eventsOfType(h.events, 'operation_dropped')).toMatchObject([
        { reason: 'max_retries', message: 'fetch failed', operation: { table: 'tasks', kind: 'create' } }
      ]);
      const passes = eventsOfType(h.events, 'sync_completed');
      expect(passes).toHaveLength(3);
      expect(passes[passes.length - 1]).toMatchObject({ successCount: 0, errorCount: 1, remainingOperations: 0 });

      await advance(60_000);
      expect(h.remote.calls).toHaveLength(3);
    });

    it('keeps the pass retry delay between the initial and maximum delay', async () => {
      const h = await setup({
        config: { initialRetryDelayMs: 1000, maxRetryDelayMs: 5000, backoffMultiplier: 2, maxRetries: 10 }
      });
      h.remote.failWith = new RemoteError('Service Unavailable', { status: 503 });
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });

      await advance(1000);
      for (const delay of [1000, 2000, 4000, 5000]) {
        await advance(delay);
      }

      expect(eventsOfType(h.events, 'retry_scheduled').map((e) => e.delayMs)).toEqual([1000, 2000, 4000, 5000, 5000]);
      expect(h.remote.calls).toHaveLength(5);
    });

    it('records the failure in the sync state', async () => {
      const h = await setup();
      h.remote.failures.push(new RemoteError('Service Unavailable', { status: 503 }));
      await h.orchestrator.queueOperation('tasks', 'update', { title: 'x' }, 't1');
      await advance(1000);

      const state = h.orchestrator.getState();
      expect(state.status).toBe('error');
      expect(state.lastError).toBe('Server is temporarily unavailable. Will retry.');
      expect(state.lastErrorDetails).toBe('Service Unavailable');
      expect(state.syncErrors).toEqual([
        {
          table: 'tasks',
          operation: 'update',
          recordId: 't1',
          category: 'server',
          message: 'Service Unavailable',
          timestamp: at(1000)
        }
      ]);
      expect(state.pendingCount).toBe(1);
    });

    it('drops non-retryable failures immediately', async () => {
      const h = await setup();
      h.remote.failures.push(new RemoteError('duplicate key value', { code: '23505', status: 409 }));
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't2' });

      await advance(1000);
      expect(h.remote.calls).toHaveLength(2);
      expect(h.store.count).toBe(0);
      expect(eventsOfType(h.events, 'operation_dropped')).toMatchObject([
        { reason: 'conflict', operation: { payload: { id: 't1' } } }
      ]);
      expect(eventsOfType(h.events, 'retry_scheduled')).toHaveLength(0);
      expect(eventsOfType(h.events, 'sync_completed')[0]).toMatchObject({ successCount: 1, errorCount: 1 });
    });

    it('asks for re-authentication on auth failures', async () => {
      const h = await setup();
      h.remote.failWith = new RemoteError('JWT expired', { code: 'PGRST301', status: 401 });
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });

      await advance(1000);
      expect(h.store.count).toBe(0);
      expect(eventsOfType(h.events, 'operation_dropped')[0]).toMatchObject({ reason: 'auth' });
      expect(eventsOfType(h.events, 'auth_required')).toEqual([
        { type: 'auth_required', message: 'JWT expired', timestamp: at(1000) }
      ]);
      expect(h.orchestrator.getState().lastError).toBe('Session expired. Please sign in again.');
    });

    it('counts a hung remote call as a timeout', async () => {
      const h = await setup({ config: { requestTimeoutMs: 5000 } });
      h.remote.hold();
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });

      await advance(1000);
      await advance(5000);
      expect(h.orchestrator.isSyncing).toBe(false);
      expect(h.store.list()[0].retryCount).toBe(1);
      expect(h.orchestrator.getState().syncErrors[0]).toMatchObject({
        category: 'timeout',
        message: 'create on tasks timed out after 5s'
      });
      h.remote.release();
    });
  });

  describe('single flight', () => {
    it('skips a pass requested while another is running', async () => {
      const h = await setup();
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });
      h.remote.hold();

      const first = h.orchestrator.sync();
      await settle();
      expect(h.orchestrator.isSyncing).toBe(true);
      expect(get(h.orchestrator.status)).toBe('syncing');

      await expect(h.orchestrator.sync()).resolves.toBeNull();
      await advance(1000);
      expect(h.remote.calls).toHaveLength(1);

      h.remote.release();
      await expect(first).resolves.toEqual({
        successCount: 1,
        errorCount: 0,
        durationMs: 1000,
        remainingOperations: 0
      });
      expect(h.remote.calls).toHaveLength(1);
    });

    it('skips operations removed by a pushed change during the pass', async () => {
      const h = await setup();
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });
      await h.orchestrator.queueOperation('tasks', 'update', { title: 'local' }, 't2');
      h.remote.hold();

      const pass = h.orchestrator.sync();
      await settle();
      await h.orchestrator.handleRealtimeChange('tasks', 'update', {
        id: 't2',
        title: 'remote',
        updated_at: at(500)
      });
      h.remote.release();

      await expect(pass).resolves.toMatchObject({ successCount: 1, errorCount: 0, remainingOperations: 0 });
      expect(h.remote.calls).toEqual([{ method: 'create', table: 'tasks', payload: { id: 't1' } }]);
    });

    it('leaves operations queued during a pass for the next one', async () => {
      const h = await setup();
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });
      h.remote.hold();

      const pass = h.orchestrator.sync();
      await settle();
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't2' });
      h.remote.release();

      await expect(pass).resolves.toMatchObject({ successCount: 1, remainingOperations: 1 });
      await advance(1000);
      expect(h.remote.calls.map((call) => call.payload)).toEqual([{ id: 't1' }, { id: 't2' }]);
      expect(h.store.count).toBe(0);
    });
  });

  describe('connectivity', () => {
    it('does not sync while offline and catches up after reconnecting', async () => {
      const h = await setup({ online: false });
      expect(h.orchestrator.currentStatus).toBe('offline');
      expect(h.orchestrator.isOnline).toBe(false);

      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });
      await advance(5000);
      await expect(h.orchestrator.sync()).resolves.toBeNull();
      expect(h.remote.calls).toHaveLength(0);
      expect(h.orchestrator.currentStatus).toBe('offline');

      h.source.setOnline(true);
      await advance(10);
      expect(h.orchestrator.isOnline).toBe(true);
      expect(h.orchestrator.currentStatus).toBe('idle');
      expect(eventsOfType(h.events, 'connectivity_changed').map((e) => e.isOnline)).toEqual([true]);

      await advance(1000);
      expect(h.remote.calls).toHaveLength(1);
      expect(h.orchestrator.currentStatus).toBe('success');
    });

    it('runs a forced pass while offline', async () => {
      const h = await setup({ online: false });
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });

      await expect(h.orchestrator.sync({ force: true })).resolves.toMatchObject({ successCount: 1 });
      expect(h.orchestrator.currentStatus).toBe('offline');
    });

    it('reports offline when the link drops during a pass', async () => {
      const h = await setup();
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });
      h.remote.hold();

      const pass = h.orchestrator.sync();
      await settle();
      h.source.setOnline(false);
      await settle();
      h.remote.release();
      await pass;

      expect(h.orchestrator.currentStatus).toBe('offline');
    });

    it('cancels a pending debounced pass when going offline', async () => {
      const h = await setup();
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });
      h.source.setOnline(false);
      await settle();

      await advance(5000);
      expect(h.remote.calls).toHaveLength(0);
      expect(eventsOfType(h.events, 'connectivity_changed').map((e) => e.isOnline)).toEqual([false]);
    });

    it('pauses realtime while offline and resubscribes after reconnecting', async () => {
      const h = await setup();
      await h.orchestrator.watchTable('tasks');
      h.transport.ack(h.transport.latest(), 'subscribed');

      h.source.setOnline(false);
      await settle();
      expect(h.subscriptions.getHealthStatus().paused).toBe(true);

      h.transport.ack(h.transport.latest(), 'channel_error');
      expect(h.subscriptions.getHealthStatus().pendingReconnects).toBe(0);

      h.source.setOnline(true);
      await advance(10);
      expect(h.transport.channels).toHaveLength(2);
      expect(h.transport.open()).toHaveLength(1);
      expect(h.subscriptions.getHealthStatus().paused).toBe(false);
    });
  });

  describe('pushed changes', () => {
    it('discards a local operation older than the pushed row', async () => {
      const h = await setup({ online: false });
      await h.orchestrator.queueOperation('tasks', 'update', { title: 'local' }, 't1');
      vi.setSystemTime(new Date(T0.getTime() + 5000));

      const row = { id: 't1', title: 'remote', updated_at: at(2000) };
      await h.orchestrator.handleRealtimeChange('tasks', 'update', row);

      expect(h.store.count).toBe(0);
      expect(await h.storage.get(PENDING_OPERATIONS_KEY)).toBe('[]');
      expect(await h.cache.get('tasks', 't1')).toEqual(row);
      expect(eventsOfType(h.events, 'realtime_change_processed')).toEqual([
        {
          type: 'realtime_change_processed',
          table: 'tasks',
          changeKind: 'update',
          recordId: 't1',
          conflictsResolved: 1,
          discarded: 1,
          timestamp: at(5000)
        }
      ]);
      expect(h.orchestrator.getState().pendingCount).toBe(0);
    });

    it('keeps a local operation queued after the pushed row was written', async () => {
      const h = await setup({ online: false });
      await h.orchestrator.queueOperation('tasks', 'update', { title: 'local' }, 't1');

      await h.orchestrator.handleRealtimeChange('tasks', 'update', {
        id: 't1',
        title: 'remote',
        updated_at: at(-1000)
      });

      expect(h.store.count).toBe(1);
      expect(eventsOfType(h.events, 'realtime_change_processed')[0]).toMatchObject({
        conflictsResolved: 1,
        discarded: 0
      });
    });

    it('keeps the local operation when both timestamps are equal', async () => {
      const h = await setup({ online: false });
      await h.orchestrator.queueOperation('tasks', 'update', { title: 'local' }, 't1');

      await h.orchestrator.handleRealtimeChange('tasks', 'update', { id: 't1', updated_at: at(0) });
      expect(h.store.count).toBe(1);
    });

    it('ignores local operations queued outside the conflict window', async () => {
      const h = await setup({ online: false });
      await h.orchestrator.queueOperation('tasks', 'update', { title: 'local' }, 't1');
      vi.setSystemTime(new Date(T0.getTime() + 31_000));

      await h.orchestrator.handleRealtimeChange('tasks', 'update', { id: 't1', updated_at: at(30_000) });

      expect(h.store.count).toBe(1);
      expect(eventsOfType(h.events, 'realtime_change_processed')[0]).toMatchObject({
        conflictsResolved: 0,
        discarded: 0
      });
    });

    it('treats a row without updated_at as modified just now', async () => {
      const h = await setup({ online: false });
      await h.orchestrator.queueOperation('tasks', 'update', { title: 'local' }, 't1');
      vi.setSystemTime(new Date(T0.getTime() + 1000));

      await h.orchestrator.handleRealtimeChange('tasks', 'update', { id: 't1', title: 'remote' });
      expect(h.store.count).toBe(0);
    });

    it('removes deleted rows from the cache', async () => {
      const h = await setup({ online: false });
      await h.orchestrator.handleRealtimeChange('tasks', 'insert', { id: 't1', title: 'a' });
      await h.orchestrator.handleRealtimeChange('tasks', 'delete', { id: 't1' });

      expect(await h.cache.get('tasks', 't1')).toBeNull();
      expect(eventsOfType(h.events, 'realtime_change_processed').map((e) => e.changeKind)).toEqual([
        'insert',
        'delete'
      ]);
    });

    it('reconciles overlapping pushed changes to one table in arrival order', async () => {
      const h = await setup({ online: false });
      await h.orchestrator.queueOperation('tasks', 'update', { title: 'local' }, 'b');

      await Promise.all([
        h.orchestrator.handleRealtimeChange('tasks', 'insert', { id: 'a' }),
        h.orchestrator.handleRealtimeChange('tasks', 'update', { id: 'b', title: 'remote' }),
        h.orchestrator.handleRealtimeChange('tasks', 'delete', { id: 'b' })
      ]);

      expect(await h.cache.getAll('tasks')).toEqual([{ id: 'a' }]);
      expect(eventsOfType(h.events, 'realtime_change_processed').map((e) => [e.changeKind, e.recordId])).toEqual([
        ['insert', 'a'],
        ['update', 'b'],
        ['delete', 'b']
      ]);
    });

    it('tracks when each table last received a pushed change', async () => {
      const h = await setup({ online: false });
      expect(h.orchestrator.getLastSyncTime('tasks')).toBeNull();
      expect(h.orchestrator.needsSync('tasks')).toBe(true);

      await h.orchestrator.handleRealtimeChange('tasks', 'insert', { id: 't1' });
      expect(h.orchestrator.getLastSyncTime('tasks')).toEqual(T0);
      expect(h.orchestrator.needsSync('tasks')).toBe(false);

      vi.setSystemTime(new Date(T0.getTime() + 300_001));
      expect(h.orchestrator.needsSync('tasks')).toBe(true);
      expect(h.orchestrator.needsSync('tasks', 600_000)).toBe(false);
      expect(h.orchestrator.getHealthStatus().lastSyncTimes).toEqual({ tasks: at(0) });
    });
  });

  describe('watchTable', () => {
    it('routes channel callbacks through conflict handling into the cache', async () => {
      const h = await setup();
      const onRemoteChange = vi.fn();
      const id = await h.orchestrator.watchTable('tasks', { filter: 'user_id=eq.7', onRemoteChange });

      expect(id).toBe('sync_tasks');
      const channel = h.transport.latest();
      expect(channel.spec).toEqual({ name: 'realtime_tasks_sync_tasks', table: 'tasks', filter: 'user_id=eq.7' });

      channel.handlers.onUpdate?.({ id: 't9', title: 'from server' });
      await settle();
      expect(onRemoteChange).toHaveBeenCalledWith('tasks', { id: 't9', title: 'from server' });
      expect(await h.cache.get('tasks', 't9')).toEqual({ id: 't9', title: 'from server' });

      channel.handlers.onDelete?.({ id: 't9' });
      await settle();
      expect(await h.cache.get('tasks', 't9')).toBeNull();
    });

    it('requires a subscription manager', async () => {
      const network = createConnectivityMonitor(createManualConnectivitySource(true));
      const orchestrator = new SyncOrchestrator({
        store: new PendingOperationStore(new MemoryKeyValueStore()),
        remote: new FakeRemote(),
        network
      });
      await expect(orchestrator.watchTable('tasks')).rejects.toThrow('watchTable requires a SubscriptionManager');
    });
  });

  describe('outbox management', () => {
    it('keeps queued operations and retry counts across restarts', async () => {
      const h = await setup();
      h.remote.failWith = new TypeError('fetch failed');
      await h.orchestrator.queueOperation('tasks', 'update', { title: 'x' }, 't1');
      await advance(1000);

      const reloaded = new PendingOperationStore(h.storage);
      expect(await reloaded.load()).toBe(1);
      expect(reloaded.list()).toEqual(h.store.list());
      expect(reloaded.list()[0].retryCount).toBe(1);
    });

    it('clears every pending operation', async () => {
      const h = await setup({ online: false });
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't2' });

      await expect(h.orchestrator.clearPendingOperations()).resolves.toBe(2);
      expect(h.orchestrator.pendingOperationsCount).toBe(0);
      expect(h.orchestrator.getState().pendingCount).toBe(0);
      expect(eventsOfType(h.events, 'pending_operations_cleared')).toEqual([
        { type: 'pending_operations_cleared', clearedCount: 2, timestamp: at(0) }
      ]);
    });

    it('stops listening and cancels every timer on dispose', async () => {
      const h = await setup();
      h.remote.failWith = new TypeError('fetch failed');
      await h.orchestrator.queueOperation('tasks', 'create', { id: 't1' });
      await advance(1000);

      // periodic timer + pass retry
      expect(vi.getTimerCount()).toBe(2);
      expect(h.orchestrator.getHealthStatus().retryScheduled).toBe(true);

      const eventCount = h.events.length;
      h.orchestrator.dispose();
      expect(vi.getTimerCount()).toBe(0);
      expect(h.orchestrator.getHealthStatus().disposed).toBe(true);

      h.source.setOnline(false);
      await settle();
      expect(h.events).toHaveLength(eventCount);
    });
  });
});
