/**
 * @fileoverview Realtime Subscription Manager
 *
 * Keeps one push channel per caller-chosen subscription id, tracks each
 * channel's connection state and reconnects failed channels with
 * exponential backoff.
 *
 * ## State machine (per channel)
 *
 * ```
 *   disconnected --> connecting --> connected
 *                        |              |
 *                        v              v
 *                      error <----------+
 *                        |
 *                        +--> connecting   (after the reconnect delay)
 * ```
 *
 * ## Reconnection
 *
 * A timeout, channel error or close schedules attempt `n` after
 * `min(baseDelayMs * multiplier^(n-1), maxDelayMs)`. The counter resets when
 * the channel reports `subscribed`. After `maxAttempts` consecutive failures
 * the channel stays in `error` and {@link SubscriptionManager.onChannelAbandoned}
 * listeners are told. Each channel has at most one pending reconnect timer:
 * scheduling a new one cancels the old.
 *
 * While paused (connectivity lost) no reconnects are scheduled; the stored
 * configs survive so {@link SubscriptionManager.reconnectAll} can restore
 * every channel.
 *
 * Acknowledgements from a channel that has since been replaced or closed
 * are ignored.
 *
 * @see {@link ./supabase/channels.ts} for the Supabase transport
 * @see {@link ./engine.ts} for routing pushed rows into the outbox
 */

import { writable, type Readable } from 'svelte/store';
import { reconnectDelay } from './backoff';
import { resolveReconnectConfig, type ReconnectConfig } from './config';
import { debugError, debugLog, debugWarn } from './debug';
import type {
  ChannelAck,
  ChannelHandle,
  PushTransport,
  RowCallback,
  SubscriptionState
} from './types';
import { sleep } from './utils';

// =============================================================================
// Types
// =============================================================================

export interface SubscriptionConfig {
  table: string;
  /** Row filter (`column=eq.value`; `column=value` is normalized by the transport). */
  filter?: string;
  onInsert?: RowCallback;
  onUpdate?: RowCallback;
  onDelete?: RowCallback;
}

export type ChannelAbandonedListener = (id: string, table: string) => void;

export interface SubscriptionHealth {
  disposed: boolean;
  paused: boolean;
  totalSubscriptions: number;
  connectedSubscriptions: number;
  pendingReconnects: number;
  subscriptionStates: Record<string, SubscriptionState>;
}

/** Live channel for a subscription id. Identity is used to spot stale acks. */
interface ActiveChannel {
  handle: ChannelHandle;
}

// =============================================================================
// Manager
// =============================================================================

export class SubscriptionManager {
  private readonly config: Readonly<ReconnectConfig>;
  private readonly configs = new Map<string, SubscriptionConfig>();
  private readonly channels = new Map<string, ActiveChannel>();
  private readonly attempts = new Map<string, number>();
  private readonly reconnectTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly abandoned = new Set<string>();
  private readonly abandonedListeners = new Set<ChannelAbandonedListener>();

  private states: Record<string, SubscriptionState> = {};
  private readonly statusStore = writable<Record<string, SubscriptionState>>({});

  private paused = false;
  private disposed = false;

  constructor(
    private readonly transport: PushTransport,
    config: Partial<ReconnectConfig> = {}
  ) {
    this.config = resolveReconnectConfig(config);
  }

  /** Per-channel states; replays the current map to new subscribers. */
  get status(): Readable<Record<string, SubscriptionState>> {
    return { subscribe: this.statusStore.subscribe };
  }

  // ---------------------------------------------------------------------------
  // Subscribing
  // ---------------------------------------------------------------------------

  /**
   * Open (or replace) the channel for `id`.
   *
   * An existing channel for the same id is closed first, and any pending
   * reconnect for it is cancelled.
   */
  async subscribe(id: string, config: SubscriptionConfig): Promise<void> {
    if (this.disposed) {
      debugWarn(`[REALTIME] Ignoring subscribe(${id}) on a disposed manager`);
      return;
    }

    this.cancelReconnect(id);
    this.attempts.delete(id);
    this.abandoned.delete(id);
    this.configs.set(id, config);

    await this.connect(id);
  }

  async unsubscribe(id: string): Promise<void> {
    this.cancelReconnect(id);
    this.configs.delete(id);
    this.attempts.delete(id);
    this.abandoned.delete(id);

    await this.closeChannel(id);

    if (id in this.states) {
      const next = { ...this.states };
      delete next[id];
      this.states = next;
      this.statusStore.set({ ...next });
    }
    debugLog(`[REALTIME] Unsubscribed ${id}`);
  }

  async unsubscribeAll(): Promise<void> {
    const ids = new Set([...this.configs.keys(), ...this.channels.keys(), ...Object.keys(this.states)]);
    for (const id of ids) {
      await this.unsubscribe(id);
    }
  }

  /**
   * Tear down every channel, wait `settleDelayMs`, then resubscribe each
   * stored config. Clears the paused flag.
   */
  async reconnectAll(): Promise<void> {
    if (this.disposed) return;

    const snapshot = [...this.configs.entries()];
    debugLog(`[REALTIME] Reconnecting ${snapshot.length} channel(s)`);
    this.paused = false;

    await this.unsubscribeAll();
    if (this.config.settleDelayMs > 0 && snapshot.length > 0) {
      await sleep(this.config.settleDelayMs);
    }

    for (const [id, config] of snapshot) {
      // A caller may have subscribed the id again while we were waiting
      if (this.disposed || this.configs.has(id)) continue;
      await this.subscribe(id, config);
    }
  }

  /**
   * Stop scheduling reconnects and reset attempt counters. Channels and
   * configs are kept.
   */
  pause(): void {
    this.paused = true;
    for (const id of [...this.reconnectTimers.keys()]) {
      this.cancelReconnect(id);
    }
    this.attempts.clear();
    debugLog('[REALTIME] Reconnection paused');
  }

  // ---------------------------------------------------------------------------
  // Listeners & inspection
  // ---------------------------------------------------------------------------

  /**
   * Register a listener for channels that exhausted their reconnect
   * attempts.
   *
   * @returns An unsubscribe function.
   */
  onChannelAbandoned(listener: ChannelAbandonedListener): () => void {
    this.abandonedListeners.add(listener);
    return () => this.abandonedListeners.delete(listener);
  }

  getState(id: string): SubscriptionState {
    return this.states[id] ?? 'disconnected';
  }

  isConnected(id: string): boolean {
    return this.states[id] === 'connected';
  }

  /** Number of reconnect attempts made since the channel was last connected. */
  getReconnectAttempts(id: string): number {
    return this.attempts.get(id) ?? 0;
  }

  /** True when at least one channel exists and all of them are connected. */
  isHealthy(): boolean {
    const states = Object.values(this.states);
    return states.length > 0 && states.every((state) => state === 'connected');
  }

  getHealthStatus(): SubscriptionHealth {
    const subscriptionStates = { ...this.states };
    return {
      disposed: this.disposed,
      paused: this.paused,
      totalSubscriptions: Object.keys(subscriptionStates).length,
      connectedSubscriptions: Object.values(subscriptionStates).filter((s) => s === 'connected').length,
      pendingReconnects: this.reconnectTimers.size,
      subscriptionStates
    };
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    await this.unsubscribeAll();
    this.disposed = true;
    this.abandonedListeners.clear();
    debugLog('[REALTIME] Subscription manager disposed');
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private setState(id: string, state: SubscriptionState) {
    if (this.states[id] === state) return;
    this.states = { ...this.states, [id]: state };
    this.statusStore.set({ ...this.states });
  }

  private async closeChannel(id: string): Promise<void> {
    const active = this.channels.get(id);
    if (!active) return;
    // Forget the channel before closing so its CLOSED ack is treated as stale
    this.channels.delete(id);
    try {
      await this.transport.close(active.handle);
    } catch (e) {
      debugError(`[REALTIME] Failed to close channel ${active.handle.name}:`, e);
    }
  }

  private async connect(id: string): Promise<void> {
    const config = this.configs.get(id);
    if (!config) return;

    await this.closeChannel(id);

    // Superseded or removed while the old channel was closing
    if (this.disposed || this.configs.get(id) !== config) return;

    this.setState(id, 'connecting');
    const name = `realtime_${config.table}_${id}`;

    try {
      const handle = this.transport.openChannel(
        { name, table: config.table, filter: config.filter },
        {
          onInsert: config.onInsert && this.guard(id, 'insert', config.onInsert),
          onUpdate: config.onUpdate && this.guard(id, 'update', config.onUpdate),
          onDelete: config.onDelete && this.guard(id, 'delete', config.onDelete)
        }
      );
      const active: ActiveChannel = { handle };
      this.channels.set(id, active);
      this.transport.subscribe(handle, (ack, error) => this.handleAck(id, active, ack, error));
      debugLog(`[REALTIME] Subscribing ${name}`);
    } catch (e) {
      debugError(`[REALTIME] Failed to open channel ${name}:`, e);
      this.setState(id, 'error');
      this.scheduleReconnect(id);
    }
  }

  private guard(id: string, event: string, callback: RowCallback): RowCallback {
    return (record) => {
      try {
        callback(record);
      } catch (e) {
        debugError(`[REALTIME] ${event} handler for ${id} threw:`, e);
      }
    };
  }

  private handleAck(id: string, active: ActiveChannel, ack: ChannelAck, error?: Error) {
    if (this.channels.get(id) !== active) {
      debugLog(`[REALTIME] Ignoring ${ack} from a stale channel for ${id}`);
      return;
    }

    if (ack === 'subscribed') {
      this.cancelReconnect(id);
      this.attempts.delete(id);
      this.abandoned.delete(id);
      this.setState(id, 'connected');
      debugLog(`[REALTIME] ${active.handle.name} connected`);
      return;
    }

    debugWarn(`[REALTIME] ${active.handle.name} reported ${ack}`, error ?? '');
    this.setState(id, 'error');
    this.scheduleReconnect(id);
  }

  private cancelReconnect(id: string) {
    const timer = this.reconnectTimers.get(id);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.reconnectTimers.delete(id);
    }
  }

  private scheduleReconnect(id: string) {
    if (this.disposed || this.paused) return;
    const config = this.configs.get(id);
    if (!config || this.abandoned.has(id)) return;

    this.cancelReconnect(id);

    const attempt = (this.attempts.get(id) ?? 0) + 1;
    if (attempt > this.config.maxAttempts) {
      this.abandoned.add(id);
      debugError(
        `[REALTIME] Giving up on ${id} after ${this.config.maxAttempts} reconnect attempts`
      );
      for (const listener of [...this.abandonedListeners]) {
        try {
          listener(id, config.table);
        } catch (e) {
          debugError('[REALTIME] channel_abandoned listener threw:', e);
        }
      }
      return;
    }

    this.attempts.set(id, attempt);
    const delay = reconnectDelay(attempt, this.config);
    debugLog(`[REALTIME] Reconnecting ${id} in ${delay}ms (attempt ${attempt}/${this.config.maxAttempts})`);

    this.reconnectTimers.set(
      id,
      setTimeout(() => {
        this.reconnectTimers.delete(id);
        this.connect(id).catch((e) => debugError(`[REALTIME] Reconnect of ${id} failed:`, e));
      }, delay)
    );
  }
}
