import { writable, type Readable } from 'svelte/store';
import { lookup } from 'node:dns/promises';
import { debugError, debugLog } from '../debug';

// =============================================================================
// Connectivity Sources
// =============================================================================

/** Raw online/offline signal the monitor listens to. */
export interface ConnectivitySource {
  isOnline(): boolean | Promise<boolean>;
  /** Returns an unsubscribe function. */
  subscribe(listener: (online: boolean) => void): () => void;
}

export interface ManualConnectivitySource extends ConnectivitySource {
  setOnline(online: boolean): void;
}

/**
 * Source driven by the host application (or tests) through `setOnline`.
 * Listeners are only told about actual changes.
 */
export function createManualConnectivitySource(initiallyOnline = true): ManualConnectivitySource {
  let online = initiallyOnline;
  const listeners = new Set<(online: boolean) => void>();

  return {
    isOnline: () => online,
    subscribe(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    setOnline(next) {
      if (next === online) return;
      online = next;
      for (const listener of [...listeners]) listener(next);
    }
  };
}

export interface ProbeConnectivityOptions {
  /** Reachability check; defaults to a DNS lookup of `host`. */
  probe?: () => Promise<boolean>;
  /** Host resolved by the default probe. Default: `'google.com'`. */
  host?: string;
  /** Timeout (ms) for the default probe. Default: 5000. */
  timeoutMs?: number;
  /** Poll interval (ms) while someone is subscribed. Default: 30000. */
  intervalMs?: number;
}

async function resolvesHost(host: string, timeoutMs: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([lookup(host).then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Source that polls a reachability probe. Polling only runs while at least
 * one listener is subscribed.
 */
export function createProbeConnectivitySource(options: ProbeConnectivityOptions = {}): ConnectivitySource {
  const host = options.host ?? 'google.com';
  const timeoutMs = options.timeoutMs ?? 5000;
  const intervalMs = options.intervalMs ?? 30_000;
  const probe = options.probe ?? (() => resolvesHost(host, timeoutMs));

  const listeners = new Set<(online: boolean) => void>();
  let lastResult: boolean | null = null;
  let pollTimer: ReturnType<typeof setInterval> | null = null;

  async function check(): Promise<boolean> {
    let online: boolean;
    try {
      online = await probe();
    } catch (e) {
      debugLog('[Network] Reachability probe failed:', e);
      online = false;
    }
    if (online !== lastResult) {
      lastResult = online;
      for (const listener of [...listeners]) listener(online);
    }
    return online;
  }

  return {
    isOnline: check,
    subscribe(listener) {
      listeners.add(listener);
      if (pollTimer === null) {
        pollTimer = setInterval(() => {
          check().catch((e) => debugError('[Network] Probe poll failed:', e));
        }, intervalMs);
      }
      return () => {
        listeners.delete(listener);
        if (listeners.size === 0 && pollTimer !== null) {
          clearInterval(pollTimer);
          pollTimer = null;
        }
      };
    }
  };
}

// =============================================================================
// Connectivity Monitor
// =============================================================================

// Callbacks can be sync or async
export type NetworkCallback = () => void | Promise<void>;

export interface ConnectivityMonitor extends Readable<boolean> {
  init: () => Promise<void>;
  isOnline: () => boolean;
  onReconnect: (callback: NetworkCallback) => () => void;
  onDisconnect: (callback: NetworkCallback) => () => void;
  destroy: () => void;
}

export interface ConnectivityMonitorOptions {
  /** Delay (ms) before reconnect callbacks run, letting the link settle. Default: 500. */
  reconnectDelayMs?: number;
}

/**
 * Online/offline store over a {@link ConnectivitySource}.
 *
 * The store value follows the source immediately. Disconnect callbacks run
 * as soon as an online -> offline transition is seen; reconnect callbacks
 * run after `reconnectDelayMs`, and are skipped if the link drops again
 * before then.
 */
export function createConnectivityMonitor(
  source: ConnectivitySource,
  options: ConnectivityMonitorOptions = {}
): ConnectivityMonitor {
  const reconnectDelayMs = options.reconnectDelayMs ?? 500;
  const { subscribe, set } = writable<boolean>(true);
  const reconnectCallbacks: Set<NetworkCallback> = new Set();
  const disconnectCallbacks: Set<NetworkCallback> = new Set();
  let wasOffline = false;
  let currentValue = true; // Track current value to prevent redundant updates
  let initialized = false;
  let reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  let detachSource: (() => void) | null = null;

  function setIfChanged(value: boolean) {
    if (value !== currentValue) {
      currentValue = value;
      set(value);
    }
  }

  // Run callbacks sequentially, properly awaiting async ones
  async function runCallbacksSequentially(
    callbacks: Set<NetworkCallback>,
    label: string
  ): Promise<void> {
    for (const callback of [...callbacks]) {
      try {
        await callback();
      } catch (e) {
        debugError(`[Network] ${label} callback error:`, e);
      }
    }
  }

  function handleOffline() {
    setIfChanged(false);

    // Reconnect never reached the callbacks, so there is nothing to undo
    if (reconnectTimer !== null) {
      clearTimeout(reconnectTimer);
      reconnectTimer = null;
      wasOffline = true;
      return;
    }

    if (!wasOffline) {
      wasOffline = true;
      debugLog('[Network] Connection lost');
      runCallbacksSequentially(disconnectCallbacks, 'Disconnect').catch((e) =>
        debugError('[Network] Disconnect callbacks failed:', e)
      );
    }
  }

  function handleOnline() {
    setIfChanged(true);

    if (wasOffline && reconnectTimer === null) {
      reconnectTimer = setTimeout(() => {
        reconnectTimer = null;
        wasOffline = false;
        debugLog('[Network] Connection restored');
        runCallbacksSequentially(reconnectCallbacks, 'Reconnect').catch((e) =>
          debugError('[Network] Reconnect callbacks failed:', e)
        );
      }, reconnectDelayMs);
    }
  }

  async function init() {
    if (initialized) return; // Idempotent
    initialized = true;

    const initiallyOnline = await source.isOnline();
    currentValue = initiallyOnline;
    set(initiallyOnline);
    wasOffline = !initiallyOnline;

    detachSource = source.subscribe((online) => {
      if (online) handleOnline();
      else handleOffline();
    });
  }

  function onReconnect(callback: NetworkCallback): () => void {
    reconnectCallbacks.add(callback);
    return () => reconnectCallbacks.delete(callback);
  }

  function onDisconnect(callback: NetworkCallback): () => void {
    disconnectCallbacks.add(callback);
    return () => disconnectCallbacks.delete(callback);
  }

  function destroy() {
    if (reconnectTimer !== null) {
      clearTimeout(reconnectTimer);
      reconnectTimer = null;
    }
    detachSource?.();
    detachSource = null;
    reconnectCallbacks.clear();
    disconnectCallbacks.clear();
    initialized = false;
  }

  return {
    subscribe,
    init,
    // "Online" for consumers means reconnect handlers have run
    isOnline: () => currentValue && !wasOffline,
    onReconnect,
    onDisconnect,
    destroy
  };
}
