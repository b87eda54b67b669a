import { derived, writable, type Readable } from 'svelte/store';
import type { SyncStatus } from '../types';

// Detailed sync error for debugging
export interface SyncErrorEntry {
  table: string;
  operation: string;
  recordId: string | null;
  category: string;
  message: string;
  timestamp: string;
}

export interface SyncState {
  status: SyncStatus;
  pendingCount: number;
  lastError: string | null; // Friendly error message
  lastErrorDetails: string | null; // Raw technical error
  syncErrors: SyncErrorEntry[]; // Errors from the latest pass
  lastSyncTime: string | null;
  syncMessage: string | null; // Human-readable status message
}

// Max errors to keep in history
const MAX_ERROR_HISTORY = 10;

const INITIAL_STATE: SyncState = {
  status: 'idle',
  pendingCount: 0,
  lastError: null,
  lastErrorDetails: null,
  syncErrors: [],
  lastSyncTime: null,
  syncMessage: null
};

export interface SyncStatusStore extends Readable<SyncState> {
  /** Status only; subscribers are notified on actual changes. */
  status: Readable<SyncStatus>;
  getStatus: () => SyncStatus;
  setStatus: (status: SyncStatus) => void;
  setPendingCount: (count: number) => void;
  setError: (friendly: string | null, raw?: string | null) => void;
  addSyncError: (error: SyncErrorEntry) => void;
  clearSyncErrors: () => void;
  setLastSyncTime: (time: string) => void;
  setSyncMessage: (message: string | null) => void;
  reset: () => void;
}

export function createSyncStatusStore(): SyncStatusStore {
  const store = writable<SyncState>({ ...INITIAL_STATE });
  const { subscribe, set, update } = store;

  let currentStatus: SyncStatus = 'idle';

  return {
    subscribe,
    status: derived(store, ($state) => $state.status),
    getStatus: () => currentStatus,
    setStatus: (status: SyncStatus) => {
      // Ignore redundant status updates to prevent unnecessary notifications
      if (status === currentStatus && status !== 'syncing') {
        return;
      }

      currentStatus = status;
      if (status === 'syncing') {
        // Starting a pass clears the previous pass's errors
        update((state) => ({ ...state, status, lastError: null, syncErrors: [] }));
      } else {
        update((state) => ({
          ...state,
          status,
          lastError: status === 'idle' || status === 'success' ? null : state.lastError
        }));
      }
    },
    setPendingCount: (count: number) => update((state) => ({ ...state, pendingCount: count })),
    setError: (friendly: string | null, raw?: string | null) =>
      update((state) => ({
        ...state,
        lastError: friendly,
        lastErrorDetails: raw ?? null
      })),
    addSyncError: (error: SyncErrorEntry) =>
      update((state) => ({
        ...state,
        syncErrors: [...state.syncErrors, error].slice(-MAX_ERROR_HISTORY)
      })),
    clearSyncErrors: () => update((state) => ({ ...state, syncErrors: [] })),
    setLastSyncTime: (time: string) => update((state) => ({ ...state, lastSyncTime: time })),
    setSyncMessage: (message: string | null) =>
      update((state) => ({ ...state, syncMessage: message })),
    reset: () => {
      currentStatus = 'idle';
      set({ ...INITIAL_STATE, syncErrors: [] });
    }
  };
}
