/**
 * @fileoverview Offline Message Queue
 *
 * Holds outgoing messages (chat messages, commands) that could not be sent
 * while offline and replays them through a caller-supplied sender.
 *
 * Unlike the row outbox, every message carries its own retry state:
 *   - a failed send waits `retryDelayMs * retryCount` before the next try;
 *   - after `maxRetryAttempts` failed sends the message moves to a
 *     dead-letter bucket, from where it can be retried or discarded by hand;
 *   - messages older than `staleAfterMs` are reported stale but never
 *     deleted automatically.
 *
 * Both lists are persisted as JSON under {@link MESSAGE_QUEUE_KEY} and
 * {@link FAILED_MESSAGES_KEY} after every change.
 */

import { linearRetryDelay } from './backoff';
import { resolveMessageQueueConfig, type MessageQueueConfig } from './config';
import { debugError, debugLog, debugWarn } from './debug';
import { extractErrorMessage } from './errors';
import type { KeyValueStore } from './storage';
import { isRecord, now } from './utils';

// =============================================================================
// Types
// =============================================================================

export const MESSAGE_QUEUE_KEY = 'offline_message_queue';
export const FAILED_MESSAGES_KEY = 'offline_message_failed';

/** A message to deliver; identity is its `id`. */
export type MessageRecord = { id: string } & Record<string, unknown>;

export type MessageContext = Record<string, unknown>;

export interface QueuedMessage {
  message: MessageRecord;
  context: MessageContext | null;
  queuedAt: string;
  retryCount: number;
  lastAttemptAt: string | null;
  lastError: string | null;
}

/** Delivers one message; rejects on failure. */
export type MessageSender = (message: MessageRecord, context: MessageContext | null) => Promise<void>;

export interface ProcessQueueResult {
  sent: number;
  failed: number;
  deadLettered: number;
  skipped: number;
}

// =============================================================================
// Serialization
// =============================================================================

function isMessageRecord(value: unknown): value is MessageRecord {
  return isRecord(value) && typeof value.id === 'string' && value.id.length > 0;
}

function parseQueuedMessage(raw: unknown): QueuedMessage | null {
  if (!isRecord(raw)) return null;
  const { message, context, queuedAt, retryCount, lastAttemptAt, lastError } = raw;

  if (!isMessageRecord(message)) return null;
  if (typeof queuedAt !== 'string' || Number.isNaN(Date.parse(queuedAt))) return null;
  if (typeof retryCount !== 'number' || !Number.isInteger(retryCount) || retryCount < 0) return null;

  return {
    message,
    context: isRecord(context) ? context : null,
    queuedAt,
    retryCount,
    lastAttemptAt: typeof lastAttemptAt === 'string' ? lastAttemptAt : null,
    lastError: typeof lastError === 'string' ? lastError : null
  };
}

// =============================================================================
// Queue
// =============================================================================

export class OfflineMessageQueue {
  readonly config: Readonly<MessageQueueConfig>;

  private queue: QueuedMessage[] = [];
  private failed: QueuedMessage[] = [];
  private processing = false;
  private disposed = false;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private lastSender: MessageSender | null = null;

  constructor(
    private readonly storage: KeyValueStore,
    config: Partial<MessageQueueConfig> = {}
  ) {
    this.config = resolveMessageQueueConfig(config);
  }

  get queuedMessageCount(): number {
    return this.queue.length;
  }

  get failedMessageCount(): number {
    return this.failed.length;
  }

  get isProcessing(): boolean {
    return this.processing;
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /** Restore both lists from storage. Malformed entries are skipped. */
  async load(): Promise<void> {
    this.queue = await this.readList(MESSAGE_QUEUE_KEY);
    this.failed = await this.readList(FAILED_MESSAGES_KEY);
    debugLog(`[MSGQ] Loaded ${this.queue.length} queued and ${this.failed.length} failed message(s)`);
  }

  private async readList(key: string): Promise<QueuedMessage[]> {
    let serialized: string | null;
    try {
      serialized = await this.storage.get(key);
    } catch (e) {
      debugError(`[MSGQ] Failed to read ${key}:`, e);
      return [];
    }
    if (serialized === null) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(serialized);
    } catch (e) {
      debugError(`[MSGQ] ${key} is not valid JSON, starting empty:`, e);
      return [];
    }
    if (!Array.isArray(raw)) return [];

    const entries: QueuedMessage[] = [];
    for (const item of raw) {
      const entry = parseQueuedMessage(item);
      if (entry) entries.push(entry);
      else debugWarn(`[MSGQ] Skipping malformed entry in ${key}:`, item);
    }
    return entries;
  }

  private async persist(): Promise<void> {
    try {
      await this.storage.set(MESSAGE_QUEUE_KEY, JSON.stringify(this.queue));
      await this.storage.set(FAILED_MESSAGES_KEY, JSON.stringify(this.failed));
    } catch (e) {
      debugError('[MSGQ] Failed to persist message queue:', e);
    }
  }

  // ---------------------------------------------------------------------------
  // Queue management
  // ---------------------------------------------------------------------------

  /**
   * Add a message. A message whose id is already queued is left as it is.
   *
   * @returns The queued entry.
   */
  async queueMessage(message: MessageRecord, context?: MessageContext): Promise<QueuedMessage> {
    const existing = this.queue.find((entry) => entry.message.id === message.id);
    if (existing) {
      debugWarn(`[MSGQ] Message ${message.id} is already queued`);
      return existing;
    }

    const entry: QueuedMessage = {
      message: { ...message },
      context: context ? { ...context } : null,
      queuedAt: now(),
      retryCount: 0,
      lastAttemptAt: null,
      lastError: null
    };
    this.queue.push(entry);
    await this.persist();
    debugLog(`[MSGQ] Queued message ${message.id} (${this.queue.length} queued)`);
    return entry;
  }

  /** @returns Whether the message was queued. */
  async removeMessage(id: string): Promise<boolean> {
    const before = this.queue.length;
    this.queue = this.queue.filter((entry) => entry.message.id !== id);
    if (this.queue.length === before) return false;
    await this.persist();
    return true;
  }

  getQueuedMessages(): readonly QueuedMessage[] {
    return [...this.queue];
  }

  isMessageQueued(id: string): boolean {
    return this.queue.some((entry) => entry.message.id === id);
  }

  getRetryCount(id: string): number {
    return this.queue.find((entry) => entry.message.id === id)?.retryCount ?? 0;
  }

  /** Whether the entry's backoff has elapsed at `at` (epoch ms). */
  isReadyForRetry(entry: QueuedMessage, at = Date.now()): boolean {
    if (entry.retryCount === 0 || entry.lastAttemptAt === null) return true;
    const lastAttempt = Date.parse(entry.lastAttemptAt);
    return at - lastAttempt >= linearRetryDelay(entry.retryCount, this.config.retryDelayMs);
  }

  getMessagesReadyForRetry(at = Date.now()): readonly QueuedMessage[] {
    return this.queue.filter((entry) => this.isReadyForRetry(entry, at));
  }

  /** Drop every queued and dead-lettered message. */
  async clearQueue(): Promise<void> {
    this.cancelRetry();
    this.queue = [];
    this.failed = [];
    await this.persist();
    debugLog('[MSGQ] Queue cleared');
  }

  // ---------------------------------------------------------------------------
  // Dead letters
  // ---------------------------------------------------------------------------

  getFailedMessages(): readonly QueuedMessage[] {
    return [...this.failed];
  }

  /**
   * Move a dead-lettered message back to the queue with a fresh retry
   * budget.
   */
  async retryFailedMessage(id: string): Promise<boolean> {
    const entry = this.failed.find((item) => item.message.id === id);
    if (!entry) return false;

    this.failed = this.failed.filter((item) => item !== entry);
    if (!this.isMessageQueued(id)) {
      this.queue.push({ ...entry, retryCount: 0, lastAttemptAt: null, lastError: null });
    }
    await this.persist();
    return true;
  }

  async discardFailedMessage(id: string): Promise<boolean> {
    const before = this.failed.length;
    this.failed = this.failed.filter((item) => item.message.id !== id);
    if (this.failed.length === before) return false;
    await this.persist();
    return true;
  }

  // ---------------------------------------------------------------------------
  // Staleness
  // ---------------------------------------------------------------------------

  isStale(entry: QueuedMessage, at = Date.now()): boolean {
    return at - Date.parse(entry.queuedAt) > this.config.staleAfterMs;
  }

  /** Stale entries from both the queue and the dead-letter bucket. */
  getStaleMessages(at = Date.now()): readonly QueuedMessage[] {
    return [...this.queue, ...this.failed].filter((entry) => this.isStale(entry, at));
  }

  /** Short human-readable summary of the queue. */
  statusDescription(): string {
    if (this.queue.length === 0 && this.failed.length === 0) return 'No queued messages';
    const parts: string[] = [];
    if (this.queue.length > 0) parts.push(`${this.queue.length} queued`);
    if (this.failed.length > 0) parts.push(`${this.failed.length} failed`);
    return parts.join(', ');
  }

  // ---------------------------------------------------------------------------
  // Processing
  // ---------------------------------------------------------------------------

  /**
   * Send every queued message whose backoff has elapsed, oldest first.
   *
   * @returns Counts for the run, or `null` when a run is already in
   *   progress or the queue is disposed.
   */
  async processQueue(send: MessageSender): Promise<ProcessQueueResult | null> {
    if (this.disposed || this.processing) return null;

    this.processing = true;
    this.lastSender = send;
    this.cancelRetry();
    const result: ProcessQueueResult = { sent: 0, failed: 0, deadLettered: 0, skipped: 0 };

    try {
      const snapshot = [...this.queue];
      for (const entry of snapshot) {
        if (!this.queue.includes(entry)) continue;
        if (!this.isReadyForRetry(entry)) {
          result.skipped++;
          continue;
        }

        try {
          await send(entry.message, entry.context);
          this.queue = this.queue.filter((item) => item !== entry);
          result.sent++;
        } catch (error) {
          this.recordFailure(entry, error, result);
        }
      }

      await this.persist();
    } finally {
      this.processing = false;
    }

    debugLog(
      `[MSGQ] Processed queue: ${result.sent} sent, ${result.failed} failed, ` +
        `${result.deadLettered} dead-lettered, ${result.skipped} waiting`
    );
    this.scheduleRetry();
    return result;
  }

  private recordFailure(entry: QueuedMessage, error: unknown, result: ProcessQueueResult) {
    const updated: QueuedMessage = {
      ...entry,
      retryCount: entry.retryCount + 1,
      lastAttemptAt: now(),
      lastError: extractErrorMessage(error)
    };

    if (updated.retryCount >= this.config.maxRetryAttempts) {
      this.queue = this.queue.filter((item) => item !== entry);
      this.failed.push(updated);
      result.deadLettered++;
      debugWarn(
        `[MSGQ] Message ${entry.message.id} moved to failed after ${updated.retryCount} attempts: ${updated.lastError}`
      );
    } else {
      this.queue = this.queue.map((item) => (item === entry ? updated : item));
      result.failed++;
      debugLog(`[MSGQ] Message ${entry.message.id} failed (attempt ${updated.retryCount}), will retry`);
    }
  }

  private cancelRetry() {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  // Re-run after the shortest remaining backoff among retried messages
  private scheduleRetry() {
    if (this.disposed || !this.lastSender) return;
    const sender = this.lastSender;

    const at = Date.now();
    let shortest: number | null = null;
    for (const entry of this.queue) {
      if (entry.retryCount === 0 || entry.lastAttemptAt === null) continue;
      const due =
        Date.parse(entry.lastAttemptAt) + linearRetryDelay(entry.retryCount, this.config.retryDelayMs);
      const wait = Math.max(due - at, 0);
      if (shortest === null || wait < shortest) shortest = wait;
    }
    if (shortest === null) return;

    this.cancelRetry();
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.processQueue(sender).catch((e) => debugError('[MSGQ] Retry run failed:', e));
    }, shortest);
  }

  /** Cancel the retry timer and refuse further processing. */
  dispose(): void {
    this.disposed = true;
    this.cancelRetry();
    this.lastSender = null;
  }
}
