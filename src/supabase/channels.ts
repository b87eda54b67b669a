/**
 * {@link PushTransport} over Supabase Realtime `postgres_changes`.
 */

import type { RealtimeChannel, SupabaseClient } from '@supabase/supabase-js';
import { debugLog } from '../debug';
import type { ChannelAck, ChannelHandle, ChannelHandlers, ChannelSpec, PushTransport } from '../types';

const OPERATOR_FILTER = /^[^=]+=(eq|neq|lt|lte|gt|gte|like|ilike|in|is)\./;

/**
 * Bring a row filter into PostgREST form.
 *
 * `user_id=42` becomes `user_id=eq.42`; filters that already name an
 * operator pass through unchanged.
 */
export function normalizeFilter(filter: string): string {
  const trimmed = filter.trim();
  if (OPERATOR_FILTER.test(trimmed)) return trimmed;
  const separator = trimmed.indexOf('=');
  if (separator <= 0) return trimmed;
  return `${trimmed.slice(0, separator)}=eq.${trimmed.slice(separator + 1)}`;
}

export class SupabaseChannelTransport implements PushTransport {
  private readonly channels = new WeakMap<ChannelHandle, RealtimeChannel>();

  constructor(
    private readonly client: SupabaseClient,
    private readonly schema = 'public'
  ) {}

  openChannel(spec: ChannelSpec, handlers: ChannelHandlers): ChannelHandle {
    const channel = this.client.channel(spec.name);
    const filter = spec.filter ? normalizeFilter(spec.filter) : undefined;
    const { onInsert, onUpdate, onDelete } = handlers;

    if (onInsert) {
      channel.on(
        'postgres_changes',
        { event: 'INSERT', schema: this.schema, table: spec.table, filter },
        (payload) => onInsert(payload.new)
      );
    }
    if (onUpdate) {
      channel.on(
        'postgres_changes',
        { event: 'UPDATE', schema: this.schema, table: spec.table, filter },
        (payload) => onUpdate(payload.new)
      );
    }
    if (onDelete) {
      channel.on(
        'postgres_changes',
        { event: 'DELETE', schema: this.schema, table: spec.table, filter },
        (payload) => onDelete(payload.old)
      );
    }

    const handle: ChannelHandle = { name: spec.name };
    this.channels.set(handle, channel);
    return handle;
  }

  subscribe(handle: ChannelHandle, onStatus: (ack: ChannelAck, error?: Error) => void): void {
    const channel = this.channels.get(handle);
    if (!channel) {
      onStatus('closed');
      return;
    }

    channel.subscribe((status, err) => {
      debugLog(`[REALTIME] ${handle.name} status: ${status}`);
      switch (status) {
        case 'SUBSCRIBED':
          onStatus('subscribed');
          break;
        case 'TIMED_OUT':
          onStatus('timed_out', err);
          break;
        case 'CHANNEL_ERROR':
          onStatus('channel_error', err);
          break;
        case 'CLOSED':
          onStatus('closed', err);
          break;
      }
    });
  }

  async close(handle: ChannelHandle): Promise<void> {
    const channel = this.channels.get(handle);
    if (!channel) return;
    this.channels.delete(handle);
    await this.client.removeChannel(channel);
  }
}
