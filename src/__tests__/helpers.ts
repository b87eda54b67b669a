import type {
  ChannelAck,
  ChannelHandle,
  ChannelHandlers,
  ChannelSpec,
  PushTransport,
  RemoteDataApi,
  RowPayload
} from '../types';
import type { KeyValueStore } from '../storage';

/** Let pending promise chains run without moving the fake clock. */
export async function settle(rounds = 200): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}

// =============================================================================
// Remote API
// =============================================================================

export interface RemoteCall {
  method: 'create' | 'update' | 'delete';
  table: string;
  recordId?: string;
  payload?: RowPayload;
}

export class FakeRemote implements RemoteDataApi {
  readonly calls: RemoteCall[] = [];
  /** Errors thrown by the next calls, in order. */
  readonly failures: unknown[] = [];
  /** Thrown by every call once `failures` is used up. */
  failWith: unknown = null;

  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  /** Make every following call wait until {@link release}. */
  hold(): void {
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = null;
    this.openGate = null;
  }

  async create(table: string, record: RowPayload): Promise<void> {
    await this.respond({ method: 'create', table, payload: record });
  }

  async update(table: string, recordId: string, patch: RowPayload): Promise<void> {
    await this.respond({ method: 'update', table, recordId, payload: patch });
  }

  async delete(table: string, recordId: string): Promise<void> {
    await this.respond({ method: 'delete', table, recordId });
  }

  private async respond(call: RemoteCall): Promise<void> {
    this.calls.push(call);
    if (this.gate) await this.gate;
    if (this.failures.length > 0) throw this.failures.shift();
    if (this.failWith !== null) throw this.failWith;
  }
}

// =============================================================================
// Push transport
// =============================================================================

export interface FakeChannel {
  handle: ChannelHandle;
  spec: ChannelSpec;
  handlers: ChannelHandlers;
  onStatus: ((ack: ChannelAck, error?: Error) => void) | null;
  closed: boolean;
}

export class FakeTransport implements PushTransport {
  readonly channels: FakeChannel[] = [];
  /** Ack delivered from `subscribe`; `null` leaves the channel connecting. */
  autoAck: ChannelAck | null = null;

  openChannel(spec: ChannelSpec, handlers: ChannelHandlers): ChannelHandle {
    const channel: FakeChannel = { handle: { name: spec.name }, spec, handlers, onStatus: null, closed: false };
    this.channels.push(channel);
    return channel.handle;
  }

  subscribe(handle: ChannelHandle, onStatus: (ack: ChannelAck, error?: Error) => void): void {
    const channel = this.channels.find((c) => c.handle === handle);
    if (!channel) return;
    channel.onStatus = onStatus;
    if (this.autoAck) onStatus(this.autoAck);
  }

  async close(handle: ChannelHandle): Promise<void> {
    const channel = this.channels.find((c) => c.handle === handle);
    if (channel) channel.closed = true;
  }

  latest(): FakeChannel {
    const channel = this.channels[this.channels.length - 1];
    if (!channel) throw new Error('No channel opened');
    return channel;
  }

  open(): FakeChannel[] {
    return this.channels.filter((c) => !c.closed);
  }

  ack(channel: FakeChannel, ack: ChannelAck): void {
    channel.onStatus?.(ack, ack === 'subscribed' ? undefined : new Error(ack));
  }
}

// =============================================================================
// Storage
// =============================================================================

/** Key-value store whose writes can be made to fail. */
export class FlakyStorage implements KeyValueStore {
  readonly entries = new Map<string, string>();
  failWrites = false;
  failReads = false;

  async get(key: string): Promise<string | null> {
    if (this.failReads) throw new Error('disk unavailable');
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}

// =============================================================================
// HTTP
// =============================================================================

export interface RecordedRequest {
  url: string;
  method: string | undefined;
  body: unknown;
  headers: Headers;
}

export function createFakeFetch(respond: () => Response | Promise<Response> = () => new Response(null, { status: 201 })) {
  const requests: RecordedRequest[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    requests.push({
      url: input instanceof Request ? input.url : String(input),
      method: init?.method,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null,
      headers: new Headers(init?.headers)
    });
    return respond();
  };
  return { requests, fakeFetch };
}
