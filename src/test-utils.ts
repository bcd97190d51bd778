import { TransportError } from './errors.js';
import type {
  FetchCursor,
  ForwardConfig,
  GroupDirectory,
  Message,
  MessageSender,
  MessageSource,
  MessageSubscriber,
  OnSourceMessage,
  SendOutcome,
  Unsubscribe,
} from './types.js';

// In-process stand-ins for the Telegram transport, shared by the tests.

export function textMessage(id: number, timestamp: string, body = `post ${id}`): Message {
  return { id, timestamp: new Date(timestamp), body, hasMedia: false };
}

export function mediaMessage(id: number, timestamp: string, caption = ''): Message {
  return { id, timestamp: new Date(timestamp), body: caption, hasMedia: true };
}

export function testConfig(overrides: Partial<ForwardConfig> = {}): ForwardConfig {
  return {
    sourceChannel: '@source',
    destinations: ['@groupA', '@groupB'],
    forwardTo: 'list',
    mode: 'new',
    order: 'one_by_one',
    cronSchedule: '* * * * *',
    window: { kind: 'always' },
    timezone: 'UTC',
    pacingSeconds: 0,
    ...overrides,
  };
}

export interface SentText {
  destination: string;
  body: string;
}

export class FakeTransport
  implements MessageSource, MessageSender, MessageSubscriber, GroupDirectory
{
  messages: Message[] = [];
  sent: SentText[] = [];
  failing = new Set<string>();
  publicGroups: string[] = [];
  fetchCalls: FetchCursor[] = [];
  /** Throw after this many messages have been yielded by a fetch. */
  failFetchAfter: number | null = null;
  latestError: Error | null = null;
  private handlers = new Map<string, OnSourceMessage>();

  async *fetchMessages(channel: string, cursor: FetchCursor): AsyncGenerator<Message> {
    this.fetchCalls.push(cursor);
    const ordered = [...this.messages].sort((a, b) => a.id - b.id);
    let yielded = 0;
    for (const message of ordered) {
      if (cursor.kind === 'watermark' && message.id <= cursor.afterId) continue;
      if (cursor.kind === 'window' && message.timestamp < cursor.since) continue;
      if (this.failFetchAfter !== null && yielded >= this.failFetchAfter) {
        throw new TransportError('connection lost', channel);
      }
      yielded++;
      yield message;
    }
  }

  async latestMessageId(): Promise<number | null> {
    if (this.latestError) throw this.latestError;
    if (this.messages.length === 0) return null;
    return Math.max(...this.messages.map((m) => m.id));
  }

  async sendText(destination: string, body: string): Promise<void> {
    if (this.failing.has(destination)) {
      throw new TransportError('send refused', destination);
    }
    this.sent.push({ destination, body });
  }

  subscribe(channel: string, onMessage: OnSourceMessage): Unsubscribe {
    this.handlers.set(channel, onMessage);
    return () => {
      this.handlers.delete(channel);
    };
  }

  subscribedChannels(): string[] {
    return [...this.handlers.keys()];
  }

  emit(channel: string, message: Message): void {
    this.handlers.get(channel)?.(message);
  }

  async listPublicGroups(): Promise<string[]> {
    return [...this.publicGroups];
  }
}

/** A transport that can address every destination in one call. */
export class BatchFakeTransport extends FakeTransport {
  batchCalls: string[][] = [];

  async sendTextBatch(destinations: readonly string[], body: string): Promise<SendOutcome[]> {
    this.batchCalls.push([...destinations]);
    return destinations.map((destination) => {
      if (this.failing.has(destination)) {
        return { destination, ok: false, error: 'send refused' };
      }
      this.sent.push({ destination, body });
      return { destination, ok: true };
    });
  }
}
