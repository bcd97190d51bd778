import { Api, TelegramClient, errors, sessions } from 'telegram';
import { NewMessage, type NewMessageEvent } from 'telegram/events/index.js';

import { TELEGRAM_CONNECTION_RETRIES } from '../config.js';
import { TransportError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type {
  FetchCursor,
  GroupDirectory,
  Message,
  MessageSender,
  MessageSource,
  MessageSubscriber,
  OnSourceMessage,
  SendOutcome,
  Unsubscribe,
} from '../types.js';

export interface TelegramUserOptions {
  apiId: number;
  apiHash: string;
  session: string;
}

type RawMessage = Pick<Api.Message, 'id' | 'date' | 'message' | 'media'>;

/** Link previews ride along with text posts and do not make them media. */
export function hasMedia(media: Api.TypeMessageMedia | undefined): boolean {
  if (!media) return false;
  return !(media instanceof Api.MessageMediaWebPage || media instanceof Api.MessageMediaEmpty);
}

export function toMessage(raw: RawMessage): Message {
  return {
    id: raw.id,
    timestamp: new Date(raw.date * 1000),
    body: raw.message ?? '',
    hasMedia: hasMedia(raw.media),
  };
}

function toTransportError(err: unknown, destination?: string): TransportError {
  if (err instanceof TransportError) return err;
  if (err instanceof errors.FloodWaitError) {
    return new TransportError(
      `flood wait of ${err.seconds}s`,
      destination,
      err.seconds,
      err,
    );
  }
  return new TransportError(errorMessage(err), destination, undefined, err);
}

/**
 * The Telegram user account that reads the source channel and posts to the
 * destination groups, over MTProto.
 */
export class TelegramUserTransport
  implements MessageSource, MessageSender, MessageSubscriber, GroupDirectory
{
  private client: TelegramClient;

  constructor(options: TelegramUserOptions) {
    this.client = new TelegramClient(
      new sessions.StringSession(options.session),
      options.apiId,
      options.apiHash,
      { connectionRetries: TELEGRAM_CONNECTION_RETRIES },
    );
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
    } catch (err) {
      throw toTransportError(err);
    }
    if (!(await this.client.checkAuthorization())) {
      throw new TransportError(
        'Session is not authorized. Run `npm run session` and set TELEGRAM_SESSION.',
      );
    }
    logger.info('Connected to Telegram');
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
    logger.info('Disconnected from Telegram');
  }

  async *fetchMessages(channel: string, cursor: FetchCursor): AsyncGenerator<Message> {
    const params =
      cursor.kind === 'watermark'
        ? { reverse: true, minId: cursor.afterId }
        : { reverse: true, offsetDate: Math.floor(cursor.since.getTime() / 1000) };

    try {
      for await (const raw of this.client.iterMessages(channel, params)) {
        yield toMessage(raw);
      }
    } catch (err) {
      throw toTransportError(err, channel);
    }
  }

  async latestMessageId(channel: string): Promise<number | null> {
    try {
      const [latest] = await this.client.getMessages(channel, { limit: 1 });
      return latest ? latest.id : null;
    } catch (err) {
      throw toTransportError(err, channel);
    }
  }

  async sendText(destination: string, body: string): Promise<void> {
    try {
      await this.client.sendMessage(destination, { message: body });
    } catch (err) {
      const error = toTransportError(err, destination);
      if (error.retryAfterSeconds !== undefined) {
        logger.warn(
          { destination, retryAfterSeconds: error.retryAfterSeconds },
          'Telegram flood wait',
        );
      }
      throw error;
    }
  }

  async sendTextBatch(destinations: readonly string[], body: string): Promise<SendOutcome[]> {
    const results = await Promise.allSettled(destinations.map((d) => this.sendText(d, body)));
    return results.map((result, i) =>
      result.status === 'fulfilled'
        ? { destination: destinations[i], ok: true }
        : { destination: destinations[i], ok: false, error: errorMessage(result.reason) },
    );
  }

  subscribe(channel: string, onMessage: OnSourceMessage): Unsubscribe {
    const event = new NewMessage({ chats: [channel] });
    const handler = (update: NewMessageEvent) => {
      onMessage(toMessage(update.message));
    };
    this.client.addEventHandler(handler, event);
    return () => this.client.removeEventHandler(handler, event);
  }

  /** Every group or supergroup of the account that has a public @handle. */
  async listPublicGroups(): Promise<string[]> {
    const groups: string[] = [];
    try {
      for await (const dialog of this.client.iterDialogs({})) {
        const entity = dialog.entity;
        if (!(entity instanceof Api.Channel)) continue;
        if (!(dialog.isGroup || entity.megagroup) || !entity.username) continue;
        groups.push(entity.username.startsWith('@') ? entity.username : `@${entity.username}`);
      }
    } catch (err) {
      throw toTransportError(err);
    }
    logger.info({ count: groups.length }, 'Found public groups');
    return groups;
  }
}
