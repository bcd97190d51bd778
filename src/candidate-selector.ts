import { logger } from './logger.js';
import type { FetchCursor, ForwardConfig, Message, MessageSource } from './types.js';

/** Text-only, non-blank posts are the only ones relayed. */
export function isEligible(message: Message): boolean {
  return !message.hasMedia && message.body.trim().length > 0;
}

function withinCursor(message: Message, cursor: FetchCursor, now: Date): boolean {
  if (cursor.kind === 'watermark') return message.id > cursor.afterId;
  const ts = message.timestamp.getTime();
  return ts >= cursor.since.getTime() && ts <= now.getTime();
}

/**
 * Streams the messages a cycle should forward, oldest first.
 *
 * The sequence is lazy and single-use: it pulls from the transport as the
 * delivery scheduler consumes it. Transport failures propagate to the
 * consumer as they happen.
 */
export async function* selectCandidates(
  source: MessageSource,
  config: ForwardConfig,
  cursor: FetchCursor,
  now: Date,
): AsyncGenerator<Message> {
  let lastId = cursor.kind === 'watermark' ? cursor.afterId : 0;
  let skipped = 0;

  for await (const message of source.fetchMessages(config.sourceChannel, cursor)) {
    if (message.id <= lastId) {
      logger.debug({ messageId: message.id, lastId }, 'Out-of-order message dropped');
      continue;
    }
    if (!withinCursor(message, cursor, now)) continue;
    if (!isEligible(message)) {
      skipped++;
      continue;
    }
    lastId = message.id;
    yield message;
  }

  if (skipped > 0) {
    logger.debug({ skipped, source: config.sourceChannel }, 'Skipped non-text messages');
  }
}

/**
 * Single pushed message treated as a batch of one, under the same rules as
 * a pull scan. Empty when the message is not text or already forwarded.
 */
export function selectIncoming(message: Message, watermark: number | null): Message[] {
  if (!isEligible(message)) return [];
  if (watermark !== null && message.id <= watermark) return [];
  return [message];
}

/**
 * A pushed message plus any eligible posts between the watermark and it,
 * oldest first. The gap holds posts a live event could not forward, such as
 * ones that arrived while the window was closed.
 */
export async function* selectLive(
  source: MessageSource,
  config: ForwardConfig,
  message: Message,
  watermark: number | null,
  now: Date,
): AsyncGenerator<Message> {
  if (watermark !== null && message.id > watermark + 1) {
    const cursor: FetchCursor = { kind: 'watermark', afterId: watermark };
    for await (const earlier of selectCandidates(source, config, cursor, now)) {
      if (earlier.id >= message.id) break;
      yield earlier;
    }
  }
  yield* selectIncoming(message, watermark);
}
