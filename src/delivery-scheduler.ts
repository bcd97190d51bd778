import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import type {
  DeliveryEntry,
  DeliveryReport,
  ForwardOrder,
  Message,
  MessageSender,
} from './types.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface DeliveryOptions {
  sender: MessageSender;
  /** Pause after each message's destination pass (one_by_one only). */
  pacingMs: number;
  /** Pause between two destinations of the same message. */
  gapMs?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  /** Called once every destination of a message has been attempted. */
  onMessageSettled?: (message: Message) => void;
}

async function sendOneByOne(
  message: Message,
  destinations: readonly string[],
  options: DeliveryOptions,
  entries: DeliveryEntry[],
): Promise<boolean> {
  const pause = options.sleep ?? sleep;
  const gapMs = options.gapMs ?? 0;

  for (let i = 0; i < destinations.length; i++) {
    if (options.signal?.aborted) return false;
    const destination = destinations[i];
    try {
      await options.sender.sendText(destination, message.body);
      entries.push({ messageId: message.id, destination, outcome: 'sent' });
      logger.debug({ messageId: message.id, destination }, 'Message sent');
    } catch (err) {
      entries.push({
        messageId: message.id,
        destination,
        outcome: 'failed',
        error: errorMessage(err),
      });
      logger.warn({ messageId: message.id, destination, err }, 'Send failed');
    }
    if (gapMs > 0 && i < destinations.length - 1) {
      await pause(gapMs, options.signal);
    }
  }
  return true;
}

async function sendBatch(
  message: Message,
  destinations: readonly string[],
  sendTextBatch: NonNullable<MessageSender['sendTextBatch']>,
  entries: DeliveryEntry[],
): Promise<void> {
  try {
    const outcomes = await sendTextBatch(destinations, message.body);
    const byDestination = new Map(outcomes.map((o) => [o.destination, o]));
    for (const destination of destinations) {
      const outcome = byDestination.get(destination);
      if (outcome?.ok) {
        entries.push({ messageId: message.id, destination, outcome: 'sent' });
      } else {
        entries.push({
          messageId: message.id,
          destination,
          outcome: 'failed',
          error: outcome?.error || 'No outcome reported',
        });
      }
    }
  } catch (err) {
    logger.warn({ messageId: message.id, err }, 'Batch send failed');
    for (const destination of destinations) {
      entries.push({
        messageId: message.id,
        destination,
        outcome: 'failed',
        error: errorMessage(err),
      });
    }
  }
}

/**
 * Delivers `messages` to every destination, in order.
 *
 * one_by_one: each message goes to every destination in configured order,
 * then the scheduler sleeps `pacingMs` before the next message (never after
 * the last one). batch: one multi-target call per message when the sender
 * supports it, otherwise the same as one_by_one.
 *
 * A failed destination never stops the pass. A message counts as settled once
 * all of its destinations were attempted, whatever the outcomes; the caller
 * decides what to persist in `onMessageSettled`. If that hook throws, delivery
 * stops with a persist_error halt.
 */
export async function deliver(
  messages: AsyncIterable<Message> | Iterable<Message>,
  destinations: readonly string[],
  order: ForwardOrder,
  options: DeliveryOptions,
): Promise<DeliveryReport> {
  const report: DeliveryReport = { entries: [], settledIds: [], attempted: 0, halted: null };
  const pause = options.sleep ?? sleep;
  const batchSend =
    order === 'batch' && options.sender.sendTextBatch
      ? options.sender.sendTextBatch.bind(options.sender)
      : null;

  if (order === 'batch' && !batchSend) {
    logger.debug('Sender has no batch support, delivering one by one');
  }

  const iterator = toAsyncIterator(messages);
  let next: IteratorResult<Message>;
  try {
    next = await iterator.next();
  } catch (err) {
    report.halted = { reason: 'source_error', error: err };
    return report;
  }

  while (!next.done) {
    const message = next.value;

    if (options.signal?.aborted) {
      report.halted = { reason: 'cancelled' };
      break;
    }

    report.attempted++;
    if (batchSend) {
      await sendBatch(message, destinations, batchSend, report.entries);
    } else {
      const completed = await sendOneByOne(message, destinations, options, report.entries);
      if (!completed) {
        report.halted = { reason: 'cancelled' };
        break;
      }
    }

    report.settledIds.push(message.id);
    try {
      options.onMessageSettled?.(message);
    } catch (err) {
      report.halted = { reason: 'persist_error', error: err };
      break;
    }

    try {
      next = await iterator.next();
    } catch (err) {
      report.halted = { reason: 'source_error', error: err };
      break;
    }

    if (!next.done && !batchSend && options.pacingMs > 0) {
      await pause(options.pacingMs, options.signal);
    }
  }

  if (report.halted) {
    try {
      await iterator.return?.();
    } catch (err) {
      logger.debug({ err }, 'Closing message stream failed');
    }
  }
  return report;
}

function toAsyncIterator<T>(items: AsyncIterable<T> | Iterable<T>): AsyncIterator<T> {
  if (Symbol.asyncIterator in items) {
    return items[Symbol.asyncIterator]();
  }
  const sync = items[Symbol.iterator]();
  return {
    next: async () => sync.next(),
  };
}

export function failedEntries(report: DeliveryReport): DeliveryEntry[] {
  return report.entries.filter((e) => e.outcome === 'failed');
}
