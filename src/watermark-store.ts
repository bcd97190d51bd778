import { getWatermark, setWatermark } from './db.js';
import { PersistenceError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { FetchCursor, ForwardConfig, ForwardMode, SelectionKind } from './types.js';
import { startOfDay } from './window-gate.js';

export function selectionKind(mode: ForwardMode): SelectionKind {
  return mode === 'today' || mode === 'daily' ? 'window' : 'watermark';
}

/**
 * Remembers the last forwarded message id per (source, mode).
 *
 * A missing or unreadable watermark is reported as null. Callers treat that
 * as "nothing has been forwarded and nothing from history should be", so a
 * lost state file never re-floods the destinations with old posts.
 */
export class WatermarkStore {
  loadWatermark(source: string, mode: ForwardMode): number | null {
    let raw: unknown;
    try {
      raw = getWatermark(source, mode);
    } catch (err) {
      logger.warn({ source, mode, err }, 'Watermark unreadable, treating as missing');
      return null;
    }

    if (raw === undefined || raw === null) return null;
    if (typeof raw !== 'number' || !Number.isSafeInteger(raw) || raw < 0) {
      logger.warn({ source, mode, value: raw }, 'Corrupted watermark, treating as missing');
      return null;
    }
    return raw;
  }

  saveWatermark(source: string, mode: ForwardMode, messageId: number): void {
    try {
      setWatermark(source, mode, messageId);
    } catch (err) {
      throw new PersistenceError(
        `Failed to persist watermark ${messageId} for ${source}: ${errorMessage(err)}`,
        err,
      );
    }
    logger.debug({ source, mode, messageId }, 'Watermark saved');
  }

  /**
   * Where the next fetch starts. Window modes start at local midnight;
   * watermark modes continue after the stored id, or return null when no
   * usable watermark exists yet.
   */
  startOfWindow(config: ForwardConfig, now: Date): FetchCursor | null {
    if (selectionKind(config.mode) === 'window') {
      return { kind: 'window', since: startOfDay(now, config.timezone), until: now };
    }
    const afterId = this.loadWatermark(config.sourceChannel, config.mode);
    if (afterId === null) return null;
    return { kind: 'watermark', afterId };
  }
}
