import { CronExpressionParser } from 'cron-parser';
import { z } from 'zod';

import {
  CRON_SCHEDULE,
  FORWARD_MODE,
  FORWARD_ORDER,
  FORWARD_TO,
  SLEEP_BETWEEN_MESSAGES,
  SOURCE_CHANNEL,
  TARGET_GROUPS,
  TIME_WINDOW,
  TIMEZONE,
} from './config.js';
import { ConfigError, PersistenceError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import {
  FORWARD_MODES,
  FORWARD_ORDERS,
  FORWARD_TARGETS,
  type AllowedWindow,
  type ForwardConfig,
} from './types.js';
import { isValidTimezone } from './window-gate.js';

const windowSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('always') }),
  z.object({
    kind: z.literal('hours'),
    startHour: z.number().int().min(0).max(23),
    endHour: z.number().int().min(0).max(24),
  }),
]);

const forwardConfigSchema = z.object({
  sourceChannel: z.string().trim().min(1, 'source channel is required'),
  destinations: z.array(z.string().trim().min(1, 'destination must not be empty')),
  forwardTo: z.enum(FORWARD_TARGETS),
  mode: z.enum(FORWARD_MODES),
  order: z.enum(FORWARD_ORDERS),
  cronSchedule: z.string().trim(),
  window: windowSchema,
  timezone: z.string().trim(),
  pacingSeconds: z.number().int().min(0),
});

export function isValidCron(expression: string, timezone = 'UTC'): boolean {
  if (expression.trim().split(/\s+/).length !== 5) return false;
  try {
    CronExpressionParser.parse(expression, { tz: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validates a candidate configuration and returns a frozen copy.
 * Throws ConfigError listing every problem found.
 */
export function parseForwardConfig(candidate: unknown): ForwardConfig {
  const parsed = forwardConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`),
    );
  }
  const config = parsed.data;
  const issues: string[] = [];

  if (!isValidTimezone(config.timezone)) {
    issues.push(`timezone: unknown time zone "${config.timezone}"`);
  } else if (!isValidCron(config.cronSchedule, config.timezone)) {
    issues.push(`cronSchedule: invalid cron expression "${config.cronSchedule}"`);
  }

  if (config.window.kind === 'hours' && config.window.startHour === config.window.endHour) {
    issues.push('window: start and end hour must differ (use "always" for all day)');
  }

  if (config.forwardTo === 'list' && config.destinations.length === 0) {
    issues.push('destinations: at least one destination is required');
  }

  const seen = new Set<string>();
  for (const destination of config.destinations) {
    const key = destination.toLowerCase();
    if (seen.has(key)) issues.push(`destinations: duplicate "${destination}"`);
    seen.add(key);
  }

  if (issues.length > 0) throw new ConfigError(issues);

  return Object.freeze({
    ...config,
    destinations: Object.freeze([...config.destinations]),
    window: Object.freeze({ ...config.window }),
  });
}

export function parseWindow(value: string): AllowedWindow | null {
  const text = value.trim().toLowerCase();
  if (text === 'always') return { kind: 'always' };
  const match = text.match(/^(\d{1,2})\s*[-\s]\s*(\d{1,2})$/);
  if (!match) return null;
  return { kind: 'hours', startHour: parseInt(match[1], 10), endHour: parseInt(match[2], 10) };
}

/** Configuration built from environment variables and .env. */
export function defaultForwardConfig(): ForwardConfig {
  return parseForwardConfig({
    sourceChannel: SOURCE_CHANNEL,
    destinations: TARGET_GROUPS,
    forwardTo: FORWARD_TO,
    mode: FORWARD_MODE,
    order: FORWARD_ORDER,
    cronSchedule: CRON_SCHEDULE,
    window: parseWindow(TIME_WINDOW) ?? { kind: 'hours', startHour: 8, endHour: 22 },
    timezone: TIMEZONE,
    pacingSeconds: SLEEP_BETWEEN_MESSAGES,
  });
}

/**
 * Stored configuration when it is present and valid, otherwise the
 * environment defaults.
 */
export function loadInitialConfig(stored: unknown): ForwardConfig {
  if (stored !== undefined) {
    try {
      return parseForwardConfig(stored);
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, 'Stored config invalid, using environment defaults');
    }
  }
  return defaultForwardConfig();
}

export type ConfigListener = (next: ForwardConfig, previous: ForwardConfig) => void;

export interface ConfigStateOptions {
  /** Durable write of an accepted configuration; runs before the swap. */
  persist?: (config: ForwardConfig) => void;
}

/**
 * Process-wide forwarding configuration.
 *
 * Readers get an immutable snapshot; a cycle keeps the snapshot it started
 * with. replaceConfig validates, persists and swaps in one synchronous step,
 * so no reader ever sees a half-applied update.
 */
export class ConfigState {
  private current: ForwardConfig;
  private listeners = new Set<ConfigListener>();
  private persist?: (config: ForwardConfig) => void;

  constructor(initial: ForwardConfig, options: ConfigStateOptions = {}) {
    this.current = parseForwardConfig(initial);
    this.persist = options.persist;
  }

  currentConfig(): ForwardConfig {
    return this.current;
  }

  replaceConfig(candidate: ForwardConfig): ForwardConfig {
    const next = parseForwardConfig(candidate);

    if (this.persist) {
      try {
        this.persist(next);
      } catch (err) {
        throw new PersistenceError(`Failed to persist configuration: ${errorMessage(err)}`, err);
      }
    }

    const previous = this.current;
    this.current = next;
    logger.info({ config: next }, 'Configuration replaced');

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err) {
        logger.error({ err }, 'Config listener failed');
      }
    }
    return next;
  }

  update(patch: Partial<ForwardConfig>): ForwardConfig {
    return this.replaceConfig({ ...this.current, ...patch });
  }

  subscribe(listener: ConfigListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
