import { DateTime, IANAZone } from 'luxon';

import type { ForwardConfig } from './types.js';

export function isValidTimezone(timezone: string): boolean {
  return IANAZone.isValidZone(timezone);
}

export function localHour(now: Date, timezone: string): number {
  return DateTime.fromJSDate(now, { zone: timezone }).hour;
}

/**
 * Local midnight of the day `now` falls on in `timezone`, as a UTC instant.
 */
export function startOfDay(now: Date, timezone: string): Date {
  return DateTime.fromJSDate(now, { zone: timezone }).startOf('day').toJSDate();
}

/**
 * Whether forwarding may run at `now`. An hour window with end <= start
 * spans midnight, e.g. 22-8 covers [22, 24) and [0, 8).
 */
export function isAllowedNow(
  config: Pick<ForwardConfig, 'window' | 'timezone'>,
  now: Date,
): boolean {
  const { window } = config;
  if (window.kind === 'always') return true;

  const hour = localHour(now, config.timezone);
  if (window.startHour < window.endHour) {
    return window.startHour <= hour && hour < window.endHour;
  }
  return hour >= window.startHour || hour < window.endHour;
}

export function describeWindow(config: Pick<ForwardConfig, 'window' | 'timezone'>): string {
  if (config.window.kind === 'always') return 'always';
  return `${config.window.startHour}:00-${config.window.endHour}:00 (${config.timezone})`;
}
