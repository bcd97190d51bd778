import { describe, expect, it, vi } from 'vitest';

import {
  ConfigState,
  isValidCron,
  loadInitialConfig,
  parseForwardConfig,
  parseWindow,
} from './config-state.js';
import { ConfigError, PersistenceError } from './errors.js';
import { testConfig } from './test-utils.js';

function issuesOf(candidate: unknown): string[] {
  try {
    parseForwardConfig(candidate);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe('parseForwardConfig', () => {
  it('accepts a valid configuration and freezes it', () => {
    const config = parseForwardConfig(testConfig());
    expect(config.sourceChannel).toBe('@source');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.destinations)).toBe(true);
  });

  it('rejects unknown modes', () => {
    expect(issuesOf({ ...testConfig(), mode: 'weekly' })[0]).toMatch(/^mode: /);
  });

  it('rejects an unknown time zone', () => {
    expect(issuesOf(testConfig({ timezone: 'Mars/Olympus' }))).toEqual([
      'timezone: unknown time zone "Mars/Olympus"',
    ]);
  });

  it('rejects a malformed cron expression', () => {
    expect(issuesOf(testConfig({ cronSchedule: '* * *' }))).toEqual([
      'cronSchedule: invalid cron expression "* * *"',
    ]);
  });

  it('rejects an empty window', () => {
    expect(issuesOf(testConfig({ window: { kind: 'hours', startHour: 8, endHour: 8 } }))).toEqual([
      'window: start and end hour must differ (use "always" for all day)',
    ]);
  });

  it('rejects out-of-range hours', () => {
    expect(
      issuesOf(testConfig({ window: { kind: 'hours', startHour: 8, endHour: 25 } }))[0],
    ).toMatch(/^window\.endHour: /);
  });

  it('requires a destination when forwarding to the list', () => {
    expect(issuesOf(testConfig({ destinations: [] }))).toEqual([
      'destinations: at least one destination is required',
    ]);
  });

  it('allows an empty list when forwarding to all groups', () => {
    expect(issuesOf(testConfig({ destinations: [], forwardTo: 'all' }))).toEqual([]);
  });

  it('rejects duplicates regardless of case', () => {
    expect(issuesOf(testConfig({ destinations: ['@groupA', '@GroupA'] }))).toEqual([
      'destinations: duplicate "@GroupA"',
    ]);
  });

  it('rejects negative pacing', () => {
    expect(issuesOf(testConfig({ pacingSeconds: -1 }))[0]).toMatch(/^pacingSeconds: /);
  });
});

describe('isValidCron', () => {
  it('accepts five-field expressions', () => {
    expect(isValidCron('*/5 8-22 * * 1-5', 'Asia/Tehran')).toBe(true);
  });

  it('rejects other field counts and garbage', () => {
    expect(isValidCron('0 * * * * *')).toBe(false);
    expect(isValidCron('every minute')).toBe(false);
  });
});

describe('parseWindow', () => {
  it('parses always and hour ranges', () => {
    expect(parseWindow('always')).toEqual({ kind: 'always' });
    expect(parseWindow('8-22')).toEqual({ kind: 'hours', startHour: 8, endHour: 22 });
    expect(parseWindow('22 8')).toEqual({ kind: 'hours', startHour: 22, endHour: 8 });
  });

  it('returns null for anything else', () => {
    expect(parseWindow('morning')).toBeNull();
    expect(parseWindow('8')).toBeNull();
  });
});

describe('loadInitialConfig', () => {
  it('prefers a valid stored configuration', () => {
    const stored = testConfig({ sourceChannel: '@stored' });
    expect(loadInitialConfig(stored).sourceChannel).toBe('@stored');
  });
});

describe('ConfigState', () => {
  it('swaps in a validated configuration and notifies listeners', () => {
    const state = new ConfigState(testConfig());
    const listener = vi.fn();
    state.subscribe(listener);

    const next = state.update({ mode: 'listen' });

    expect(state.currentConfig()).toBe(next);
    expect(next.mode).toBe('listen');
    expect(listener).toHaveBeenCalledWith(next, expect.objectContaining({ mode: 'new' }));
  });

  it('leaves the configuration unchanged on a rejected update', () => {
    const state = new ConfigState(testConfig());
    const before = state.currentConfig();

    expect(() => state.update({ cronSchedule: 'nope' })).toThrow(ConfigError);
    expect(state.currentConfig()).toBe(before);
  });

  it('keeps old snapshots intact', () => {
    const state = new ConfigState(testConfig());
    const snapshot = state.currentConfig();

    state.update({ destinations: ['@other'] });

    expect(snapshot.destinations).toEqual(['@groupA', '@groupB']);
  });

  it('persists before swapping', () => {
    const persist = vi.fn();
    const state = new ConfigState(testConfig(), { persist });

    const next = state.update({ order: 'batch' });

    expect(persist).toHaveBeenCalledWith(next);
  });

  it('does not swap when persisting fails', () => {
    const state = new ConfigState(testConfig(), {
      persist: () => {
        throw new Error('read-only');
      },
    });
    const before = state.currentConfig();

    expect(() => state.update({ order: 'batch' })).toThrow(PersistenceError);
    expect(state.currentConfig()).toBe(before);
  });

  it('keeps notifying after a listener throws', () => {
    const state = new ConfigState(testConfig());
    const second = vi.fn();
    state.subscribe(() => {
      throw new Error('listener broke');
    });
    state.subscribe(second);

    state.update({ pacingSeconds: 5 });

    expect(second).toHaveBeenCalledTimes(1);
  });

  it('stops notifying after unsubscribe', () => {
    const state = new ConfigState(testConfig());
    const listener = vi.fn();
    const unsubscribe = state.subscribe(listener);
    unsubscribe();

    state.update({ pacingSeconds: 5 });

    expect(listener).not.toHaveBeenCalled();
  });
});
