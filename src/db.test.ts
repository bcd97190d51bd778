import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  _getTestDatabase,
  _initTestDatabase,
  _setRawWatermark,
  getDeliveryLog,
  getRecentCycleRuns,
  getStoredForwardConfig,
  getWatermark,
  logCycleRun,
  logDeliveries,
  migrateLegacyConfig,
  pruneDeliveryLog,
  setForwardConfig,
  setWatermark,
} from './db.js';
import { testConfig } from './test-utils.js';

beforeEach(() => {
  _initTestDatabase();
});

// --- Forward configuration ---

describe('forward config', () => {
  it('returns undefined when nothing is stored', () => {
    expect(getStoredForwardConfig()).toBeUndefined();
  });

  it('stores and reads back a configuration', () => {
    const config = testConfig({
      window: { kind: 'hours', startHour: 22, endHour: 8 },
      timezone: 'Asia/Tehran',
      pacingSeconds: 60,
    });
    setForwardConfig(config);

    expect(getStoredForwardConfig()).toEqual({
      sourceChannel: '@source',
      destinations: ['@groupA', '@groupB'],
      forwardTo: 'list',
      mode: 'new',
      order: 'one_by_one',
      cronSchedule: '* * * * *',
      window: { kind: 'hours', startHour: 22, endHour: 8 },
      timezone: 'Asia/Tehran',
      pacingSeconds: 60,
    });
  });

  it('stores an always-open window as NULL hours', () => {
    setForwardConfig(testConfig({ window: { kind: 'always' } }));
    const row = _getTestDatabase()
      .prepare('SELECT window_start, window_end FROM forward_config')
      .get();
    expect(row).toEqual({ window_start: null, window_end: null });
    expect(getStoredForwardConfig()?.window).toEqual({ kind: 'always' });
  });

  it('keeps a single row', () => {
    setForwardConfig(testConfig({ sourceChannel: '@first' }));
    setForwardConfig(testConfig({ sourceChannel: '@second' }));
    const count = _getTestDatabase().prepare('SELECT COUNT(*) AS n FROM forward_config').get();
    expect(count).toEqual({ n: 1 });
    expect(getStoredForwardConfig()?.sourceChannel).toBe('@second');
  });

  it('ignores a row with unreadable destinations', () => {
    setForwardConfig(testConfig());
    _getTestDatabase().prepare("UPDATE forward_config SET destinations = '[broken'").run();
    expect(getStoredForwardConfig()).toBeUndefined();
  });
});

// --- Watermarks ---

describe('watermarks', () => {
  it('upserts and never decreases', () => {
    setWatermark('@source', 'new', 5);
    setWatermark('@source', 'new', 9);
    setWatermark('@source', 'new', 7);
    expect(getWatermark('@source', 'new')).toBe(9);
  });

  it('replaces a corrupted value', () => {
    _setRawWatermark('@source', 'new', 'garbage');
    setWatermark('@source', 'new', 5);
    expect(getWatermark('@source', 'new')).toBe(5);
  });

  it('returns undefined for an unknown pair', () => {
    expect(getWatermark('@source', 'listen')).toBeUndefined();
  });
});

// --- Delivery history ---

describe('delivery history', () => {
  it('logs deliveries newest first', () => {
    logDeliveries('@source', [
      { messageId: 1, destination: '@groupA', outcome: 'sent' },
      { messageId: 1, destination: '@groupB', outcome: 'failed', error: 'send refused' },
    ]);

    const rows = getDeliveryLog();
    expect(rows.map((r) => [r.message_id, r.destination, r.outcome, r.error])).toEqual([
      [1, '@groupB', 'failed', 'send refused'],
      [1, '@groupA', 'sent', null],
    ]);
  });

  it('records cycle runs', () => {
    logCycleRun({
      source_channel: '@source',
      trigger: 'cron',
      mode: 'new',
      run_at: new Date().toISOString(),
      duration_ms: 12,
      status: 'delivered',
      messages: 3,
      failures: 1,
      error: null,
    });

    const [run] = getRecentCycleRuns();
    expect(run.status).toBe('delivered');
    expect(run.messages).toBe(3);
    expect(run.failures).toBe(1);
  });

  it('prunes entries older than the retention period', () => {
    logDeliveries('@source', [{ messageId: 1, destination: '@groupA', outcome: 'sent' }]);
    const old = new Date(Date.now() - 10 * 86400000).toISOString();
    _getTestDatabase().prepare('UPDATE delivery_log SET delivered_at = ?').run(old);
    logDeliveries('@source', [{ messageId: 2, destination: '@groupA', outcome: 'sent' }]);

    pruneDeliveryLog(7);

    expect(getDeliveryLog().map((r) => r.message_id)).toEqual([2]);
  });
});

// --- Legacy config.json ---

describe('migrateLegacyConfig', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-db-test-'));
    file = path.join(dir, 'config.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('does nothing without a legacy file', () => {
    expect(migrateLegacyConfig(file)).toBe(false);
    expect(getStoredForwardConfig()).toBeUndefined();
  });

  it('imports settings and the last forwarded id', () => {
    fs.writeFileSync(
      file,
      JSON.stringify({
        source_channel: '@legacy',
        supergroups: ['@one', '@two'],
        cron_schedule: '*/5 * * * *',
        forward_mode: 'new',
        forward_order: 'batch',
        time_interval_enabled: true,
        start_hour: 9,
        end_hour: 21,
        last_forwarded_id: 314,
      }),
    );

    expect(migrateLegacyConfig(file)).toBe(true);

    expect(getStoredForwardConfig()).toEqual({
      sourceChannel: '@legacy',
      destinations: ['@one', '@two'],
      forwardTo: 'list',
      mode: 'new',
      order: 'batch',
      cronSchedule: '*/5 * * * *',
      window: { kind: 'hours', startHour: 9, endHour: 21 },
      timezone: 'UTC',
      pacingSeconds: 1,
    });
    expect(getWatermark('@legacy', 'new')).toBe(314);
    expect(fs.existsSync(file)).toBe(false);
    expect(fs.existsSync(`${file}.migrated`)).toBe(true);
  });

  it('maps a disabled time interval to an always-open window', () => {
    fs.writeFileSync(
      file,
      JSON.stringify({ source_channel: '@legacy', supergroups: ['@one'], time_interval_enabled: false }),
    );

    migrateLegacyConfig(file);

    expect(getStoredForwardConfig()?.window).toEqual({ kind: 'always' });
  });

  it('keeps an existing configuration', () => {
    setForwardConfig(testConfig({ sourceChannel: '@current' }));
    fs.writeFileSync(file, JSON.stringify({ source_channel: '@legacy', supergroups: ['@one'] }));

    expect(migrateLegacyConfig(file)).toBe(true);
    expect(getStoredForwardConfig()?.sourceChannel).toBe('@current');
  });

  it('leaves an unreadable file in place', () => {
    fs.writeFileSync(file, '{ not json');
    expect(migrateLegacyConfig(file)).toBe(false);
    expect(fs.existsSync(file)).toBe(true);
  });
});
