import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { DATABASE_FILE, LEGACY_CONFIG_FILE, STORE_DIR } from './config.js';
import { logger } from './logger.js';
import type {
  CycleRunLog,
  DeliveryEntry,
  ForwardConfig,
  ForwardMode,
} from './types.js';

let db: Database.Database;

function createSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS forward_config (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      source_channel TEXT NOT NULL,
      destinations TEXT NOT NULL,
      forward_to TEXT NOT NULL DEFAULT 'list',
      mode TEXT NOT NULL,
      forward_order TEXT NOT NULL,
      cron_schedule TEXT NOT NULL,
      window_start INTEGER,
      window_end INTEGER,
      timezone TEXT NOT NULL,
      pacing_seconds INTEGER NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS watermarks (
      source_channel TEXT NOT NULL,
      mode TEXT NOT NULL,
      last_forwarded_id INTEGER NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (source_channel, mode)
    );

    CREATE TABLE IF NOT EXISTS delivery_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_channel TEXT NOT NULL,
      message_id INTEGER NOT NULL,
      destination TEXT NOT NULL,
      outcome TEXT NOT NULL,
      error TEXT,
      delivered_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_delivery_log_delivered_at ON delivery_log(delivered_at);

    CREATE TABLE IF NOT EXISTS cycle_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_channel TEXT NOT NULL,
      trigger TEXT NOT NULL,
      mode TEXT NOT NULL,
      run_at TEXT NOT NULL,
      duration_ms INTEGER NOT NULL,
      status TEXT NOT NULL,
      messages INTEGER NOT NULL,
      failures INTEGER NOT NULL,
      error TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_cycle_runs_run_at ON cycle_runs(run_at);
  `);
}

export function initDatabase(): void {
  const dbPath = path.join(STORE_DIR, DATABASE_FILE);
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  createSchema(db);

  migrateLegacyConfig(LEGACY_CONFIG_FILE);
}

/** @internal - for tests only. Creates a fresh in-memory database. */
export function _initTestDatabase(): void {
  db = new Database(':memory:');
  createSchema(db);
}

/** @internal - for tests only. */
export function _getTestDatabase(): Database.Database {
  return db;
}

// --- Forward configuration ---

interface ForwardConfigRow {
  source_channel: string;
  destinations: string;
  forward_to: string;
  mode: string;
  forward_order: string;
  cron_schedule: string;
  window_start: number | null;
  window_end: number | null;
  timezone: string;
  pacing_seconds: number;
}

/**
 * Returns the persisted configuration record, unvalidated. Undefined when
 * nothing has been stored yet or the destinations column is unreadable.
 */
export function getStoredForwardConfig(): Record<string, unknown> | undefined {
  const row = db
    .prepare('SELECT * FROM forward_config WHERE id = 1')
    .get() as ForwardConfigRow | undefined;
  if (!row) return undefined;

  let destinations: unknown;
  try {
    destinations = JSON.parse(row.destinations);
  } catch {
    logger.warn('Corrupted destinations in stored config, ignoring it');
    return undefined;
  }

  return {
    sourceChannel: row.source_channel,
    destinations,
    forwardTo: row.forward_to,
    mode: row.mode,
    order: row.forward_order,
    cronSchedule: row.cron_schedule,
    window:
      row.window_start === null || row.window_end === null
        ? { kind: 'always' }
        : { kind: 'hours', startHour: row.window_start, endHour: row.window_end },
    timezone: row.timezone,
    pacingSeconds: row.pacing_seconds,
  };
}

export function setForwardConfig(config: ForwardConfig): void {
  const hours = config.window.kind === 'hours' ? config.window : null;
  db.prepare(
    `INSERT OR REPLACE INTO forward_config
      (id, source_channel, destinations, forward_to, mode, forward_order, cron_schedule, window_start, window_end, timezone, pacing_seconds, updated_at)
     VALUES (1, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    config.sourceChannel,
    JSON.stringify(config.destinations),
    config.forwardTo,
    config.mode,
    config.order,
    config.cronSchedule,
    hours ? hours.startHour : null,
    hours ? hours.endHour : null,
    config.timezone,
    config.pacingSeconds,
    new Date().toISOString(),
  );
}

// --- Watermarks ---

/** Raw stored value; callers validate it. */
export function getWatermark(sourceChannel: string, mode: ForwardMode): unknown {
  const row = db
    .prepare(
      'SELECT last_forwarded_id FROM watermarks WHERE source_channel = ? AND mode = ?',
    )
    .get(sourceChannel, mode) as { last_forwarded_id: unknown } | undefined;
  return row?.last_forwarded_id;
}

/** Never moves a valid watermark backwards; an invalid stored value is overwritten. */
export function setWatermark(
  sourceChannel: string,
  mode: ForwardMode,
  messageId: number,
): void {
  db.prepare(
    `
    INSERT INTO watermarks (source_channel, mode, last_forwarded_id, updated_at) VALUES (?, ?, ?, ?)
    ON CONFLICT(source_channel, mode) DO UPDATE SET
      last_forwarded_id = CASE
        WHEN typeof(last_forwarded_id) = 'integer' AND last_forwarded_id >= 0
          THEN MAX(last_forwarded_id, excluded.last_forwarded_id)
        ELSE excluded.last_forwarded_id
      END,
      updated_at = excluded.updated_at
  `,
  ).run(sourceChannel, mode, messageId, new Date().toISOString());
}

/** @internal - lets tests store a value the validator must reject. */
export function _setRawWatermark(
  sourceChannel: string,
  mode: ForwardMode,
  value: unknown,
): void {
  db.prepare(
    'INSERT OR REPLACE INTO watermarks (source_channel, mode, last_forwarded_id, updated_at) VALUES (?, ?, ?, ?)',
  ).run(sourceChannel, mode, value, new Date().toISOString());
}

// --- Delivery history ---

export function logDeliveries(sourceChannel: string, entries: DeliveryEntry[]): void {
  if (entries.length === 0) return;
  const insert = db.prepare(
    `INSERT INTO delivery_log (source_channel, message_id, destination, outcome, error, delivered_at)
     VALUES (?, ?, ?, ?, ?, ?)`,
  );
  const now = new Date().toISOString();
  const insertAll = db.transaction((rows: DeliveryEntry[]) => {
    for (const entry of rows) {
      insert.run(
        sourceChannel,
        entry.messageId,
        entry.destination,
        entry.outcome,
        entry.error || null,
        now,
      );
    }
  });
  insertAll(entries);
}

export interface DeliveryLogRow {
  id: number;
  source_channel: string;
  message_id: number;
  destination: string;
  outcome: 'sent' | 'failed';
  error: string | null;
  delivered_at: string;
}

export function getDeliveryLog(limit = 50): DeliveryLogRow[] {
  return db
    .prepare('SELECT * FROM delivery_log ORDER BY id DESC LIMIT ?')
    .all(limit) as DeliveryLogRow[];
}

export function logCycleRun(log: CycleRunLog): void {
  db.prepare(
    `
    INSERT INTO cycle_runs (source_channel, trigger, mode, run_at, duration_ms, status, messages, failures, error)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `,
  ).run(
    log.source_channel,
    log.trigger,
    log.mode,
    log.run_at,
    log.duration_ms,
    log.status,
    log.messages,
    log.failures,
    log.error,
  );
}

export function getRecentCycleRuns(limit = 10): CycleRunLog[] {
  return db
    .prepare(
      `SELECT source_channel, trigger, mode, run_at, duration_ms, status, messages, failures, error
       FROM cycle_runs ORDER BY id DESC LIMIT ?`,
    )
    .all(limit) as CycleRunLog[];
}

export function pruneDeliveryLog(keepDays = 7): void {
  const cutoff = new Date(Date.now() - keepDays * 86400000).toISOString();
  db.prepare('DELETE FROM delivery_log WHERE delivered_at < ?').run(cutoff);
  db.prepare('DELETE FROM cycle_runs WHERE run_at < ?').run(cutoff);
}

// --- Legacy config.json migration ---

const legacyConfigSchema = z.object({
  source_channel: z.string().optional(),
  supergroups: z.array(z.string()).optional(),
  cron_schedule: z.string().optional(),
  forward_mode: z.string().optional(),
  forward_order: z.string().optional(),
  time_interval_enabled: z.boolean().optional(),
  start_hour: z.number().int().optional(),
  end_hour: z.number().int().optional(),
  last_forwarded_id: z.number().int().optional(),
});

/**
 * Imports a config.json written by earlier releases, once. The file is
 * renamed to config.json.migrated afterwards. Values are stored as found;
 * they are validated when the configuration is loaded.
 */
export function migrateLegacyConfig(filePath: string): boolean {
  if (!fs.existsSync(filePath)) return false;

  let legacy: z.infer<typeof legacyConfigSchema>;
  try {
    const parsed = legacyConfigSchema.safeParse(
      JSON.parse(fs.readFileSync(filePath, 'utf-8')),
    );
    if (!parsed.success) {
      logger.warn({ filePath, issues: parsed.error.issues }, 'Legacy config not recognised, skipping');
      return false;
    }
    legacy = parsed.data;
  } catch (err) {
    logger.warn({ filePath, err }, 'Legacy config unreadable, skipping');
    return false;
  }

  const existing = db.prepare('SELECT 1 FROM forward_config WHERE id = 1').get();
  const sourceChannel = legacy.source_channel || '@somechannel';
  const mode = legacy.forward_mode === 'today' ? 'today' : 'new';

  if (!existing) {
    const windowEnabled = legacy.time_interval_enabled ?? true;
    db.prepare(
      `INSERT INTO forward_config
        (id, source_channel, destinations, forward_to, mode, forward_order, cron_schedule, window_start, window_end, timezone, pacing_seconds, updated_at)
       VALUES (1, ?, ?, 'list', ?, ?, ?, ?, ?, 'UTC', 1, ?)`,
    ).run(
      sourceChannel,
      JSON.stringify(legacy.supergroups || []),
      mode,
      legacy.forward_order === 'batch' ? 'batch' : 'one_by_one',
      legacy.cron_schedule || '* * * * *',
      windowEnabled ? (legacy.start_hour ?? 8) : null,
      windowEnabled ? (legacy.end_hour ?? 22) : null,
      new Date().toISOString(),
    );
  }

  if (legacy.last_forwarded_id && legacy.last_forwarded_id > 0) {
    setWatermark(sourceChannel, 'new', legacy.last_forwarded_id);
  }

  fs.renameSync(filePath, `${filePath}.migrated`);
  logger.info({ filePath, importedConfig: !existing }, 'Migrated legacy config');
  return true;
}
