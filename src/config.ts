import path from 'path';

import { readEnvFile } from './env.js';

const envConfig = readEnvFile([
  'TELEGRAM_API_ID',
  'TELEGRAM_API_HASH',
  'TELEGRAM_SESSION',
  'ADMIN_BOT_TOKEN',
  'ADMIN_USER_IDS',
  'SOURCE_CHANNEL',
  'TARGET_GROUPS',
  'FORWARD_TO',
  'FORWARD_MODE',
  'FORWARD_ORDER',
  'CRON_SCHEDULE',
  'TIME_WINDOW',
  'TIMEZONE',
  'SLEEP_BETWEEN_MESSAGES',
  'SEND_GAP_MS',
]);

function env(key: string): string | undefined {
  return process.env[key] || envConfig[key];
}

function list(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

const PROJECT_ROOT = process.cwd();

export const STORE_DIR = path.resolve(PROJECT_ROOT, 'store');
export const DATABASE_FILE = 'relay.db';

// Config file written by earlier releases; imported once on first start
export const LEGACY_CONFIG_FILE = path.resolve(PROJECT_ROOT, 'config.json');

// Telegram user account (MTProto)
export const TELEGRAM_API_ID = parseInt(env('TELEGRAM_API_ID') || '0', 10) || 0;
export const TELEGRAM_API_HASH = env('TELEGRAM_API_HASH') || '';
export const TELEGRAM_SESSION = env('TELEGRAM_SESSION') || '';
export const TELEGRAM_CONNECTION_RETRIES = 5;

// Admin bot (Bot API)
export const ADMIN_BOT_TOKEN = env('ADMIN_BOT_TOKEN') || '';
export const ADMIN_USER_IDS = list(env('ADMIN_USER_IDS'));

// Initial forwarding configuration, used until one is persisted
export const SOURCE_CHANNEL = env('SOURCE_CHANNEL') || '@somechannel';
export const TARGET_GROUPS = list(env('TARGET_GROUPS'));
export const FORWARD_TO = (env('FORWARD_TO') || 'list').toLowerCase();
export const FORWARD_MODE = (env('FORWARD_MODE') || 'new').toLowerCase();
export const FORWARD_ORDER = (env('FORWARD_ORDER') || 'one_by_one').toLowerCase();
export const CRON_SCHEDULE = env('CRON_SCHEDULE') || '* * * * *';
export const TIME_WINDOW = (env('TIME_WINDOW') || '8-22').toLowerCase();
export const TIMEZONE = env('TIMEZONE') || 'Asia/Tehran';
export const SLEEP_BETWEEN_MESSAGES = parseInt(
  env('SLEEP_BETWEEN_MESSAGES') || '60',
  10,
);

// Pause between two destinations of the same message
export const SEND_GAP_MS = Math.max(
  0,
  parseInt(env('SEND_GAP_MS') || '1000', 10) || 0,
);

export const SHUTDOWN_GRACE_MS = 10000;
export const DELIVERY_LOG_RETENTION_DAYS = 7;
