/**
 * Generate a Telegram session string for TELEGRAM_SESSION.
 *
 * Signs in with a personal account (phone number, login code, 2FA password).
 * Anyone holding the printed string can act as that account.
 *
 * Usage:
 *   TELEGRAM_API_ID=... TELEGRAM_API_HASH=... npm run session
 */
import * as readline from 'readline';
import { TelegramClient, sessions } from 'telegram';

import { TELEGRAM_API_HASH, TELEGRAM_API_ID, TELEGRAM_CONNECTION_RETRIES } from '../src/config.js';
import { logger } from '../src/logger.js';

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
});

function question(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, resolve);
  });
}

async function main(): Promise<void> {
  if (!TELEGRAM_API_ID || !TELEGRAM_API_HASH) {
    logger.error('TELEGRAM_API_ID and TELEGRAM_API_HASH must be set (see https://my.telegram.org/apps)');
    process.exit(1);
  }

  const session = new sessions.StringSession('');
  const client = new TelegramClient(session, TELEGRAM_API_ID, TELEGRAM_API_HASH, {
    connectionRetries: TELEGRAM_CONNECTION_RETRIES,
  });

  try {
    await client.start({
      phoneNumber: () => question('Phone number (with country code): '),
      phoneCode: () => question('Login code: '),
      password: () => question('2FA password (Enter to skip): '),
      onError: (err) => {
        logger.error({ err }, 'Login error');
        throw err;
      },
    });

    process.stdout.write(`\nTELEGRAM_SESSION=${session.save()}\n\n`);
    await client.disconnect();
  } catch (err) {
    logger.error({ err }, 'Session generation failed');
    if (client.connected) await client.disconnect();
    process.exit(1);
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'Fatal error');
  process.exit(1);
});
