import {
  ADMIN_BOT_TOKEN,
  ADMIN_USER_IDS,
  DELIVERY_LOG_RETENTION_DAYS,
  SHUTDOWN_GRACE_MS,
  TELEGRAM_API_HASH,
  TELEGRAM_API_ID,
  TELEGRAM_SESSION,
} from './config.js';
import { AdminBot } from './channels/admin-bot.js';
import { TelegramUserTransport } from './channels/telegram-user.js';
import { ConfigState, loadInitialConfig } from './config-state.js';
import { getStoredForwardConfig, initDatabase, pruneDeliveryLog, setForwardConfig } from './db.js';
import { ForwardQueue } from './forward-queue.js';
import { Forwarder } from './forwarder.js';
import { startListener } from './listener.js';
import { logger } from './logger.js';
import { startTriggerLoop } from './trigger-loop.js';
import { describeWindow } from './window-gate.js';
import { WatermarkStore } from './watermark-store.js';

const PRUNE_INTERVAL = 24 * 60 * 60 * 1000;

function prune(): void {
  try {
    pruneDeliveryLog(DELIVERY_LOG_RETENTION_DAYS);
  } catch (err) {
    logger.warn({ err }, 'Failed to prune delivery history');
  }
}

async function main(): Promise<void> {
  if (!TELEGRAM_API_ID || !TELEGRAM_API_HASH || !TELEGRAM_SESSION) {
    throw new Error('TELEGRAM_API_ID, TELEGRAM_API_HASH and TELEGRAM_SESSION must be set');
  }

  initDatabase();
  logger.info('Database initialized');

  const configState = new ConfigState(loadInitialConfig(getStoredForwardConfig()), {
    persist: setForwardConfig,
  });
  const config = configState.currentConfig();
  logger.info(
    {
      source: config.sourceChannel,
      destinations: config.forwardTo === 'all' ? 'all public groups' : config.destinations,
      mode: config.mode,
      order: config.order,
      cron: config.cronSchedule,
      window: describeWindow(config),
    },
    'Configuration loaded',
  );

  const transport = new TelegramUserTransport({
    apiId: TELEGRAM_API_ID,
    apiHash: TELEGRAM_API_HASH,
    session: TELEGRAM_SESSION,
  });
  await transport.connect();

  const watermarks = new WatermarkStore();
  const queue = new ForwardQueue();
  const forwarder = new Forwarder({ transport, configState, watermarks, queue });

  const triggerLoop = startTriggerLoop({
    configState,
    runCycle: (trigger) => forwarder.runCycle(trigger),
  });

  const stopListener = startListener({
    configState,
    subscriber: transport,
    onMessage: (message) => {
      forwarder.handleIncoming(message).catch((err) => {
        logger.error({ messageId: message.id, err }, 'Live message handling failed');
      });
    },
  });

  let adminBot: AdminBot | null = null;
  if (ADMIN_BOT_TOKEN && ADMIN_USER_IDS.length > 0) {
    adminBot = new AdminBot({
      botToken: ADMIN_BOT_TOKEN,
      allowedUsers: ADMIN_USER_IDS,
      configState,
      watermarks,
    });
    await adminBot.start();
  } else {
    logger.info('Admin bot disabled (ADMIN_BOT_TOKEN or ADMIN_USER_IDS not set)');
  }

  prune();
  const pruneTimer = setInterval(prune, PRUNE_INTERVAL);

  // Graceful shutdown handlers
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');
    triggerLoop.stop();
    stopListener();
    clearInterval(pruneTimer);
    await adminBot?.stop();
    await queue.shutdown(SHUTDOWN_GRACE_MS);
    await transport.disconnect();
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Catch up on anything posted while the process was down
  const startup = await forwarder.runCycle('manual');
  logger.info({ status: startup.status, nextRun: triggerLoop.nextRunAt()?.toISOString() }, 'Relay running');
}

// Guard: only run when executed directly, not when imported by tests
const isDirectRun =
  process.argv[1] &&
  new URL(import.meta.url).pathname === new URL(`file://${process.argv[1]}`).pathname;

if (isDirectRun) {
  main().catch((err) => {
    logger.error({ err }, 'Failed to start relay');
    process.exit(1);
  });
}
