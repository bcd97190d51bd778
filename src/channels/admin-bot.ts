import { Bot, type Context } from 'grammy';

import {
  ADMIN_COMMAND_NAMES,
  adminCommandDescriptions,
  executeAdminCommand,
  parseAdminCommand,
  type AdminCommandDependencies,
} from '../admin-commands.js';
import { logger } from '../logger.js';

export interface AdminBotOptions extends AdminCommandDependencies {
  botToken: string;
  /** Telegram user ids allowed to change the configuration. */
  allowedUsers: string[];
}

/**
 * Bot API front end for the admin commands. Replies go only to users on
 * the allow-list; everyone else is told their id and ignored.
 */
export class AdminBot {
  private bot: Bot;
  private allowedUsers: Set<string>;
  private deps: AdminCommandDependencies;
  private isRunning = false;

  constructor(options: AdminBotOptions) {
    this.bot = new Bot(options.botToken);
    this.allowedUsers = new Set(options.allowedUsers);
    this.deps = { configState: options.configState, watermarks: options.watermarks };
    this.setupHandlers();
  }

  private setupHandlers(): void {
    for (const name of ADMIN_COMMAND_NAMES) {
      this.bot.command(name, (ctx) => this.handleCommand(ctx));
    }

    this.bot.catch((err) => {
      logger.error({ err: err.error }, 'Admin bot error');
    });
  }

  private async handleCommand(ctx: Context): Promise<void> {
    const userId = ctx.from?.id.toString() || 'unknown';
    if (!this.allowedUsers.has(userId)) {
      logger.warn({ userId }, 'Unauthorized admin command');
      await ctx.reply(`You are not authorized to use this bot. Your user ID is: ${userId}`);
      return;
    }

    const parsed = parseAdminCommand(ctx.message?.text ?? '');
    if (!parsed) return;
    if (!parsed.ok) {
      await ctx.reply(parsed.reply);
      return;
    }

    logger.info({ userId, command: parsed.command.name }, 'Admin command');
    await ctx.reply(executeAdminCommand(parsed.command, this.deps));
  }

  async start(): Promise<void> {
    if (this.isRunning) return;

    await this.bot.api.setMyCommands(adminCommandDescriptions());

    // Long polling never resolves while the bot runs
    this.bot
      .start({
        onStart: (botInfo) => {
          logger.info(
            { username: botInfo.username, admins: this.allowedUsers.size },
            'Admin bot started',
          );
        },
      })
      .catch((err) => {
        logger.error({ err }, 'Admin bot polling stopped');
        this.isRunning = false;
      });
    this.isRunning = true;
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;
    await this.bot.stop();
    this.isRunning = false;
    logger.info('Admin bot stopped');
  }
}
