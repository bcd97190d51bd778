import type { ConfigState } from './config-state.js';
import { parseWindow } from './config-state.js';
import { getRecentCycleRuns } from './db.js';
import { ConfigError, PersistenceError } from './errors.js';
import { logger } from './logger.js';
import {
  FORWARD_MODES,
  FORWARD_ORDERS,
  FORWARD_TARGETS,
  type AllowedWindow,
  type CycleRunLog,
  type ForwardConfig,
  type ForwardMode,
  type ForwardOrder,
  type ForwardTarget,
} from './types.js';
import { selectionKind, type WatermarkStore } from './watermark-store.js';
import { describeWindow } from './window-gate.js';

export type AdminCommand =
  | { name: 'status' }
  | { name: 'help' }
  | { name: 'setchannel'; channel: string }
  | { name: 'setgroups'; groups: string[] }
  | { name: 'addgroup'; group: string }
  | { name: 'removegroup'; group: string }
  | { name: 'setmode'; mode: ForwardMode }
  | { name: 'setorder'; order: ForwardOrder }
  | { name: 'setcron'; expression: string }
  | { name: 'settimeinterval'; window: AllowedWindow }
  | { name: 'settimezone'; timezone: string }
  | { name: 'setpacing'; seconds: number }
  | { name: 'setforwardto'; target: ForwardTarget };

export type AdminCommandName = AdminCommand['name'];

const USAGE: Record<AdminCommandName, string> = {
  status: '/status',
  help: '/help',
  setchannel: '/setchannel @channel_username',
  setgroups: '/setgroups @group1, @group2',
  addgroup: '/addgroup @group',
  removegroup: '/removegroup @group',
  setmode: `/setmode <${FORWARD_MODES.join('|')}>`,
  setorder: `/setorder <${FORWARD_ORDERS.join('|')}>`,
  setcron: '/setcron <minute hour day month weekday>',
  settimeinterval: '/settimeinterval always OR /settimeinterval <start> <end>',
  settimezone: '/settimezone <IANA zone, e.g. Asia/Tehran>',
  setpacing: '/setpacing <seconds>',
  setforwardto: `/setforwardto <${FORWARD_TARGETS.join('|')}>`,
};

const DESCRIPTIONS: Record<AdminCommandName, string> = {
  status: 'Show the current configuration',
  help: 'List admin commands',
  setchannel: 'Set the source channel',
  setgroups: 'Replace the destination groups',
  addgroup: 'Add a destination group',
  removegroup: 'Remove a destination group',
  setmode: 'Set the forward mode',
  setorder: 'Set the delivery order',
  setcron: 'Set the cron schedule',
  settimeinterval: 'Set the daily forwarding hours',
  settimezone: 'Set the time zone',
  setpacing: 'Set seconds between messages',
  setforwardto: 'Forward to the list or all public groups',
};

export const ADMIN_COMMAND_NAMES = Object.keys(USAGE).filter(isCommandName);

export function adminCommandDescriptions(): { command: string; description: string }[] {
  return ADMIN_COMMAND_NAMES.map((name) => ({ command: name, description: DESCRIPTIONS[name] }));
}

function isCommandName(value: string): value is AdminCommandName {
  return Object.prototype.hasOwnProperty.call(USAGE, value);
}

function oneOf<T extends string>(values: readonly T[], value: string): T | undefined {
  return values.find((v) => v === value);
}

export type ParsedAdminCommand =
  | { ok: true; command: AdminCommand }
  | { ok: false; reply: string };

/**
 * Parses "/name args". Returns null for text that is not one of the admin
 * commands. "/name@botname" is accepted.
 */
export function parseAdminCommand(text: string): ParsedAdminCommand | null {
  const match = text.trim().match(/^\/([a-z_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/i);
  if (!match) return null;
  const name = match[1].toLowerCase();
  if (!isCommandName(name)) return null;
  const args = (match[2] ?? '').trim();
  const usage: ParsedAdminCommand = { ok: false, reply: `Usage: ${USAGE[name]}` };

  switch (name) {
    case 'status':
    case 'help':
      return { ok: true, command: { name } };
    case 'setchannel':
    case 'addgroup':
    case 'removegroup': {
      if (!args || /\s/.test(args)) return usage;
      if (name === 'setchannel') return { ok: true, command: { name, channel: args } };
      return { ok: true, command: { name, group: args } };
    }
    case 'setgroups': {
      const groups = args
        .split(/[,\s]+/)
        .map((g) => g.trim())
        .filter(Boolean);
      if (groups.length === 0) return usage;
      return { ok: true, command: { name, groups } };
    }
    case 'setmode': {
      const mode = oneOf(FORWARD_MODES, args.toLowerCase());
      return mode ? { ok: true, command: { name, mode } } : usage;
    }
    case 'setorder': {
      const order = oneOf(FORWARD_ORDERS, args.toLowerCase());
      return order ? { ok: true, command: { name, order } } : usage;
    }
    case 'setforwardto': {
      const target = oneOf(FORWARD_TARGETS, args.toLowerCase());
      return target ? { ok: true, command: { name, target } } : usage;
    }
    case 'setcron':
      return args ? { ok: true, command: { name, expression: args } } : usage;
    case 'settimeinterval': {
      const window = parseWindow(args);
      return window ? { ok: true, command: { name, window } } : usage;
    }
    case 'settimezone':
      return args && !/\s/.test(args) ? { ok: true, command: { name, timezone: args } } : usage;
    case 'setpacing': {
      if (!/^\d+$/.test(args)) return usage;
      return { ok: true, command: { name, seconds: parseInt(args, 10) } };
    }
  }
}

export interface AdminCommandDependencies {
  configState: ConfigState;
  watermarks: WatermarkStore;
}

/** Configuration in the persisted layout, with the current watermark. */
export function formatStatus(
  config: ForwardConfig,
  lastForwardedId: number | null,
  lastCycle: CycleRunLog | null = null,
): string {
  const status = {
    source_channel: config.sourceChannel,
    destinations: config.destinations,
    forward_to: config.forwardTo,
    forward_mode: config.mode,
    forward_order: config.order,
    cron_schedule: config.cronSchedule,
    time_window: describeWindow(config),
    timezone: config.timezone,
    pacing_seconds: config.pacingSeconds,
    last_forwarded_id: lastForwardedId,
    last_cycle: lastCycle && {
      run_at: lastCycle.run_at,
      trigger: lastCycle.trigger,
      status: lastCycle.status,
      messages: lastCycle.messages,
      failures: lastCycle.failures,
    },
  };
  return `Current config:\n${JSON.stringify(status, null, 2)}`;
}

export function helpText(): string {
  return ['Admin commands:', ...ADMIN_COMMAND_NAMES.map((n) => `${USAGE[n]} - ${DESCRIPTIONS[n]}`)].join(
    '\n',
  );
}

function sameGroup(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function applyCommand(
  command: AdminCommand,
  { configState, watermarks }: AdminCommandDependencies,
): string {
  const current = configState.currentConfig();

  switch (command.name) {
    case 'status': {
      const lastForwardedId =
        selectionKind(current.mode) === 'watermark'
          ? watermarks.loadWatermark(current.sourceChannel, current.mode)
          : null;
      const [lastCycle] = getRecentCycleRuns(1);
      return formatStatus(current, lastForwardedId, lastCycle ?? null);
    }
    case 'help':
      return helpText();
    case 'setchannel':
      configState.update({ sourceChannel: command.channel });
      return `Source channel updated: ${command.channel}`;
    case 'setgroups':
      configState.update({ destinations: command.groups });
      return `Destination groups updated: ${command.groups.join(', ')}`;
    case 'addgroup': {
      if (current.destinations.some((d) => sameGroup(d, command.group))) {
        return `${command.group} is already a destination`;
      }
      configState.update({ destinations: [...current.destinations, command.group] });
      return `Added destination: ${command.group}`;
    }
    case 'removegroup': {
      const remaining = current.destinations.filter((d) => !sameGroup(d, command.group));
      if (remaining.length === current.destinations.length) {
        return `${command.group} is not a destination`;
      }
      configState.update({ destinations: remaining });
      return `Removed destination: ${command.group}`;
    }
    case 'setmode':
      configState.update({ mode: command.mode });
      return `Forward mode set to: ${command.mode}`;
    case 'setorder':
      configState.update({ order: command.order });
      return `Forward order set to: ${command.order}`;
    case 'setcron':
      configState.update({ cronSchedule: command.expression });
      return `Cron updated: ${command.expression}`;
    case 'settimeinterval': {
      const next = configState.update({ window: command.window });
      return next.window.kind === 'always'
        ? 'Time interval disabled.'
        : `Time interval set to ${describeWindow(next)}`;
    }
    case 'settimezone':
      configState.update({ timezone: command.timezone });
      return `Time zone set to: ${command.timezone}`;
    case 'setpacing':
      configState.update({ pacingSeconds: command.seconds });
      return `Pacing set to ${command.seconds}s between messages`;
    case 'setforwardto':
      configState.update({ forwardTo: command.target });
      return command.target === 'all'
        ? 'Forwarding to all public groups'
        : 'Forwarding to the destination list';
  }
}

/**
 * Runs a command against the live configuration and returns the reply.
 * Rejected updates leave the configuration unchanged.
 */
export function executeAdminCommand(command: AdminCommand, deps: AdminCommandDependencies): string {
  try {
    return applyCommand(command, deps);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.info({ command: command.name, issues: err.issues }, 'Admin update rejected');
      return `Rejected: ${err.issues.join('; ')}`;
    }
    if (err instanceof PersistenceError) {
      logger.error({ command: command.name, err }, 'Admin update not saved');
      return `Could not save configuration: ${err.message}`;
    }
    throw err;
  }
}
