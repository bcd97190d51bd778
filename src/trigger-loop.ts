import { CronExpressionParser } from 'cron-parser';

import type { ConfigState } from './config-state.js';
import { logger } from './logger.js';
import type { CycleResult, CycleTrigger } from './types.js';

// setTimeout stores its delay in a signed 32-bit int
const MAX_TIMER_DELAY = 2_147_483_647;

export function computeNextRun(cronSchedule: string, timezone: string, from: Date): Date {
  const interval = CronExpressionParser.parse(cronSchedule, {
    tz: timezone,
    currentDate: from,
  });
  return interval.next().toDate();
}

export interface TriggerLoopDependencies {
  configState: ConfigState;
  runCycle: (trigger: CycleTrigger) => Promise<CycleResult>;
  now?: () => Date;
}

export interface TriggerLoop {
  stop: () => void;
  nextRunAt: () => Date | null;
}

/**
 * Fires a forwarding cycle at each cron tick of the current configuration.
 * Ticks do not wait for the previous cycle; the forward queue absorbs
 * overlapping ones. Changing the schedule or time zone re-arms the timer.
 */
export function startTriggerLoop(deps: TriggerLoopDependencies): TriggerLoop {
  const now = deps.now ?? (() => new Date());
  let timer: ReturnType<typeof setTimeout> | null = null;
  let nextRun: Date | null = null;
  let stopped = false;

  const clear = () => {
    if (timer) clearTimeout(timer);
    timer = null;
  };

  const fire = () => {
    timer = null;
    deps.runCycle('cron').then(
      (result) => logger.debug({ status: result.status }, 'Scheduled cycle finished'),
      (err) => logger.error({ err }, 'Scheduled cycle failed'),
    );
    arm();
  };

  const wait = () => {
    if (stopped || !nextRun) return;
    const delay = nextRun.getTime() - now().getTime();
    if (delay > MAX_TIMER_DELAY) {
      timer = setTimeout(wait, MAX_TIMER_DELAY);
      return;
    }
    timer = setTimeout(fire, Math.max(0, delay));
  };

  const arm = () => {
    clear();
    if (stopped) return;
    const { cronSchedule, timezone } = deps.configState.currentConfig();
    try {
      nextRun = computeNextRun(cronSchedule, timezone, now());
    } catch (err) {
      nextRun = null;
      logger.error({ cronSchedule, timezone, err }, 'Cannot compute next run, scheduler idle');
      return;
    }
    logger.debug({ nextRun: nextRun.toISOString() }, 'Next forwarding cycle scheduled');
    wait();
  };

  const unsubscribe = deps.configState.subscribe((next, previous) => {
    if (next.cronSchedule !== previous.cronSchedule || next.timezone !== previous.timezone) {
      logger.info(
        { cronSchedule: next.cronSchedule, timezone: next.timezone },
        'Schedule changed, rescheduling',
      );
      arm();
    }
  });

  logger.info('Trigger loop started');
  arm();

  return {
    stop: () => {
      stopped = true;
      clear();
      nextRun = null;
      unsubscribe();
    },
    nextRunAt: () => nextRun,
  };
}
