import { logger } from './logger.js';

interface QueuedJob {
  id: string;
  run: () => Promise<void>;
  drop: () => void;
}

interface LaneState {
  active: QueuedJob | null;
  idle: Promise<void>;
  markIdle: () => void;
  pendingJobs: QueuedJob[];
}

/**
 * Serializes forwarding work per source channel.
 *
 * Cron cycles and live events for one source share its watermark, so they
 * run strictly one after another in arrival order. A job id that is already
 * waiting is not queued twice. Jobs receive the queue's shutdown signal.
 */
export class ForwardQueue {
  private lanes = new Map<string, LaneState>();
  private shuttingDown = false;
  private controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  private getLane(source: string): LaneState {
    let lane = this.lanes.get(source);
    if (!lane) {
      lane = {
        active: null,
        idle: Promise.resolve(),
        markIdle: () => {},
        pendingJobs: [],
      };
      this.lanes.set(source, lane);
    }
    return lane;
  }

  /**
   * Runs `fn` once every earlier job for `source` has finished. Resolves to
   * null when the job was not run (same id already waiting, or shutdown).
   */
  enqueue<T>(
    source: string,
    jobId: string,
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T | null> {
    if (this.shuttingDown) {
      logger.debug({ source, jobId }, 'Queue shutting down, job rejected');
      return Promise.resolve(null);
    }

    const lane = this.getLane(source);
    if (lane.pendingJobs.some((j) => j.id === jobId)) {
      logger.debug({ source, jobId }, 'Job already queued, skipping');
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve, reject) => {
      const job: QueuedJob = {
        id: jobId,
        run: async () => {
          try {
            resolve(await fn(this.controller.signal));
          } catch (err) {
            reject(err);
          }
        },
        drop: () => resolve(null),
      };

      if (lane.active) {
        lane.pendingJobs.push(job);
        logger.debug(
          { source, jobId, pending: lane.pendingJobs.length },
          'Lane busy, job queued',
        );
        return;
      }
      this.startJob(source, lane, job);
    });
  }

  private startJob(source: string, lane: LaneState, job: QueuedJob): void {
    lane.active = job;
    lane.idle = new Promise<void>((resolve) => {
      lane.markIdle = resolve;
    });
    this.runJob(source, lane, job).catch((err) => {
      logger.error({ source, jobId: job.id, err }, 'Error running forwarding job');
    });
  }

  private async runJob(source: string, lane: LaneState, job: QueuedJob): Promise<void> {
    logger.debug({ source, jobId: job.id }, 'Running forwarding job');
    try {
      await job.run();
    } finally {
      lane.active = null;
      this.drainLane(source, lane);
    }
  }

  private drainLane(source: string, lane: LaneState): void {
    if (this.shuttingDown) {
      if (lane.pendingJobs.length > 0) {
        logger.info(
          { source, dropped: lane.pendingJobs.length },
          'Dropping queued jobs on shutdown',
        );
      }
      for (const job of lane.pendingJobs.splice(0)) job.drop();
      lane.markIdle();
      return;
    }

    const next = lane.pendingJobs.shift();
    if (next) {
      this.startJob(source, lane, next);
      return;
    }
    lane.markIdle();
  }

  /**
   * Stops intake, cancels pacing sleeps of running jobs and waits up to
   * `gracePeriodMs` for them to finish.
   */
  async shutdown(gracePeriodMs: number): Promise<void> {
    this.shuttingDown = true;
    this.controller.abort();

    const lanes = [...this.lanes.values()];
    const busy = lanes.filter((lane) => lane.active);
    logger.info({ activeCount: busy.length }, 'ForwardQueue shutting down');

    for (const lane of lanes) {
      if (!lane.active) {
        for (const job of lane.pendingJobs.splice(0)) job.drop();
      }
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, gracePeriodMs);
    });
    await Promise.race([Promise.all(busy.map((lane) => lane.idle)), grace]);
    clearTimeout(timer);
  }
}
