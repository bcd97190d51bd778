import { isEligible, selectCandidates, selectLive } from './candidate-selector.js';
import { SEND_GAP_MS } from './config.js';
import type { ConfigState } from './config-state.js';
import { logCycleRun, logDeliveries } from './db.js';
import { deliver, failedEntries, type Sleep } from './delivery-scheduler.js';
import { PersistenceError, TransportError, errorMessage } from './errors.js';
import type { ForwardQueue } from './forward-queue.js';
import { logger } from './logger.js';
import type {
  CycleResult,
  CycleTrigger,
  DeliveryReport,
  ForwardConfig,
  Message,
  Transport,
} from './types.js';
import { selectionKind, type WatermarkStore } from './watermark-store.js';
import { describeWindow, isAllowedNow } from './window-gate.js';

export interface ForwarderDependencies {
  transport: Transport;
  configState: ConfigState;
  watermarks: WatermarkStore;
  queue: ForwardQueue;
  now?: () => Date;
  sleep?: Sleep;
  /** Pause between destinations of one message; defaults to SEND_GAP_MS. */
  gapMs?: number;
  /** Write delivery history to the database. */
  recordHistory?: boolean;
}

/**
 * The forwarding cycle: gate check, candidate selection, paced delivery and
 * watermark persistence. Every cycle and live event goes through the queue,
 * so at most one of them touches a source's watermark at a time.
 */
export class Forwarder {
  private deps: ForwarderDependencies;
  private now: () => Date;

  constructor(deps: ForwarderDependencies) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  /** Queues a full cycle. A cycle already waiting absorbs this one. */
  async runCycle(trigger: CycleTrigger = 'cron'): Promise<CycleResult> {
    const source = this.deps.configState.currentConfig().sourceChannel;
    const result = await this.deps.queue.enqueue(source, 'cycle', (signal) =>
      this.track(source, trigger, (config) => this.executeCycle(config, signal)),
    );
    return result ?? { status: 'skipped' };
  }

  /**
   * Forwards one pushed message, after any posts between the watermark and
   * it that were left behind.
   */
  async handleIncoming(message: Message): Promise<CycleResult> {
    const source = this.deps.configState.currentConfig().sourceChannel;
    const result = await this.deps.queue.enqueue(source, `message:${message.id}`, (signal) =>
      this.track(source, 'listen', (config) => this.executeIncoming(config, message, signal)),
    );
    return result ?? { status: 'skipped' };
  }

  private async track(
    source: string,
    trigger: CycleTrigger,
    body: (config: ForwardConfig) => Promise<CycleResult>,
  ): Promise<CycleResult> {
    // One snapshot per cycle; later config swaps apply to the next cycle
    const config = this.deps.configState.currentConfig();
    if (config.sourceChannel !== source) {
      // The lane only serializes work for the source it was queued under
      logger.info(
        { queuedFor: source, source: config.sourceChannel, trigger },
        'Source changed while job was queued, skipping',
      );
      return { status: 'skipped' };
    }
    const startedAt = Date.now();

    let result: CycleResult;
    try {
      result = await body(config);
    } catch (err) {
      logger.error({ trigger, err }, 'Forwarding cycle failed');
      result = { status: 'failed', error: errorMessage(err) };
    }

    if (this.deps.recordHistory !== false) {
      this.recordHistory(config, trigger, startedAt, result);
    }
    return result;
  }

  private async executeCycle(config: ForwardConfig, signal: AbortSignal): Promise<CycleResult> {
    const now = this.now();

    if (!isAllowedNow(config, now)) {
      logger.debug({ window: describeWindow(config) }, 'Outside allowed window, skipping cycle');
      return { status: 'gate_closed' };
    }

    const destinations = await this.resolveDestinations(config);
    if (destinations.length === 0) {
      logger.error({ forwardTo: config.forwardTo }, 'No destinations to forward to');
      return { status: 'no_destinations' };
    }

    const cursor = this.deps.watermarks.startOfWindow(config, now);
    if (!cursor) {
      return this.establishBaseline(config);
    }

    const candidates = selectCandidates(this.deps.transport, config, cursor, now);
    return this.forward(config, candidates, destinations, signal);
  }

  private async executeIncoming(
    config: ForwardConfig,
    message: Message,
    signal: AbortSignal,
  ): Promise<CycleResult> {
    if (config.mode !== 'listen') {
      logger.debug({ messageId: message.id, mode: config.mode }, 'Not listening, event ignored');
      return { status: 'idle' };
    }

    const now = this.now();
    if (!isAllowedNow(config, now)) {
      // Left above the watermark; a later catch-up cycle forwards it
      logger.debug(
        { messageId: message.id, window: describeWindow(config) },
        'Outside allowed window, deferring live message',
      );
      return { status: 'gate_closed' };
    }

    const watermark = this.deps.watermarks.loadWatermark(config.sourceChannel, config.mode);
    const hasGap = watermark !== null && message.id > watermark + 1;
    if ((watermark !== null && message.id <= watermark) || (!hasGap && !isEligible(message))) {
      logger.debug({ messageId: message.id, watermark }, 'Live message not eligible');
      return { status: 'idle' };
    }

    const destinations = await this.resolveDestinations(config);
    if (destinations.length === 0) {
      logger.error({ messageId: message.id }, 'No destinations in listen mode, message dropped');
      return { status: 'no_destinations' };
    }

    const candidates = selectLive(this.deps.transport, config, message, watermark, now);
    return this.forward(config, candidates, destinations, signal);
  }

  private async resolveDestinations(config: ForwardConfig): Promise<readonly string[]> {
    if (config.forwardTo === 'list') return config.destinations;
    if (!this.deps.transport.listPublicGroups) {
      throw new TransportError('Transport cannot list groups for forwardTo=all');
    }
    return this.deps.transport.listPublicGroups();
  }

  /**
   * No usable watermark: start from the newest source message and forward
   * nothing, instead of replaying the whole channel history.
   */
  private async establishBaseline(config: ForwardConfig): Promise<CycleResult> {
    const latest = await this.deps.transport.latestMessageId(config.sourceChannel);
    const baseline = latest ?? 0;
    this.deps.watermarks.saveWatermark(config.sourceChannel, config.mode, baseline);
    logger.info(
      { source: config.sourceChannel, mode: config.mode, watermark: baseline },
      'No watermark found, starting from latest message',
    );
    return { status: 'baseline' };
  }

  private async forward(
    config: ForwardConfig,
    candidates: AsyncIterable<Message> | Iterable<Message>,
    destinations: readonly string[],
    signal: AbortSignal,
  ): Promise<CycleResult> {
    const advancesWatermark = selectionKind(config.mode) === 'watermark';

    const report = await deliver(candidates, destinations, config.order, {
      sender: this.deps.transport,
      pacingMs: config.pacingSeconds * 1000,
      gapMs: this.deps.gapMs ?? SEND_GAP_MS,
      signal,
      sleep: this.deps.sleep,
      onMessageSettled: advancesWatermark
        ? (message) =>
            this.deps.watermarks.saveWatermark(config.sourceChannel, config.mode, message.id)
        : undefined,
    });

    return this.summarize(config, report);
  }

  private summarize(config: ForwardConfig, report: DeliveryReport): CycleResult {
    const failures = failedEntries(report);

    if (report.attempted === 0 && !report.halted) {
      logger.debug({ mode: config.mode }, 'No messages to forward');
      return { status: 'idle', report };
    }

    if (failures.length > 0) {
      logger.warn(
        {
          failures: failures.map((f) => ({
            messageId: f.messageId,
            destination: f.destination,
            error: f.error,
          })),
        },
        'Some destinations failed',
      );
    }

    const halted = report.halted;
    if (halted?.reason === 'cancelled') {
      logger.info({ settled: report.settledIds.length }, 'Delivery cancelled by shutdown');
      return { status: 'failed', report, error: 'cancelled' };
    }
    if (halted?.reason === 'source_error') {
      logger.error({ err: halted.error }, 'Source unreachable, cycle ended early');
      return { status: 'failed', report, error: errorMessage(halted.error) };
    }
    if (halted?.reason === 'persist_error') {
      const error =
        halted.error instanceof PersistenceError ? halted.error.message : errorMessage(halted.error);
      logger.error({ err: halted.error }, 'Watermark not persisted, messages will be re-sent next cycle');
      return { status: 'failed', report, error };
    }

    logger.info(
      {
        mode: config.mode,
        order: config.order,
        messages: report.settledIds.length,
        failures: failures.length,
      },
      'Forward operation complete',
    );
    return { status: 'delivered', report };
  }

  private recordHistory(
    config: ForwardConfig,
    trigger: CycleTrigger,
    startedAt: number,
    result: CycleResult,
  ): void {
    try {
      if (result.report) logDeliveries(config.sourceChannel, result.report.entries);
      logCycleRun({
        source_channel: config.sourceChannel,
        trigger,
        mode: config.mode,
        run_at: new Date(startedAt).toISOString(),
        duration_ms: Date.now() - startedAt,
        status: result.status,
        messages: result.report?.settledIds.length ?? 0,
        failures: result.report ? failedEntries(result.report).length : 0,
        error: result.error ?? null,
      });
    } catch (err) {
      logger.warn({ err }, 'Failed to record delivery history');
    }
  }
}
