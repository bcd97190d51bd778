import { describe, expect, it, vi } from 'vitest';

import { deliver, failedEntries, sleep } from './delivery-scheduler.js';
import { BatchFakeTransport, FakeTransport, textMessage } from './test-utils.js';
import type { Message } from './types.js';

const DESTS = ['@groupA', '@groupB'];

function threeMessages(): Message[] {
  return [
    textMessage(1, '2024-01-01T10:00:00Z'),
    textMessage(2, '2024-01-01T10:01:00Z'),
    textMessage(3, '2024-01-01T10:02:00Z'),
  ];
}

function fakeSleep() {
  return vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
}

function sleepMs(mock: ReturnType<typeof fakeSleep>): number[] {
  return mock.mock.calls.map((call) => call[0]);
}

describe('deliver', () => {
  it('sends round-robin and paces between messages only', async () => {
    const transport = new FakeTransport();
    const pause = fakeSleep();

    const report = await deliver(threeMessages(), DESTS, 'one_by_one', {
      sender: transport,
      pacingMs: 60_000,
      sleep: pause,
    });

    expect(transport.sent.map((s) => `${s.body}->${s.destination}`)).toEqual([
      'post 1->@groupA',
      'post 1->@groupB',
      'post 2->@groupA',
      'post 2->@groupB',
      'post 3->@groupA',
      'post 3->@groupB',
    ]);
    // No sleep after the last message
    expect(sleepMs(pause)).toEqual([60_000, 60_000]);
    expect(report.settledIds).toEqual([1, 2, 3]);
    expect(report.attempted).toBe(3);
    expect(report.halted).toBeNull();
  });

  it('waits the send gap between destinations of one message', async () => {
    const transport = new FakeTransport();
    const pause = fakeSleep();

    await deliver([textMessage(1, '2024-01-01T10:00:00Z')], ['@a', '@b', '@c'], 'one_by_one', {
      sender: transport,
      pacingMs: 60_000,
      gapMs: 1000,
      sleep: pause,
    });

    expect(sleepMs(pause)).toEqual([1000, 1000]);
  });

  it('keeps going past a failed destination', async () => {
    const transport = new FakeTransport();
    transport.failing.add('@groupB');
    const settled: number[] = [];

    const report = await deliver(threeMessages().slice(0, 2), DESTS, 'one_by_one', {
      sender: transport,
      pacingMs: 0,
      onMessageSettled: (m) => settled.push(m.id),
    });

    expect(transport.sent.map((s) => s.destination)).toEqual(['@groupA', '@groupA']);
    expect(failedEntries(report)).toEqual([
      { messageId: 1, destination: '@groupB', outcome: 'failed', error: '@groupB: send refused' },
      { messageId: 2, destination: '@groupB', outcome: 'failed', error: '@groupB: send refused' },
    ]);
    expect(settled).toEqual([1, 2]);
    expect(report.halted).toBeNull();
  });

  it('uses one multi-target call per message in batch order', async () => {
    const transport = new BatchFakeTransport();
    transport.failing.add('@groupA');
    const pause = fakeSleep();

    const report = await deliver(threeMessages(), DESTS, 'batch', {
      sender: transport,
      pacingMs: 60_000,
      sleep: pause,
    });

    expect(transport.batchCalls).toEqual([DESTS, DESTS, DESTS]);
    expect(pause).not.toHaveBeenCalled();
    expect(report.settledIds).toEqual([1, 2, 3]);
    expect(failedEntries(report).map((e) => [e.messageId, e.destination, e.error])).toEqual([
      [1, '@groupA', 'send refused'],
      [2, '@groupA', 'send refused'],
      [3, '@groupA', 'send refused'],
    ]);
  });

  it('falls back to one by one when the sender has no batch call', async () => {
    const transport = new FakeTransport();
    const pause = fakeSleep();

    const report = await deliver(threeMessages().slice(0, 2), DESTS, 'batch', {
      sender: transport,
      pacingMs: 5000,
      sleep: pause,
    });

    expect(transport.sent).toHaveLength(4);
    expect(sleepMs(pause)).toEqual([5000]);
    expect(report.settledIds).toEqual([1, 2]);
  });

  it('stops before the next message once cancelled', async () => {
    const transport = new FakeTransport();
    const controller = new AbortController();
    const settled: number[] = [];

    const report = await deliver(threeMessages(), DESTS, 'one_by_one', {
      sender: transport,
      pacingMs: 60_000,
      signal: controller.signal,
      sleep: async () => controller.abort(),
      onMessageSettled: (m) => settled.push(m.id),
    });

    expect(report.halted).toEqual({ reason: 'cancelled' });
    expect(report.settledIds).toEqual([1]);
    expect(report.attempted).toBe(1);
    expect(settled).toEqual([1]);
    expect(transport.sent).toHaveLength(2);
  });

  it('does not settle a message cut off between destinations', async () => {
    const transport = new FakeTransport();
    const controller = new AbortController();

    const report = await deliver([textMessage(1, '2024-01-01T10:00:00Z')], DESTS, 'one_by_one', {
      sender: transport,
      pacingMs: 0,
      gapMs: 1000,
      signal: controller.signal,
      sleep: async () => controller.abort(),
    });

    expect(transport.sent.map((s) => s.destination)).toEqual(['@groupA']);
    expect(report.settledIds).toEqual([]);
    expect(report.attempted).toBe(1);
    expect(report.halted).toEqual({ reason: 'cancelled' });
  });

  it('halts with persist_error when the settle hook throws', async () => {
    const transport = new FakeTransport();
    const failure = new Error('disk full');

    const report = await deliver(threeMessages(), DESTS, 'one_by_one', {
      sender: transport,
      pacingMs: 0,
      onMessageSettled: (m) => {
        if (m.id === 2) throw failure;
      },
    });

    expect(report.halted).toEqual({ reason: 'persist_error', error: failure });
    expect(report.attempted).toBe(2);
    expect(transport.sent).toHaveLength(4);
  });

  it('halts with source_error when the message stream fails', async () => {
    const transport = new FakeTransport();
    const failure = new Error('connection lost');
    async function* messages(): AsyncGenerator<Message> {
      yield textMessage(1, '2024-01-01T10:00:00Z');
      throw failure;
    }

    const report = await deliver(messages(), DESTS, 'one_by_one', {
      sender: transport,
      pacingMs: 0,
    });

    expect(report.settledIds).toEqual([1]);
    expect(report.halted).toEqual({ reason: 'source_error', error: failure });
  });

  it('does nothing for an empty stream', async () => {
    const transport = new FakeTransport();
    const pause = fakeSleep();

    const report = await deliver([], DESTS, 'one_by_one', {
      sender: transport,
      pacingMs: 60_000,
      sleep: pause,
    });

    expect(report).toEqual({ entries: [], settledIds: [], attempted: 0, halted: null });
    expect(pause).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('resolves at once when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await sleep(60_000, controller.signal);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('resolves early on abort', async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      let done = false;
      const pending = sleep(60_000, controller.signal).then(() => {
        done = true;
      });
      await vi.advanceTimersByTimeAsync(1000);
      expect(done).toBe(false);
      controller.abort();
      await pending;
      expect(done).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });
});
