import { describe, expect, it, vi } from 'vitest';

import { ConfigState } from './config-state.js';
import { startListener } from './listener.js';
import { FakeTransport, testConfig, textMessage } from './test-utils.js';

describe('startListener', () => {
  it('subscribes to the source in listen mode', () => {
    const transport = new FakeTransport();
    const onMessage = vi.fn();
    const configState = new ConfigState(testConfig({ mode: 'listen' }));

    startListener({ configState, subscriber: transport, onMessage });
    const message = textMessage(7, '2024-01-01T10:00:00Z');
    transport.emit('@source', message);

    expect(transport.subscribedChannels()).toEqual(['@source']);
    expect(onMessage).toHaveBeenCalledWith(message);
  });

  it('does not subscribe in other modes', () => {
    const transport = new FakeTransport();
    const configState = new ConfigState(testConfig({ mode: 'new' }));

    startListener({ configState, subscriber: transport, onMessage: vi.fn() });

    expect(transport.subscribedChannels()).toEqual([]);
  });

  it('follows mode and source changes', () => {
    const transport = new FakeTransport();
    const configState = new ConfigState(testConfig({ mode: 'new' }));
    startListener({ configState, subscriber: transport, onMessage: vi.fn() });

    configState.update({ mode: 'listen' });
    expect(transport.subscribedChannels()).toEqual(['@source']);

    configState.update({ sourceChannel: '@moved' });
    expect(transport.subscribedChannels()).toEqual(['@moved']);

    configState.update({ mode: 'today' });
    expect(transport.subscribedChannels()).toEqual([]);
  });

  it('unsubscribes on stop', () => {
    const transport = new FakeTransport();
    const configState = new ConfigState(testConfig({ mode: 'listen' }));
    const stop = startListener({ configState, subscriber: transport, onMessage: vi.fn() });

    stop();
    configState.update({ sourceChannel: '@moved' });

    expect(transport.subscribedChannels()).toEqual([]);
  });
});
