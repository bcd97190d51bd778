import type { ConfigState } from './config-state.js';
import { logger } from './logger.js';
import type { Message, MessageSubscriber, Unsubscribe } from './types.js';

export interface ListenerDependencies {
  configState: ConfigState;
  subscriber: MessageSubscriber;
  onMessage: (message: Message) => void;
}

/**
 * Keeps a live subscription to the source channel while the mode is
 * `listen`, following source and mode changes. Returns a stop function.
 */
export function startListener(deps: ListenerDependencies): () => void {
  let unsubscribe: Unsubscribe | null = null;
  let subscribedTo: string | null = null;

  const sync = () => {
    const config = deps.configState.currentConfig();
    const wanted = config.mode === 'listen' ? config.sourceChannel : null;
    if (wanted === subscribedTo) return;

    if (unsubscribe) {
      unsubscribe();
      logger.info({ source: subscribedTo }, 'Stopped listening');
    }
    unsubscribe = null;
    subscribedTo = null;

    if (wanted) {
      unsubscribe = deps.subscriber.subscribe(wanted, deps.onMessage);
      subscribedTo = wanted;
      logger.info({ source: wanted }, 'Listening for new messages');
    }
  };

  const unsubscribeConfig = deps.configState.subscribe(sync);
  sync();

  return () => {
    unsubscribeConfig();
    unsubscribe?.();
    unsubscribe = null;
    subscribedTo = null;
  };
}
