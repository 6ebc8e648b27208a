import { logger } from '../utils/logger';

export type EventHandler<P> = (payload: P) => void;

type ListenerTable<Events> = {
  [K in keyof Events]?: Array<EventHandler<Events[K]>>;
};

/**
 * Synchronous typed publish/subscribe channel.
 *
 * Handlers run in registration order on the publisher's stack. A throwing
 * handler is logged and skipped; it never reaches the publisher or the
 * handlers after it.
 */
export class EventBus<Events extends object> {
  private listeners: ListenerTable<Events> = {};

  subscribe<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    const handlers = this.listeners[event] ?? [];
    handlers.push(handler);
    this.listeners[event] = handlers;
    return () => this.unsubscribe(event, handler);
  }

  /** Removes the first matching registration. */
  unsubscribe<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    const handlers = this.listeners[event];
    if (!handlers) return;

    const index = handlers.indexOf(handler);
    if (index > -1) {
      handlers.splice(index, 1);
    }
  }

  publish<K extends keyof Events>(event: K, payload: Events[K]): void {
    const handlers = this.listeners[event];
    if (!handlers || handlers.length === 0) return;

    // Snapshot so handlers may unsubscribe while we iterate
    for (const handler of [...handlers]) {
      try {
        handler(payload);
      } catch (error) {
        logger.error(
          'events',
          `Listener failed [${String(event)}]`,
          error instanceof Error ? error : { error: String(error) }
        );
      }
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }

  clear(): void {
    this.listeners = {};
  }
}
