import { getLogger } from '../utils/logging.js';

type Listener<T> = (event: T) => void | Promise<void>;

/**
 * Small typed pub/sub. Listeners run sequentially in registration order; a
 * listener that throws is logged and skipped so observers can never derail
 * the publisher.
 */
export class EventBus<EventMap extends { [event: string]: unknown }> {
  private listeners: { [K in keyof EventMap]?: Listener<EventMap[K]>[] } = {};

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    (this.listeners[event] ||= []).push(listener);
    return () => {
      this.listeners[event] = this.listeners[event]?.filter((l) => l !== listener);
    };
  }

  async emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): Promise<void> {
    const list = this.listeners[event];
    if (!list) return;
    for (const l of [...list]) {
      try {
        await l(payload);
      } catch (err) {
        getLogger().error({ err, event: String(event) }, 'event listener failed');
      }
    }
  }
}
