import { Logger } from './Logger';

const log = new Logger('EventEmitter');

export type EventCallback<T = unknown> = (data: T) => void;

export interface EventMap {
  [event: string]: unknown;
}

type ListenerTable<Events extends EventMap> = {
  [K in keyof Events]?: Set<EventCallback<Events[K]>>;
};

/**
 * Minimal typed event emitter.
 * A listener that throws is logged and does not stop delivery to the others.
 */
export class EventEmitter<Events extends EventMap = EventMap> {
  private listeners: ListenerTable<Events> = {};

  on<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    let set = this.listeners[event];
    if (!set) {
      set = new Set();
      this.listeners[event] = set;
    }
    set.add(callback);
    return () => this.off(event, callback);
  }

  off<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): void {
    this.listeners[event]?.delete(callback);
  }

  once<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    const wrapper: EventCallback<Events[K]> = (data) => {
      this.off(event, wrapper);
      callback(data);
    };
    return this.on(event, wrapper);
  }

  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    // Snapshot so listeners may unsubscribe while being notified
    for (const callback of [...set]) {
      try {
        callback(data);
      } catch (err) {
        log.error(`Listener for "${String(event)}" threw`, err);
      }
    }
  }

  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }

  removeAllListeners(event?: keyof Events): void {
    if (event === undefined) {
      this.listeners = {};
    } else {
      delete this.listeners[event];
    }
  }
}
