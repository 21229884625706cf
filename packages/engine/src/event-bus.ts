/**
 * Typed event bus for cross-subsystem communication.
 *
 * `Events` maps each event name to its payload type, so `emit` and `on`
 * agree on payloads at compile time.
 */

export type EventCallback<T> = (data: T) => void;

type ListenerTable<Events> = {
  [E in keyof Events]?: Set<EventCallback<Events[E]>>;
};

export class EventBus<Events extends object> {
  private listeners: ListenerTable<Events> = {};

  on<E extends keyof Events>(event: E, callback: EventCallback<Events[E]>): () => void {
    let listenerSet: Set<EventCallback<Events[E]>> | undefined = this.listeners[event];
    if (!listenerSet) {
      listenerSet = new Set<EventCallback<Events[E]>>();
      this.listeners[event] = listenerSet;
    }
    listenerSet.add(callback);

    return () => {
      const current: Set<EventCallback<Events[E]>> | undefined = this.listeners[event];
      if (!current) {
        return;
      }
      current.delete(callback);
      if (current.size === 0) {
        delete this.listeners[event];
      }
    };
  }

  once<E extends keyof Events>(event: E, callback: EventCallback<Events[E]>): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      callback(data);
    });
    return unsubscribe;
  }

  emit<E extends keyof Events>(event: E, data: Events[E]): void {
    const listenerSet: Set<EventCallback<Events[E]>> | undefined = this.listeners[event];
    if (!listenerSet) {
      return;
    }

    // Snapshot so listeners may unsubscribe while being notified.
    for (const callback of [...listenerSet]) {
      callback(data);
    }
  }

  listenerCount<E extends keyof Events>(event: E): number {
    return this.listeners[event]?.size ?? 0;
  }

  removeAllListeners(event?: keyof Events): void {
    if (event !== undefined) {
      delete this.listeners[event];
      return;
    }
    this.listeners = {};
  }
}
