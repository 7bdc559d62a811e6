/**
 * Type-safe event bus for runtime lifecycle notifications.
 *
 * The event map fixes the payload type of every event name, so listeners and
 * emitters are checked against the same contract.
 */

type EventCallback<T> = (data: T) => void;

export class EventBus<TEvents extends object> {
  private readonly listeners: { [K in keyof TEvents]?: Set<EventCallback<TEvents[K]>> } = {};

  on<K extends keyof TEvents>(event: K, callback: EventCallback<TEvents[K]>): () => void {
    let listenerSet = this.listeners[event];
    if (!listenerSet) {
      listenerSet = new Set();
      this.listeners[event] = listenerSet;
    }
    listenerSet.add(callback);

    return () => {
      listenerSet?.delete(callback);
      if (listenerSet && listenerSet.size === 0 && this.listeners[event] === listenerSet) {
        delete this.listeners[event];
      }
    };
  }

  once<K extends keyof TEvents>(event: K, callback: EventCallback<TEvents[K]>): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      callback(data);
    });
    return unsubscribe;
  }

  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const listenerSet = this.listeners[event];
    if (!listenerSet) {
      return;
    }

    for (const callback of [...listenerSet]) {
      callback(data);
    }
  }

  listenerCount<K extends keyof TEvents>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }

  removeAllListeners(event?: keyof TEvents): void {
    if (event !== undefined) {
      delete this.listeners[event];
      return;
    }
    for (const key of Object.keys(this.listeners)) {
      Reflect.deleteProperty(this.listeners, key);
    }
  }
}
