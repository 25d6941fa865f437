/**
 * Typed event bus for string-memory telemetry.
 *
 * Allocation notifications are advisory: listeners observe them, nothing in
 * the string engine waits on or reacts to them.
 */

export interface StringMemoryEventMap {
  allocate: { size: number };
  free: { size: number; finalized: boolean };
}

type EventCallback<T> = (data: T) => void;

type ListenerTable<TEvents> = {
  [K in keyof TEvents]?: Set<EventCallback<TEvents[K]>>;
};

export class TypedEventBus<TEvents extends object> {
  private listeners: ListenerTable<TEvents> = {};

  on<K extends keyof TEvents>(event: K, callback: EventCallback<TEvents[K]>): () => void {
    let listenerSet = this.listeners[event];
    if (!listenerSet) {
      listenerSet = new Set();
      this.listeners[event] = listenerSet;
    }
    listenerSet.add(callback);

    return () => {
      listenerSet?.delete(callback);
      if (listenerSet && listenerSet.size === 0) {
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

    for (const callback of listenerSet) {
      callback(data);
    }
  }

  hasListeners(event: keyof TEvents): boolean {
    return this.listeners[event] !== undefined;
  }

  removeAllListeners(event?: keyof TEvents): void {
    if (event !== undefined) {
      delete this.listeners[event];
      return;
    }
    this.listeners = {};
  }
}

/** Process-wide channel the string allocator reports to. */
export const stringMemoryEvents = new TypedEventBus<StringMemoryEventMap>();
