export type EventHandler<T> = (payload: T) => void;

type HandlerTable<Events> = { [K in keyof Events]?: EventHandler<Events[K]>[] };

/**
 * Synchronous in-process notification bus.
 *
 * Handlers run in registration order. An emit issued while a notification is
 * being dispatched is queued and runs after every handler of the current one
 * has returned, so no handler ever observes a half-dispatched notification.
 */
export class EventBus<Events extends object> {
  private handlers: HandlerTable<Events> = {};
  private queue: Array<() => void> = [];
  private dispatching = false;

  on<K extends keyof Events>(kind: K, handler: EventHandler<Events[K]>): () => void {
    const list = this.handlers[kind] ?? [];
    list.push(handler);
    this.handlers[kind] = list;
    return () => {
      const index = list.indexOf(handler);
      if (index !== -1) list.splice(index, 1);
    };
  }

  emit<K extends keyof Events>(kind: K, payload: Events[K]): void {
    this.queue.push(() => this.dispatch(kind, payload));
    if (this.dispatching) return;

    this.dispatching = true;
    try {
      let next = this.queue.shift();
      while (next) {
        next();
        next = this.queue.shift();
      }
    } finally {
      // A throwing handler abandons whatever was queued behind it
      this.dispatching = false;
      this.queue = [];
    }
  }

  private dispatch<K extends keyof Events>(kind: K, payload: Events[K]): void {
    const list = this.handlers[kind];
    if (!list) return;
    for (const handler of [...list]) {
      handler(payload);
    }
  }
}
