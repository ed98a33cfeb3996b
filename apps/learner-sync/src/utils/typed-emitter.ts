/**
 * Typed Event Emitter
 * @module utils/typed-emitter
 */

type EventHandler<T> = (data: T) => void;

type HandlerSets<E> = { [K in keyof E]?: Set<EventHandler<E[K]>> };

/**
 * Minimal typed emitter. Handler exceptions are logged under `label`, never rethrown.
 */
export class TypedEventEmitter<E> {
  private handlers: HandlerSets<E> = {};

  constructor(private readonly label: string) {}

  /**
   * Subscribe to an event
   * @returns Function that unsubscribes
   */
  on<K extends keyof E>(event: K, handler: EventHandler<E[K]>): () => void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set<EventHandler<E[K]>>();
      this.handlers[event] = set;
    }
    set.add(handler);
    return () => this.off(event, handler);
  }

  /**
   * Subscribe for the next occurrence only
   */
  once<K extends keyof E>(event: K, handler: EventHandler<E[K]>): () => void {
    const off = this.on(event, (data) => {
      off();
      handler(data);
    });
    return off;
  }

  off<K extends keyof E>(event: K, handler: EventHandler<E[K]>): void {
    this.handlers[event]?.delete(handler);
  }

  emit<K extends keyof E>(event: K, data: E[K]): void {
    const set = this.handlers[event];
    if (!set) return;

    for (const handler of [...set]) {
      try {
        handler(data);
      } catch (error) {
        console.error(`[${this.label}] Error in ${String(event)} handler:`, error);
      }
    }
  }

  removeAllListeners(): void {
    this.handlers = {};
  }
}
