/**
 * Typed event emitter shared by the authenticator, marketplace and client.
 *
 * Payload types are fixed per event name by the emitter's event map, so a
 * listener registered for `trade:settled` receives exactly that payload.
 * Listener exceptions are isolated: one failing listener does not stop the
 * others, and the failure is reported through the optional `onListenerError`.
 *
 * @packageDocumentation
 */

/** A listener callback for a specific event type. */
export type Listener<T> = (data: T) => void;

interface ListenerEntry<T> {
  fn: Listener<T>;
  once: boolean;
}

type ListenerTable<M> = { [K in keyof M]?: ListenerEntry<M[K]>[] };

/**
 * A strongly-typed event emitter.
 *
 * @example
 * ```typescript
 * type Events = { 'trade:settled': { tradeId: string } };
 * const emitter = new TypedEventEmitter<Events>();
 * emitter.on('trade:settled', ({ tradeId }) => console.log(tradeId));
 * emitter.emit('trade:settled', { tradeId: 't-1' });
 * ```
 */
export class TypedEventEmitter<M extends object> {
  private table: ListenerTable<M> = {};

  constructor(private readonly onListenerError?: (event: keyof M, error: unknown) => void) {}

  /** Register a listener invoked on every emission of `event`. */
  on<K extends keyof M>(event: K, listener: Listener<M[K]>): this {
    this.entries(event).push({ fn: listener, once: false });
    return this;
  }

  /** Register a listener invoked at most once. */
  once<K extends keyof M>(event: K, listener: Listener<M[K]>): this {
    this.entries(event).push({ fn: listener, once: true });
    return this;
  }

  /** Remove the first registration of `listener` for `event`. */
  off<K extends keyof M>(event: K, listener: Listener<M[K]>): this {
    const entries = this.table[event];
    if (!entries) return this;

    const idx = entries.findIndex((e) => e.fn === listener);
    if (idx !== -1) {
      entries.splice(idx, 1);
    }
    if (entries.length === 0) {
      delete this.table[event];
    }
    return this;
  }

  /**
   * Synchronously invoke every listener for `event` in registration order.
   *
   * @returns `true` if at least one listener was invoked.
   */
  emit<K extends keyof M>(event: K, data: M[K]): boolean {
    const entries = this.table[event];
    if (!entries || entries.length === 0) return false;

    // Snapshot so a once-listener removing itself does not skip others.
    const snapshot = [...entries];
    for (const entry of snapshot) {
      if (entry.once) {
        const idx = entries.indexOf(entry);
        if (idx !== -1) {
          entries.splice(idx, 1);
        }
      }
      try {
        entry.fn(data);
      } catch (error) {
        this.onListenerError?.(event, error);
      }
    }

    if (entries.length === 0) {
      delete this.table[event];
    }
    return true;
  }

  listenerCount(event: keyof M): number {
    return this.table[event]?.length ?? 0;
  }

  /** Remove all listeners for `event`, or for every event when omitted. */
  removeAllListeners(event?: keyof M): this {
    if (event === undefined) {
      this.table = {};
    } else {
      delete this.table[event];
    }
    return this;
  }

  private entries<K extends keyof M>(event: K): ListenerEntry<M[K]>[] {
    let entries = this.table[event];
    if (!entries) {
      entries = [];
      this.table[event] = entries;
    }
    return entries;
  }
}
