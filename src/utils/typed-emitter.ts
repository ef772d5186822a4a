import { EventEmitter } from "node:events";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Listener = (...args: any[]) => void;

export type ListenerErrorHandler = (err: unknown, event: string) => void;

/**
 * EventEmitter with a typed event map. A listener that throws does not stop
 * the others or reach the emitter; its error goes to `onListenerError`.
 */
export class TypedEventEmitter<T extends { [K in keyof T]: Listener }> {
  private readonly emitter = new EventEmitter();

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  on<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.off(event, listener);
    return this;
  }

  once<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.once(event, listener);
    return this;
  }

  /** Runs listeners synchronously, in registration order. Returns false when there were none. */
  emit<K extends string & keyof T>(event: K, ...args: Parameters<T[K]>): boolean {
    const listeners = this.emitter.rawListeners(event);
    for (const listener of listeners) {
      try {
        Reflect.apply(listener, undefined, args);
      } catch (err) {
        if (!this.onListenerError) throw err;
        this.onListenerError(err, event);
      }
    }
    return listeners.length > 0;
  }

  removeAllListeners<K extends string & keyof T>(event?: K): this {
    if (event === undefined) this.emitter.removeAllListeners();
    else this.emitter.removeAllListeners(event);
    return this;
  }

  listenerCount<K extends string & keyof T>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
