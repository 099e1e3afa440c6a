import { EventEmitter } from "node:events";

type Listener = (...args: never[]) => void;
type Untyped = (...args: unknown[]) => void;

export interface TypedEmitterOptions {
  maxListeners?: number;
  /** Called when a listener throws. The remaining listeners still run. */
  onListenerError?: (event: string, err: unknown) => void;
}

/**
 * EventEmitter with a typed event map. A throwing listener never reaches the
 * code that emitted: the dispatcher emits from inside a delivery attempt.
 */
export class TypedEventEmitter<
  T extends { [K in keyof T]: Listener },
> {
  private readonly emitter = new EventEmitter();
  private readonly onListenerError: (event: string, err: unknown) => void;

  constructor(options: TypedEmitterOptions = {}) {
    this.emitter.setMaxListeners(options.maxListeners ?? 50);
    this.onListenerError = options.onListenerError ?? (() => {});
  }

  on<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.on(event, listener as Untyped);
    return this;
  }

  off<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.off(event, listener as Untyped);
    return this;
  }

  once<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.once(event, listener as Untyped);
    return this;
  }

  emit<K extends string & keyof T>(event: K, ...args: Parameters<T[K]>): boolean {
    // rawListeners keeps the once-wrappers, so one-shot listeners still detach.
    const listeners = this.emitter.rawListeners(event);
    for (const listener of listeners) {
      try {
        Reflect.apply(listener, this.emitter, args);
      } catch (err) {
        this.onListenerError(event, err);
      }
    }
    return listeners.length > 0;
  }

  removeAllListeners<K extends string & keyof T>(event?: K): this {
    this.emitter.removeAllListeners(event);
    return this;
  }

  listenerCount<K extends string & keyof T>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
