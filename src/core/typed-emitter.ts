import { EventEmitter } from "node:events";

/**
 * Type-safe event emitter over node:events. Payloads are single objects keyed by event name.
 *
 * ```ts
 * interface SessionEvents { closed: { reason: CloseReason } }
 * class Session extends TypedEventEmitter<SessionEvents> {}
 * ```
 */
export class TypedEventEmitter<TEvents extends Record<keyof TEvents, unknown>> {
  private readonly emitter = new EventEmitter();

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
