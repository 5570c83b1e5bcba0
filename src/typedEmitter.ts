import { EventEmitter } from "node:events";

export type TypedListener<T> = (payload: T) => void;

/**
 * Thin typed facade over EventEmitter. Event names and payloads come from
 * the `Events` map, so subscribers get the payload type without casts.
 */
export class TypedEventEmitter<
  Events extends { [K in keyof Events]: unknown },
> {
  private readonly emitter = new EventEmitter();

  on<K extends keyof Events & string>(
    event: K,
    listener: TypedListener<Events[K]>,
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof Events & string>(
    event: K,
    listener: TypedListener<Events[K]>,
  ): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof Events & string>(
    event: K,
    listener: TypedListener<Events[K]>,
  ): this {
    this.emitter.off(event, listener);
    return this;
  }

  emit<K extends keyof Events & string>(event: K, payload: Events[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
