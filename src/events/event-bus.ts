import type { Event, EventPayloadMap, EventType } from "./types.js";

type EventHandler<T extends EventType> = (payload: EventPayloadMap[T]) => void | Promise<void>;
type AnyHandler = (payload: unknown) => void;
type ErrorHandler = (error: unknown) => void;

const isPromiseLike = (value: unknown): value is Promise<void> =>
  typeof value === "object" && value !== null && "then" in value;

/**
 * Synchronous typed pub/sub. Async handlers are tracked so `flush()` can wait
 * for them and surface their failures.
 */
export class EventBus {
  private handlers = new Map<EventType, AnyHandler[]>();
  private pending = new Set<Promise<void>>();
  private asyncErrors: unknown[] = [];

  private trackPending(result: Promise<void>, onError?: ErrorHandler): void {
    const wrapped = result
      .catch((error: unknown) => {
        if (onError) {
          onError(error);
          return;
        }
        this.asyncErrors.push(error);
      })
      .finally(() => {
        this.pending.delete(wrapped);
      });
    this.pending.add(wrapped);
  }

  private register<T extends EventType>(
    type: T,
    handler: EventHandler<T>,
    safe: boolean,
    onError?: ErrorHandler
  ): () => void {
    const wrapped: AnyHandler = (payload) => {
      let result: void | Promise<void>;
      try {
        // payloads are routed by type in emit()
        result = handler(payload as EventPayloadMap[T]);
      } catch (error) {
        if (!safe) {
          throw error;
        }
        onError?.(error);
        return;
      }
      if (isPromiseLike(result)) {
        this.trackPending(result, safe ? onError : undefined);
      }
    };

    const existing = this.handlers.get(type);
    if (existing) {
      existing.push(wrapped);
    } else {
      this.handlers.set(type, [wrapped]);
    }

    return (): void => {
      const handlers = this.handlers.get(type);
      if (!handlers) {
        return;
      }
      const index = handlers.indexOf(wrapped);
      if (index >= 0) {
        handlers.splice(index, 1);
      }
      if (handlers.length === 0) {
        this.handlers.delete(type);
      }
    };
  }

  subscribe<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    return this.register(type, handler, false);
  }

  /** Like `subscribe`, but handler failures go to `onError` instead of the emitter. */
  subscribeSafe<T extends EventType>(
    type: T,
    handler: EventHandler<T>,
    onError?: ErrorHandler
  ): () => void {
    return this.register(type, handler, true, onError);
  }

  emit(event: Event): void {
    const handlers = this.handlers.get(event.type);
    if (!handlers || handlers.length === 0) {
      return;
    }
    handlers.slice().forEach((handler) => handler(event.payload));
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
    if (this.asyncErrors.length > 0) {
      const errors = this.asyncErrors.splice(0);
      throw new AggregateError(errors, "EventBus async handlers failed");
    }
  }
}
