/**
 * Single-event emitter with disposer-based subscription.
 *
 * - `on()` returns a disposer; calling it twice is a no-op.
 * - Handlers live in an immutable array, so subscribing or disposing during
 *   `emit()` only affects later emits.
 * - A throwing handler is reported to `onHandlerError` and the remaining
 *   handlers still run.
 */

export type Handler<T> = (value: T) => void;

export interface Emitter<T> {
  on(handler: Handler<T>): () => void;
  emit(value: T): void;
  clear(): void;
  readonly count: number;
}

export function createEmitter<T>(onHandlerError: (error: unknown) => void): Emitter<T> {
  let handlers: readonly Handler<T>[] = [];

  return {
    on(handler) {
      handlers = [...handlers, handler];

      let disposed = false;
      return () => {
        if (disposed) return;
        disposed = true;
        handlers = handlers.filter((h) => h !== handler);
      };
    },

    emit(value) {
      for (const handler of handlers) {
        try {
          handler(value);
        } catch (error) {
          onHandlerError(error);
        }
      }
    },

    clear() {
      handlers = [];
    },

    get count() {
      return handlers.length;
    },
  };
}
