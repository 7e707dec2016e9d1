/**
 * Per-subscriber buffered stream of values.
 *
 * Values pushed while the consumer is busy are queued, so every consumer
 * sees every value in push order.
 */
export interface StateChannel<T> {
  push(value: T): void;
  close(): void;
  readonly iterator: AsyncIterableIterator<T>;
}

const DONE: IteratorReturnResult<undefined> = { value: undefined, done: true };

export function createStateChannel<T>(onClose?: () => void): StateChannel<T> {
  const buffer: Array<{ value: T }> = [];
  const waiting: Array<(result: IteratorResult<T>) => void> = [];
  let closed = false;

  const close = () => {
    if (closed) return;
    closed = true;
    buffer.length = 0;
    for (const resolve of waiting.splice(0)) {
      resolve(DONE);
    }
    onClose?.();
  };

  const iterator: AsyncIterableIterator<T> = {
    next() {
      const queued = buffer.shift();
      if (queued) {
        const result: IteratorYieldResult<T> = { value: queued.value, done: false };
        return Promise.resolve(result);
      }
      if (closed) {
        return Promise.resolve(DONE);
      }
      return new Promise<IteratorResult<T>>((resolve) => {
        waiting.push(resolve);
      });
    },
    return() {
      close();
      return Promise.resolve(DONE);
    },
    [Symbol.asyncIterator]() {
      return iterator;
    },
  };

  return {
    push(value) {
      if (closed) return;
      const resolve = waiting.shift();
      if (resolve) {
        resolve({ value, done: false });
      } else {
        buffer.push({ value });
      }
    },
    close,
    iterator,
  };
}
