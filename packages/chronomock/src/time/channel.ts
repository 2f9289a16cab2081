/**
 * Bounded channel
 *
 * A fixed-capacity FIFO queue. Sends never wait: a send into a full
 * channel is dropped and reported as `err("FULL")`. Receives either poll
 * (`tryRecv`) or wait for the next value (`receive`).
 *
 * Every operation runs to completion on the JavaScript thread, so producers
 * in callbacks, timers and promise continuations cannot corrupt the queue.
 *
 * @example
 * ```typescript
 * const channel = createChannel<number>({ capacity: 2 });
 * channel.trySend(1); // ok
 * channel.trySend(2); // ok
 * channel.trySend(3); // err("FULL")
 * channel.tryRecv();  // ok(1)
 * ```
 */

import { err, ok, type Result } from "../result";

export type TrySendError = "FULL";
export type TryRecvError = "EMPTY";

export interface ChannelOptions {
  /** Maximum number of buffered values */
  capacity: number;
  /** Told about every dropped send */
  logger?: (message: string) => void;
}

export interface Sender<T> {
  trySend(value: T): Result<void, TrySendError>;
}

export interface Receiver<T> {
  tryRecv(): Result<T, TryRecvError>;
  /** Waits until a value is available. */
  receive(): Promise<T>;
  /** Drop every buffered value and return how many there were. */
  clear(): number;
  readonly size: number;
}

export interface BoundedChannel<T> extends Sender<T>, Receiver<T> {
  readonly capacity: number;
  isEmpty(): boolean;
  isFull(): boolean;
  sender(): Sender<T>;
  receiver(): Receiver<T>;
}

export function createChannel<T>(options: ChannelOptions): BoundedChannel<T> {
  const { capacity, logger = () => {} } = options;
  if (!Number.isSafeInteger(capacity) || capacity < 1) {
    throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
  }

  const buffer: T[] = [];
  const waiters: Array<(value: T) => void> = [];

  const trySend = (value: T): Result<void, TrySendError> => {
    const waiter = waiters.shift();
    if (waiter) {
      waiter(value);
      return ok(undefined);
    }
    if (buffer.length >= capacity) {
      logger(`Channel full (capacity ${capacity}), value dropped`);
      return err("FULL");
    }
    buffer.push(value);
    return ok(undefined);
  };

  const tryRecv = (): Result<T, TryRecvError> => {
    if (buffer.length === 0) return err("EMPTY");
    const [value] = buffer.splice(0, 1);
    return ok(value);
  };

  const receive = (): Promise<T> => {
    const next = tryRecv();
    if (next.ok) return Promise.resolve(next.value);
    return new Promise<T>((resolve) => {
      waiters.push(resolve);
    });
  };

  const clear = (): number => buffer.splice(0, buffer.length).length;

  const receiver: Receiver<T> = {
    tryRecv,
    receive,
    clear,
    get size() {
      return buffer.length;
    },
  };

  return {
    trySend,
    tryRecv,
    receive,
    clear,
    capacity,
    get size() {
      return buffer.length;
    },
    isEmpty: () => buffer.length === 0,
    isFull: () => buffer.length >= capacity,
    sender: () => ({ trySend }),
    receiver: () => receiver,
  };
}
