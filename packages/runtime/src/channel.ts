// Bounded async channel
//
// A FIFO queue with a fixed buffer. Senders wait for space, receivers wait
// for values. Closing wakes every waiting receiver; buffered values are still
// delivered before iteration ends.

import type { ChunkSink } from '@asms/protocol';
import { UnitError } from '@asms/protocol';

type PendingSend<T> = {
  value: T;
  resolve: () => void;
  reject: (reason: unknown) => void;
};

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

export class ChannelClosedError extends UnitError {
  constructor() {
    super('internal_error', 'send on closed channel');
    this.name = 'ChannelClosedError';
  }
}

export class Channel<T> implements ChunkSink<T>, AsyncIterable<T> {
  private buffer: T[] = [];
  private senders: PendingSend<T>[] = [];
  private receivers: PendingReceive<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of buffered values */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Buffer a value, waiting for space if the buffer is full.
   * Rejects with the signal's reason if it aborts first.
   */
  send(value: T, signal?: AbortSignal): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new ChannelClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (this.trySend(value)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const pending: PendingSend<T> = {
        value,
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject: (reason) => {
          signal?.removeEventListener('abort', onAbort);
          reject(reason);
        },
      };
      const onAbort = (): void => {
        this.senders = this.senders.filter((s) => s !== pending);
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.senders.push(pending);
    });
  }

  /**
   * Buffer a value without waiting. Returns false when the buffer is full or
   * the channel is closed.
   */
  trySend(value: T): boolean {
    if (this.isClosed) return false;
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return true;
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }
    return false;
  }

  /**
   * Take the next value, waiting if none is buffered.
   * Resolves `done` once the channel is closed and drained.
   */
  receive(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    const [head] = this.buffer;
    if (this.buffer.length > 0) {
      this.buffer.shift();
      this.admitSender();
      return Promise.resolve({ done: false, value: head });
    }
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ done: false, value: sender.value });
    }
    if (this.isClosed) {
      return Promise.resolve(done());
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    return new Promise((resolve, reject) => {
      const receiver: PendingReceive<T> = (result) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };
      const onAbort = (): void => {
        this.receivers = this.receivers.filter((r) => r !== receiver);
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.receivers.push(receiver);
    });
  }

  /**
   * Close the channel. Waiting receivers finish; waiting senders are rejected.
   * Closing twice is a no-op.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver(done());
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  /**
   * Drain the buffer without waiting.
   */
  drain(): T[] {
    const values = this.buffer.splice(0);
    while (this.admitSender()) {
      values.push(...this.buffer.splice(0));
    }
    return values;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }

  private admitSender(): boolean {
    if (this.buffer.length >= this.capacity) return false;
    const sender = this.senders.shift();
    if (!sender) return false;
    this.buffer.push(sender.value);
    sender.resolve();
    return true;
  }
}

function done(): IteratorReturnResult<undefined> {
  return { done: true, value: undefined };
}
