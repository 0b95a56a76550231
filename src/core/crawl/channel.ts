/**
 * Bounded multi-producer, single-consumer channel between crawl workers and
 * the aggregator
 */

import { ChannelClosedError, ChannelTimeoutError } from "../errors";

interface PendingSend<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class ResultChannel<T extends NonNullable<unknown>> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private receiver: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be an integer >= 1 (got ${capacity})`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueues `item`, waiting while the buffer is full.
   * @param timeoutMs - Optional bound on the wait; 0 or omitted waits until space frees up
   * @throws ChannelClosedError when the channel is or becomes closed
   * @throws ChannelTimeoutError when no space frees up within `timeoutMs`
   */
  send(item: T, timeoutMs = 0): Promise<void> {
    if (this.closed) return Promise.reject(new ChannelClosedError());

    if (this.receiver) {
      const deliver = this.receiver;
      this.receiver = null;
      deliver({ value: item, done: false });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const pending: PendingSend<T> = {
        item,
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          const idx = this.senders.indexOf(pending);
          if (idx >= 0) this.senders.splice(idx, 1);
          reject(new ChannelTimeoutError(timeoutMs));
        }, timeoutMs);
      }
      this.senders.push(pending);
    });
  }

  /**
   * Takes the next item. Resolves `{ done: true }` once the channel is closed
   * and drained.
   */
  receive(): Promise<IteratorResult<T>> {
    const next = this.buffer.shift();
    if (next !== undefined) {
      this.admitWaitingSender();
      return Promise.resolve({ value: next, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.receiver) {
      return Promise.reject(new Error("ResultChannel supports a single receiver"));
    }
    return new Promise((resolve) => {
      this.receiver = resolve;
    });
  }

  /**
   * Stops accepting items. Buffered items remain receivable; blocked senders
   * are rejected.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const pending of this.senders.splice(0)) {
      pending.reject(new ChannelClosedError());
    }
    if (this.receiver && this.buffer.length === 0) {
      const deliver = this.receiver;
      this.receiver = null;
      deliver({ value: undefined, done: true });
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }

  private admitWaitingSender(): void {
    const pending = this.senders.shift();
    if (!pending) return;
    this.buffer.push(pending.item);
    pending.resolve();
  }
}
