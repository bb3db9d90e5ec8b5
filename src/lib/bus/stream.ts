import type { UnitChangeEvent, UnitChangeSubscription } from '../interfaces';

interface Waiter {
  resolve: (result: IteratorResult<UnitChangeEvent>) => void;
  reject: (error: Error) => void;
}

/**
 * Push side of a unit-change subscription. Events are handed out in arrival
 * order; a failure surfaces after the events buffered before it.
 */
export class UnitChangeStream implements UnitChangeSubscription {
  private buffer: UnitChangeEvent[] = [];
  private waiter: Waiter | null = null;
  private failure: Error | null = null;
  private closed = false;
  private released: Promise<void> | null = null;

  constructor(private readonly release: () => Promise<void>) {}

  isClosed(): boolean {
    return this.closed;
  }

  push(event: UnitChangeEvent): void {
    if (this.closed || this.failure) return;
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.resolve({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
  }

  fail(error: Error): void {
    if (this.closed || this.failure) return;
    this.failure = error;
    this.takeWaiter()?.reject(error);
  }

  close(): Promise<void> {
    if (!this.released) {
      this.closed = true;
      this.buffer = [];
      this.takeWaiter()?.resolve({ value: undefined, done: true });
      this.released = this.release();
    }
    return this.released;
  }

  private takeWaiter(): Waiter | null {
    const waiter = this.waiter;
    this.waiter = null;
    return waiter;
  }

  private next(): Promise<IteratorResult<UnitChangeEvent>> {
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    const event = this.buffer.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<UnitChangeEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        await this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
