import { ChannelClosedError } from '../domain/errors.js';

interface PendingSend<T> {
  readonly value: T;
  readonly delivered: () => void;
  readonly failed: (err: Error) => void;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbuffered rendezvous channel.
 *
 * `send()` resolves only once a receiver has taken the value, so a sender
 * can never get ahead of its consumer by more than one value. Senders and
 * receivers are each served in FIFO order.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: Receiver<T>[] = [];
  private closed = false;

  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, delivered: resolve, failed: reject });
    });
  }

  /** Next value, or `done` once the channel is closed and drained. */
  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.delivered();
      return Promise.resolve({ value: sender.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Ends iteration for every waiting receiver and fails every waiting
   * sender. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
    for (const sender of this.senders.splice(0)) {
      sender.failed(new ChannelClosedError());
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Senders currently blocked waiting for a receiver. */
  get waitingSenders(): number {
    return this.senders.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }
}
