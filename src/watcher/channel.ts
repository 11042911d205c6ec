/**
 * Unbuffered channel
 *
 * A send completes only when a receiver has taken the value, so the
 * producer can never run ahead of the consumer: nothing is queued,
 * dropped or delivered twice.
 */

export type ChannelResult<T> = { ok: true; value: T } | { ok: false };

interface PendingSend<T> {
  value: T;
  resolve: (delivered: boolean) => void;
}

type PendingReceive<T> = (result: ChannelResult<T>) => void;

export class Channel<T> implements AsyncIterable<T> {
  private senders: PendingSend<T>[] = [];
  private receivers: PendingReceive<T>[] = [];
  private closed = false;

  /**
   * Hand a value to a receiver.
   * Resolves true once received, false if the channel is closed first.
   */
  send(value: T): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ ok: true, value });
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      this.senders.push({ value, resolve });
    });
  }

  /**
   * Wait for the next value, or `{ ok: false }` once closed
   */
  receive(): Promise<ChannelResult<T>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve(true);
      return Promise.resolve({ ok: true, value: sender.value });
    }

    if (this.closed) {
      return Promise.resolve({ ok: false });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const sender of this.senders) {
      sender.resolve(false);
    }
    for (const receiver of this.receivers) {
      receiver({ ok: false });
    }
    this.senders = [];
    this.receivers = [];
  }

  isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const result = await this.receive();
      if (!result.ok) return;
      yield result.value;
    }
  }
}
