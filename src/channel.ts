export class ChannelClosedError extends Error {
  constructor(message = 'channel is closed') {
    super(message);
    this.name = 'ChannelClosedError';
  }
}

export type Receipt<T> = { ok: true; value: T } | { ok: false };

interface PendingSend<T> {
  value: T;
  settle(accepted: boolean): void;
}

type PendingReceive<T> = (receipt: Receipt<T>) => void;

/**
 * Unbuffered rendezvous channel. A send completes only once a receiver has
 * taken the value; nothing is ever queued on the channel itself.
 *
 * Closing wakes every waiting receiver with `{ ok: false }` and every
 * waiting sender with `false`. Sending on, or closing, a closed channel
 * throws ChannelClosedError.
 */
export class Channel<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves true once a receiver takes the value, or false if the signal
   * aborts (or the channel closes) while the send is still waiting.
   */
  send(value: T, signal?: AbortSignal): Promise<boolean> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError('send on closed channel'));
    }
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ ok: true, value });
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const onAbort = (): void => {
        const index = this.senders.indexOf(pending);
        if (index !== -1) {
          this.senders.splice(index, 1);
          pending.settle(false);
        }
      };
      const pending: PendingSend<T> = {
        value,
        settle: (accepted) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(accepted);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.senders.push(pending);
    });
  }

  /** Waits for a sender, or resolves `{ ok: false }` once closed. */
  receive(): Promise<Receipt<T>> {
    const immediate = this.tryReceive();
    if (immediate.ok || this.closed) {
      return Promise.resolve(immediate);
    }
    return new Promise<Receipt<T>>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /** Takes a value only if a sender is already waiting. */
  tryReceive(): Receipt<T> {
    const sender = this.senders.shift();
    if (!sender) {
      return { ok: false };
    }
    sender.settle(true);
    return { ok: true, value: sender.value };
  }

  close(): void {
    if (this.closed) {
      throw new ChannelClosedError('close of closed channel');
    }
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver({ ok: false });
    }
    for (const sender of this.senders.splice(0)) {
      sender.settle(false);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const receipt = await this.receive();
      if (!receipt.ok) return;
      yield receipt.value;
    }
  }
}
