/**
 * Multi-producer, single-consumer channel.
 *
 * Every producer owns a `Sender` handle (`clone()` one per task). The receiving
 * side ends once its buffer is drained and every handle has been closed, so
 * the consumer learns about completion without any shared counter of its own.
 *
 * With a finite capacity a full buffer suspends `send` until the consumer takes
 * an item. Closing the `Receiver` releases every suspended sender with `false`
 * and turns later sends into no-ops.
 */

export type Box<T> = { value: T };

interface PendingSend<T> {
  owner: Sender<T>;
  item: T;
  resolve: (delivered: boolean) => void;
}

/** @internal */
export class ChannelCore<T> {
  private readonly buffer: Array<Box<T>> = [];
  private readonly pending: Array<PendingSend<T>> = [];
  private waiter: ((box: Box<T> | undefined) => void) | null = null;
  private senders = 0;
  private receiverClosed = false;

  constructor(readonly capacity: number) {}

  get openSenders(): number {
    return this.senders;
  }

  get isReceiverClosed(): boolean {
    return this.receiverClosed;
  }

  acquire(): void {
    this.senders++;
  }

  release(owner: Sender<T>): void {
    this.senders--;
    // a closed handle's suspended sends never land
    for (let i = this.pending.length - 1; i >= 0; i--) {
      const p = this.pending[i];
      if (p.owner === owner) {
        this.pending.splice(i, 1);
        p.resolve(false);
      }
    }
    if (this.senders === 0 && this.buffer.length === 0 && this.pending.length === 0) {
      this.wake(undefined);
    }
  }

  push(owner: Sender<T>, item: T): Promise<boolean> {
    if (this.receiverClosed) return Promise.resolve(false);
    if (this.waiter) {
      this.wake({ value: item });
      return Promise.resolve(true);
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value: item });
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      this.pending.push({ owner, item, resolve });
    });
  }

  take(): Promise<Box<T> | undefined> {
    if (this.receiverClosed) return Promise.resolve(undefined);
    const box = this.buffer.shift();
    if (box) {
      this.admitPending();
      return Promise.resolve(box);
    }
    if (this.senders === 0) return Promise.resolve(undefined);
    if (this.waiter) return Promise.reject(new Error('channel already has a pending receive'));
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  closeReceiver(): void {
    if (this.receiverClosed) return;
    this.receiverClosed = true;
    this.buffer.length = 0;
    for (const p of this.pending.splice(0)) p.resolve(false);
    this.wake(undefined);
  }

  private admitPending(): void {
    while (this.buffer.length < this.capacity) {
      const next = this.pending.shift();
      if (!next) return;
      this.buffer.push({ value: next.item });
      next.resolve(true);
    }
  }

  private wake(box: Box<T> | undefined): void {
    const w = this.waiter;
    this.waiter = null;
    w?.(box);
  }
}

export class Sender<T> {
  private closed = false;

  /** @internal use `channel()` */
  constructor(private readonly core: ChannelCore<T>) {
    core.acquire();
  }

  /** A new, independent handle on the same channel. */
  clone(): Sender<T> {
    if (this.closed) throw new Error('cannot clone a closed sender');
    return new Sender(this.core);
  }

  /**
   * Queue an item. Resolves `true` once it is buffered or handed to the
   * consumer, `false` when this handle or the receiver is closed.
   */
  send(item: T): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);
    return this.core.push(this, item);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.core.release(this);
  }

  get isClosed(): boolean {
    return this.closed || this.core.isReceiverClosed;
  }
}

export class Receiver<T> implements AsyncIterable<T> {
  constructor(private readonly core: ChannelCore<T>) {}

  /**
   * Next item in arrival order, or `undefined` once the channel has ended.
   * There is one consumer: a call made while another is still waiting rejects.
   */
  async recv(): Promise<T | undefined> {
    const box = await this.core.take();
    return box?.value;
  }

  /** Stop consuming. Suspended and future sends resolve `false`. */
  close(): void {
    this.core.closeReceiver();
  }

  get openSenders(): number {
    return this.core.openSenders;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    try {
      for (;;) {
        const box = await this.core.take();
        if (!box) return;
        yield box.value;
      }
    } finally {
      this.close();
    }
  }
}

export function channel<T>(capacity = Infinity): [Sender<T>, Receiver<T>] {
  if (capacity !== Infinity && (!Number.isInteger(capacity) || capacity < 1)) {
    throw new RangeError('Expected `capacity` to be a positive integer or Infinity');
  }
  const core = new ChannelCore<T>(capacity);
  return [new Sender(core), new Receiver(core)];
}

export default channel;
