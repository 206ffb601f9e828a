export type TrySendResult = 'sent' | 'full' | 'closed';

type PendingSend<T> = { item: T; resolve: (delivered: boolean) => void };
type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

const DONE = { done: true, value: undefined } as const;

/**
 * Single-process bounded queue between one producer task and one consumer.
 *
 * - `send` suspends while the buffer is full (backpressure) and resolves `false`
 *   once the receiving side is gone.
 * - `close` is the producer saying "no more items"; buffered items still drain.
 * - `closeReceiver` is the consumer leaving; buffered items are dropped and every
 *   blocked or later `send` resolves `false`.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private buf: T[] = [];
  private blockedSenders: PendingSend<T>[] = [];
  private waitingReceivers: PendingReceive<T>[] = [];
  private senderClosed = false;
  private receiverClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid channel capacity: ${capacity}`);
    }
  }

  get length(): number {
    return this.buf.length;
  }

  /** True once the producer called close(). */
  get isClosed(): boolean {
    return this.senderClosed;
  }

  /** True once the consumer went away; producers should stop work. */
  get isReceiverClosed(): boolean {
    return this.receiverClosed;
  }

  trySend(item: T): TrySendResult {
    if (this.senderClosed || this.receiverClosed) return 'closed';

    const receiver = this.waitingReceivers.shift();
    if (receiver) {
      receiver({ done: false, value: item });
      return 'sent';
    }

    if (this.buf.length < this.capacity) {
      this.buf.push(item);
      return 'sent';
    }
    return 'full';
  }

  /** Resolves true when the item was accepted, false when the receiver is closed. */
  send(item: T): Promise<boolean> {
    const res = this.trySend(item);
    if (res === 'sent') return Promise.resolve(true);
    if (res === 'closed') return Promise.resolve(false);

    return new Promise<boolean>(resolve => {
      this.blockedSenders.push({ item, resolve });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buf.length > 0) {
      const head = this.buf[0];
      this.buf.splice(0, 1);
      this.admitBlockedSender();
      return Promise.resolve({ done: false, value: head });
    }

    if (this.senderClosed || this.receiverClosed) return Promise.resolve(DONE);

    return new Promise(resolve => {
      this.waitingReceivers.push(resolve);
    });
  }

  /** Producer side: no more items. Idempotent. */
  close(): void {
    if (this.senderClosed) return;
    this.senderClosed = true;
    if (this.buf.length === 0 && this.blockedSenders.length === 0) {
      this.wakeReceivers();
    }
  }

  /** Consumer side: stop receiving, release blocked producers. Idempotent. */
  closeReceiver(): void {
    if (this.receiverClosed) return;
    this.receiverClosed = true;
    this.buf = [];
    const senders = this.blockedSenders.splice(0);
    for (const s of senders) s.resolve(false);
    this.wakeReceivers();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    try {
      while (true) {
        const next = await this.receive();
        if (next.done) return;
        yield next.value;
      }
    } finally {
      // Leaving the loop early (break/throw) means the consumer is gone.
      this.closeReceiver();
    }
  }

  private admitBlockedSender(): void {
    const blocked = this.blockedSenders.shift();
    if (!blocked) return;
    this.buf.push(blocked.item);
    blocked.resolve(true);
  }

  private wakeReceivers(): void {
    const receivers = this.waitingReceivers.splice(0);
    for (const r of receivers) r(DONE);
  }
}
