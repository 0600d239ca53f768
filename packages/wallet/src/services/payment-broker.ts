/**
 * Payment Confirmation Broker
 *
 * Maps payment hash -> waiters. Whoever learns that a payment completed
 * calls resolvePayment; any number of tasks may wait on the same hash.
 * Delivery is best-effort: only waiters already receiving get the value.
 */

import { Logger, TimeoutError } from '@lnurl-wallet/core';

type Receiver = {
  resolve: (preimage: string) => void;
  reject: (error: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
};

/** Single-use receive handle for one payment hash */
export class PaymentWaiter {
  private receiver?: Receiver;
  private done = false;
  private missed = false;

  constructor(
    readonly hash: string,
    private onDiscard: (waiter: PaymentWaiter) => void
  ) {}

  get receiving(): boolean {
    return this.receiver !== undefined;
  }

  get closed(): boolean {
    return this.done;
  }

  /**
   * Suspend until the preimage is delivered. With a timeout the waiter
   * unregisters itself and rejects with TimeoutError.
   */
  receive(timeoutMs?: number): Promise<string> {
    if (this.missed) {
      return Promise.reject(new Error(`payment ${this.hash} was resolved before this waiter was receiving`));
    }
    if (this.done) {
      return Promise.reject(new Error(`waiter for ${this.hash} already used`));
    }
    if (this.receiver) {
      return Promise.reject(new Error(`waiter for ${this.hash} is already receiving`));
    }

    return new Promise<string>((resolve, reject) => {
      const receiver: Receiver = { resolve, reject };
      if (timeoutMs !== undefined) {
        receiver.timer = setTimeout(() => {
          this.receiver = undefined;
          this.discard();
          reject(new TimeoutError(`no confirmation for payment ${this.hash} after ${timeoutMs}ms`, false));
        }, timeoutMs);
      }
      this.receiver = receiver;
    });
  }

  /**
   * Non-blocking delivery. Returns false (and drops the value) when
   * nobody is receiving on this handle; a later receive then rejects.
   */
  offer(preimage: string): boolean {
    const receiver = this.receiver;
    if (this.done) {
      return false;
    }
    if (!receiver) {
      this.done = true;
      this.missed = true;
      return false;
    }

    this.done = true;
    this.receiver = undefined;
    clearTimeout(receiver.timer);
    receiver.resolve(preimage);
    return true;
  }

  /** Give up on this handle and unregister it; a pending receive rejects */
  discard(): void {
    if (this.done) return;
    this.done = true;

    const receiver = this.receiver;
    this.receiver = undefined;
    this.onDiscard(this);

    if (receiver) {
      clearTimeout(receiver.timer);
      receiver.reject(new Error(`waiter for ${this.hash} was discarded`));
    }
  }
}

export class PaymentBroker {
  private waiters = new Map<string, PaymentWaiter[]>();

  constructor(private logger: Logger = new Logger({ serviceName: 'lnurl-wallet:broker' })) {}

  /**
   * Register a new waiter for `hash`. Never blocks; receive on the
   * returned handle from whichever task owns it.
   */
  waitForPayment(hash: string): PaymentWaiter {
    const key = hash.toLowerCase();
    const waiter = new PaymentWaiter(key, (w) => this.remove(w));
    const list = this.waiters.get(key);
    if (list) {
      list.push(waiter);
    } else {
      this.waiters.set(key, [waiter]);
    }
    return waiter;
  }

  /**
   * Deliver `preimage` to every waiter on `hash` that is receiving now,
   * then drop the entry. Unknown hashes are a no-op.
   * @returns how many waiters received the value
   */
  resolvePayment(hash: string, preimage: string): number {
    const key = hash.toLowerCase();
    const list = this.waiters.get(key);
    if (!list) {
      return 0;
    }

    this.waiters.delete(key);
    let delivered = 0;
    for (const waiter of list) {
      if (waiter.offer(preimage)) {
        delivered++;
      }
    }

    this.logger.debug('Resolved payment waiters', { hash: key, waiters: list.length, delivered });
    return delivered;
  }

  /**
   * Discard every registered waiter; pending receives reject.
   * @returns how many waiters were discarded
   */
  close(): number {
    const all = [...this.waiters.values()].flat();
    for (const waiter of all) {
      waiter.discard();
    }
    this.waiters.clear();
    if (all.length > 0) {
      this.logger.info('Discarded pending payment waiters', { waiters: all.length });
    }
    return all.length;
  }

  pendingCount(hash: string): number {
    return this.waiters.get(hash.toLowerCase())?.length ?? 0;
  }

  get size(): number {
    return this.waiters.size;
  }

  private remove(waiter: PaymentWaiter): void {
    const list = this.waiters.get(waiter.hash);
    if (!list) return;

    const remaining = list.filter((w) => w !== waiter);
    if (remaining.length === 0) {
      this.waiters.delete(waiter.hash);
    } else {
      this.waiters.set(waiter.hash, remaining);
    }
  }
}
