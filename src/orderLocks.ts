// src/orderLocks.ts
// Per-order serialization, process-local and advisory. A fixed pool of mutexes
// sharded by order id keeps memory flat for the life of the process; two
// orders on one shard just wait for each other.
// Multi-instance deployments need a distributed lock (or SELECT ... FOR UPDATE)
// here; correctness already comes from the CAS in orderState.ts.

class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const prev = this.tail;
    this.tail = prev.then(() => next);
    await prev;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

export class LocksClosedError extends Error {
  constructor() {
    super('Order locks are closed (shutting down)');
    this.name = 'LocksClosedError';
  }
}

export class OrderLocks {
  private readonly shards: Mutex[];
  private inFlight = 0;
  private idleWaiters: Array<() => void> = [];
  private closed = false;

  constructor(readonly shardCount = 64) {
    if (!Number.isInteger(shardCount) || shardCount < 1) {
      throw new RangeError(`shardCount must be a positive integer, got ${shardCount}`);
    }
    this.shards = Array.from({ length: shardCount }, () => new Mutex());
  }

  shardOf(orderId: number): number {
    // Knuth multiplicative hash; spreads sequential ids across shards
    const h = Math.imul(orderId >>> 0, 2654435761) >>> 0;
    return h % this.shardCount;
  }

  /** Holds the order's lock across the whole read-decide-act sequence. */
  async runExclusive<T>(orderId: number, fn: () => Promise<T>): Promise<T> {
    if (this.closed) throw new LocksClosedError();
    this.inFlight++;
    try {
      return await this.shards[this.shardOf(orderId)].run(fn);
    } finally {
      this.inFlight--;
      if (this.inFlight === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((w) => w());
      }
    }
  }

  get pending(): number {
    return this.inFlight;
  }

  /** Stop accepting work; resolves once every current holder has finished. */
  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }

  drain(): Promise<void> {
    if (this.inFlight === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }
}
