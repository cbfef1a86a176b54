// backend/services/shared/src/sync/ExclusiveGate.ts
/**
 * Purpose:
 * - In-process mutual exclusion for async code paths.
 * - acquire() resolves with a Lease once no other lease is outstanding;
 *   waiters are admitted in arrival order.
 * - run() is the scoped form: the lease is released on every exit path,
 *   including a thrown error or rejected promise.
 *
 * Invariants:
 * - At most one lease is held at any instant.
 * - Lease.release() is idempotent; a second call is a no-op.
 * - No timeouts. A holder that never releases blocks every later caller.
 */

export interface Lease {
  release(): void;
}

export class ExclusiveGate {
  #held = false;
  readonly #waiters: Array<(lease: Lease) => void> = [];

  /** True while some caller holds the lease. */
  public get locked(): boolean {
    return this.#held;
  }

  /** Callers currently parked in acquire(). */
  public get pending(): number {
    return this.#waiters.length;
  }

  public acquire(): Promise<Lease> {
    if (!this.#held) {
      this.#held = true;
      return Promise.resolve(this.#lease());
    }
    return new Promise<Lease>((resolve) => {
      this.#waiters.push(resolve);
    });
  }

  public async run<T>(fn: () => T | Promise<T>): Promise<T> {
    const lease = await this.acquire();
    try {
      return await fn();
    } finally {
      lease.release();
    }
  }

  #lease(): Lease {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.#handOff();
      },
    };
  }

  // Ownership passes straight to the next waiter; #held never drops to false
  // in between, so a fresh acquire() cannot jump the queue.
  #handOff(): void {
    const next = this.#waiters.shift();
    if (next) {
      next(this.#lease());
      return;
    }
    this.#held = false;
  }
}
