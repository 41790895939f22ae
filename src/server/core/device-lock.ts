import { CancelledError } from "./errors";

export type Release = () => void;

type Waiter = (release: Release) => void;

/**
 * FIFO async mutex guarding one device.
 * Waiting is the only point an operation can be abandoned: abort the signal
 * and the waiter leaves the queue with a CancelledError.
 */
export class DeviceLock {
  private held = false;
  private readonly waiters: Waiter[] = [];

  get locked() { return this.held; }
  get pending() { return this.waiters.length; }

  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) return Promise.reject(new CancelledError());

    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.releaser());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        reject(new CancelledError());
      };

      const waiter: Waiter = release => {
        signal?.removeEventListener("abort", onAbort);
        resolve(release);
      };

      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Scoped guard: `fn` runs with the lock held, released on every exit path. */
  async run<T>(fn: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): Release {
    let done = false;
    return () => {
      if (done) return;
      done = true;
      this.handOff();
    };
  }

  // ownership passes straight to the next waiter; `held` never drops in between
  private handOff(): void {
    const next = this.waiters.shift();
    if (next) next(this.releaser());
    else this.held = false;
  }
}
