/**
 * Shared State Container
 *
 * Holds the single application-defined value every handler sees. The
 * value is only reachable through `lock()`, which grants exclusive access
 * in request order (FIFO) until the callback settles.
 */

export class PoisonedStateError extends Error {
  constructor(cause: unknown) {
    super('Shared state is poisoned: a previous holder failed while holding the lock', {
      cause,
    });
    this.name = 'PoisonedStateError';
  }
}

export class StateGuardReleasedError extends Error {
  constructor() {
    super('State guard used after the lock was released');
    this.name = 'StateGuardReleasedError';
  }
}

/**
 * Exclusive handle on the value, valid until the lock is released
 */
export interface StateGuard<T> {
  value: T;
}

export type LockCallback<T, R> = (guard: StateGuard<T>) => R | Promise<R>;

/**
 * Lock-guarded application state
 */
export class SharedState<T> {
  private value: T;
  private tail: Promise<void> = Promise.resolve();
  private poison: { cause: unknown } | null = null;

  constructor(initial: T) {
    this.value = initial;
  }

  /**
   * Whether a previous holder failed while holding the lock
   */
  get isPoisoned(): boolean {
    return this.poison !== null;
  }

  /**
   * Acquire the lock, run `fn` with exclusive access, release.
   *
   * If `fn` throws or rejects, its error is rethrown and the container is
   * poisoned: every later call rejects with PoisonedStateError.
   */
  async lock<R>(fn: LockCallback<T, R>): Promise<R> {
    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => held);
    await previous;

    try {
      if (this.poison) {
        throw new PoisonedStateError(this.poison.cause);
      }
      return await this.runGuarded(fn);
    } finally {
      release();
    }
  }

  private async runGuarded<R>(fn: LockCallback<T, R>): Promise<R> {
    let active = true;
    const read = (): T => {
      if (!active) throw new StateGuardReleasedError();
      return this.value;
    };
    const write = (next: T): void => {
      if (!active) throw new StateGuardReleasedError();
      this.value = next;
    };

    const handle: StateGuard<T> = {
      get value(): T {
        return read();
      },
      set value(next: T) {
        write(next);
      },
    };

    try {
      return await fn(handle);
    } catch (error) {
      this.poison = { cause: error };
      throw error;
    } finally {
      active = false;
    }
  }
}
