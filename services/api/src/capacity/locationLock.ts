import { LockTimeoutError } from '../errors/domain.js';

export interface LockOptions {
  signal?: AbortSignal;
  /** Overrides the lock's default acquire timeout. */
  timeoutMs?: number;
}

/**
 * Per-location mutual exclusion. Only one critical section runs at a time for
 * a given location id; different locations never wait on each other.
 *
 * Errors thrown by the critical section propagate unchanged after the lock is
 * released. Failing to acquire the lock in time throws LockTimeoutError.
 */
export interface LocationLock {
  executeWithLocationLock<T>(
    locationId: string,
    criticalSection: () => Promise<T>,
    opts?: LockOptions
  ): Promise<T>;
}

interface Gate {
  promise: Promise<void>;
  open: () => void;
}

function createGate(): Gate {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

/**
 * Keyed FIFO mutex for a single-process deployment.
 *
 * Each caller chains onto the previous holder's release. A waiter that times
 * out or aborts releases its own link immediately, so later waiters still
 * queue behind the holder rather than behind the abandoned waiter.
 */
export class InProcessLocationLock implements LocationLock {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly defaultTimeoutMs: number) {}

  /** Number of locations with a holder or waiters. */
  get activeKeys(): number {
    return this.tails.size;
  }

  async executeWithLocationLock<T>(
    locationId: string,
    criticalSection: () => Promise<T>,
    opts: LockOptions = {}
  ): Promise<T> {
    opts.signal?.throwIfAborted();

    const gate = createGate();
    const previous = this.tails.get(locationId) ?? Promise.resolve();
    const tail = previous.then(() => gate.promise);
    this.tails.set(locationId, tail);
    void tail.then(() => {
      if (this.tails.get(locationId) === tail) {
        this.tails.delete(locationId);
      }
    });

    try {
      await this.waitForTurn(
        locationId,
        previous,
        opts.timeoutMs ?? this.defaultTimeoutMs,
        opts.signal
      );
      return await criticalSection();
    } finally {
      gate.open();
    }
  }

  private waitForTurn(
    locationId: string,
    turn: Promise<void>,
    timeoutMs: number,
    signal: AbortSignal | undefined
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const finish = (error?: unknown): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (error === undefined) {
          resolve();
        } else {
          reject(error);
        }
      };

      const onAbort = (): void => {
        finish(signal?.reason);
      };

      const timer = setTimeout(() => {
        finish(new LockTimeoutError(locationId, timeoutMs));
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      void turn.then(() => finish());
    });
  }
}
