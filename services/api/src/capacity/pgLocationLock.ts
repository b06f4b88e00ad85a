import type { Logger } from 'pino';
import { LockTimeoutError } from '../errors/domain.js';
import { PG_LOCK_NOT_AVAILABLE, getPgErrorCode } from '../db/index.js';
import type { LocationLock, LockOptions } from './locationLock.js';

/** First key of the two-key advisory lock, reserving a namespace for location locks. */
const LOCATION_LOCK_NAMESPACE = 4_210_001;

/** The part of a pooled pg client the lock uses. */
export interface LockSession {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(err?: Error | boolean): void;
}

export interface LockSessionPool {
  connect(): Promise<LockSession>;
}

/**
 * Cross-instance location lock backed by a session-level Postgres advisory lock.
 *
 * The lock is held on a dedicated connection while the critical section runs
 * its own (auto-committed) writes through the pool, so every write is visible
 * to the next holder before the lock is released.
 */
export class PgLocationLock implements LocationLock {
  constructor(
    private readonly pool: LockSessionPool,
    private readonly defaultTimeoutMs: number,
    private readonly logger: Logger
  ) {}

  async executeWithLocationLock<T>(
    locationId: string,
    criticalSection: () => Promise<T>,
    opts: LockOptions = {}
  ): Promise<T> {
    opts.signal?.throwIfAborted();
    const timeoutMs = opts.timeoutMs ?? this.defaultTimeoutMs;

    const client = await this.pool.connect();
    let releaseError: Error | undefined;

    try {
      await client.query(`SELECT set_config('lock_timeout', $1, false)`, [`${timeoutMs}ms`]);
      try {
        await client.query('SELECT pg_advisory_lock($1::int, hashtext($2))', [
          LOCATION_LOCK_NAMESPACE,
          locationId,
        ]);
      } catch (error) {
        if (getPgErrorCode(error) === PG_LOCK_NOT_AVAILABLE) {
          throw new LockTimeoutError(locationId, timeoutMs, { cause: error });
        }
        throw error;
      }

      try {
        opts.signal?.throwIfAborted();
        return await criticalSection();
      } finally {
        try {
          await client.query('SELECT pg_advisory_unlock($1::int, hashtext($2))', [
            LOCATION_LOCK_NAMESPACE,
            locationId,
          ]);
        } catch (error) {
          // Ending the session is the only other way to drop the lock.
          this.logger.error({ err: error, locationId }, 'Failed to release location lock');
          releaseError = error instanceof Error ? error : new Error(String(error));
        }
      }
    } finally {
      // lock_timeout was set for the session; pooled connections are shared.
      if (!releaseError) {
        try {
          await client.query('RESET lock_timeout');
        } catch (error) {
          this.logger.error({ err: error, locationId }, 'Failed to reset lock_timeout');
          releaseError = error instanceof Error ? error : new Error(String(error));
        }
      }
      client.release(releaseError);
    }
  }
}
