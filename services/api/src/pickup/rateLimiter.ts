import type { Logger } from 'pino';
import type { Clock } from '../time/clock.js';

export interface PickupRateLimitConfig {
  maxAttempts: number;
  windowMinutes: number;
}

interface AttemptWindow {
  failedAttempts: number;
  /** Epoch ms; the window starts at the first failure and is not extended. */
  resetAt: number;
}

/**
 * Counts failed pickup verifications per (attendance, origin) pair.
 * State is in memory and does not survive a restart.
 */
export class PickupAttemptLimiter {
  private readonly windows = new Map<string, AttemptWindow>();
  private readonly windowMs: number;

  constructor(
    private readonly config: PickupRateLimitConfig,
    private readonly clock: Clock,
    private readonly logger: Logger
  ) {
    this.windowMs = config.windowMinutes * 60_000;
  }

  recordFailedAttempt(attendanceId: string, originId: string): void {
    const key = this.keyOf(attendanceId, originId);
    const now = this.clock.now().getTime();
    const window = this.activeWindow(key, now);

    if (!window) {
      this.windows.set(key, { failedAttempts: 1, resetAt: now + this.windowMs });
      return;
    }

    window.failedAttempts++;
    if (window.failedAttempts === this.config.maxAttempts) {
      this.logger.warn(
        { attendanceId, originId, attempts: window.failedAttempts },
        'Pickup verification rate limit reached'
      );
    }
  }

  isRateLimited(attendanceId: string, originId: string): boolean {
    const window = this.activeWindow(this.keyOf(attendanceId, originId), this.clock.now().getTime());
    return window !== null && window.failedAttempts >= this.config.maxAttempts;
  }

  /**
   * Milliseconds until the limit lifts, or null when not limited.
   */
  getRetryAfter(attendanceId: string, originId: string): number | null {
    const now = this.clock.now().getTime();
    const window = this.activeWindow(this.keyOf(attendanceId, originId), now);
    if (!window || window.failedAttempts < this.config.maxAttempts) return null;
    return window.resetAt - now;
  }

  resetAttempts(attendanceId: string, originId: string): void {
    this.windows.delete(this.keyOf(attendanceId, originId));
  }

  /**
   * Drops expired windows. Returns how many were removed.
   */
  prune(): number {
    const now = this.clock.now().getTime();
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get trackedKeys(): number {
    return this.windows.size;
  }

  private activeWindow(key: string, now: number): AttemptWindow | null {
    const window = this.windows.get(key);
    if (!window) return null;
    if (window.resetAt <= now) {
      this.windows.delete(key);
      return null;
    }
    return window;
  }

  /**
   * Attendance ids are UUIDs, which the stores match regardless of case, so
   * every spelling of one id shares a counter.
   */
  private keyOf(attendanceId: string, originId: string): string {
    return `${attendanceId.trim().toLowerCase()}\u0000${originId}`;
  }
}
