import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { PickupAttemptLimiter } from '../src/pickup/rateLimiter.js';
import { FixedClock, silentLogger } from './support/fixtures.js';

const ATTENDANCE = '00000000-0000-4000-8000-000000000001';

function limiter(clock = new FixedClock('2026-03-08T15:00:00.000Z'), logger = silentLogger) {
  return new PickupAttemptLimiter({ maxAttempts: 3, windowMinutes: 15 }, clock, logger);
}

describe('PickupAttemptLimiter', () => {
  it('limits a pair once it reaches the maximum failures', () => {
    const attempts = limiter();

    attempts.recordFailedAttempt(ATTENDANCE, '10.0.0.5');
    attempts.recordFailedAttempt(ATTENDANCE, '10.0.0.5');
    expect(attempts.isRateLimited(ATTENDANCE, '10.0.0.5')).toBe(false);
    expect(attempts.getRetryAfter(ATTENDANCE, '10.0.0.5')).toBeNull();

    attempts.recordFailedAttempt(ATTENDANCE, '10.0.0.5');
    expect(attempts.isRateLimited(ATTENDANCE, '10.0.0.5')).toBe(true);
  });

  it('counts every letter case of an attendance id against the same pair', () => {
    const attempts = limiter();
    const upper = 'ABCDEF00-0000-4000-8000-00000000000A';

    attempts.recordFailedAttempt(upper.toLowerCase(), 'kiosk');
    attempts.recordFailedAttempt(upper, 'kiosk');
    attempts.recordFailedAttempt('AbCdEf00-0000-4000-8000-00000000000a', 'kiosk');
    expect(attempts.isRateLimited(upper.toLowerCase(), 'kiosk')).toBe(true);
    expect(attempts.trackedKeys).toBe(1);

    attempts.resetAttempts(upper, 'kiosk');
    expect(attempts.isRateLimited(upper.toLowerCase(), 'kiosk')).toBe(false);
  });

  it('keeps pairs independent', () => {
    const attempts = limiter();
    for (let i = 0; i < 3; i++) attempts.recordFailedAttempt(ATTENDANCE, '10.0.0.5');

    expect(attempts.isRateLimited(ATTENDANCE, '10.0.0.6')).toBe(false);
    expect(attempts.isRateLimited('00000000-0000-4000-8000-000000000002', '10.0.0.5')).toBe(false);
  });

  it('reports time left until the window that began at the first failure ends', () => {
    const clock = new FixedClock('2026-03-08T15:00:00.000Z');
    const attempts = limiter(clock);

    attempts.recordFailedAttempt(ATTENDANCE, 'kiosk');
    clock.advanceMinutes(10);
    attempts.recordFailedAttempt(ATTENDANCE, 'kiosk');
    clock.advanceMinutes(4);
    attempts.recordFailedAttempt(ATTENDANCE, 'kiosk');

    expect(attempts.getRetryAfter(ATTENDANCE, 'kiosk')).toBe(60_000);

    clock.advanceMinutes(1);
    expect(attempts.isRateLimited(ATTENDANCE, 'kiosk')).toBe(false);
    expect(attempts.getRetryAfter(ATTENDANCE, 'kiosk')).toBeNull();
    expect(attempts.trackedKeys).toBe(0);
  });

  it('clears a pair on reset', () => {
    const attempts = limiter();
    for (let i = 0; i < 3; i++) attempts.recordFailedAttempt(ATTENDANCE, 'kiosk');

    attempts.resetAttempts(ATTENDANCE, 'kiosk');
    expect(attempts.isRateLimited(ATTENDANCE, 'kiosk')).toBe(false);
    expect(attempts.trackedKeys).toBe(0);
  });

  it('prunes only expired windows', () => {
    const clock = new FixedClock('2026-03-08T15:00:00.000Z');
    const attempts = limiter(clock);
    attempts.recordFailedAttempt(ATTENDANCE, 'kiosk-1');
    attempts.recordFailedAttempt(ATTENDANCE, 'kiosk-2');
    clock.advanceMinutes(10);
    attempts.recordFailedAttempt(ATTENDANCE, 'kiosk-3');

    clock.advanceMinutes(6);
    expect(attempts.prune()).toBe(2);
    expect(attempts.trackedKeys).toBe(1);
  });

  it('warns once when a pair hits the limit', () => {
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const attempts = limiter(new FixedClock('2026-03-08T15:00:00.000Z'), logger);

    for (let i = 0; i < 5; i++) attempts.recordFailedAttempt(ATTENDANCE, 'kiosk');

    expect(warn).toHaveBeenCalledTimes(1);
  });
});
