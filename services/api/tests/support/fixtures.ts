import { pino } from 'pino';
import type { Clock } from '../../src/time/clock.js';
import { toLocalDateTime } from '../../src/time/clock.js';
import { createServices, type AppServices, type ServiceSettings } from '../../src/services.js';
import { InProcessLocationLock } from '../../src/capacity/locationLock.js';
import { MemoryStore } from './memoryStore.js';

export const silentLogger = pino({ level: 'silent' });

/**
 * Clock pinned to an instant until moved. Local time defaults to UTC.
 */
export class FixedClock implements Clock {
  private current: Date;

  constructor(iso: string, private readonly timeZone = 'UTC') {
    this.current = new Date(iso);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  today(): string {
    return toLocalDateTime(this.current, this.timeZone).date;
  }

  toLocal(instant: Date) {
    return toLocalDateTime(instant, this.timeZone);
  }

  set(iso: string): void {
    this.current = new Date(iso);
  }

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }
}

export const TEST_SETTINGS: ServiceSettings = {
  capacity: { lockMode: 'process', lockTimeoutMs: 1000, warningPercent: 80 },
  securityCodes: { length: 4, maxAttempts: 10 },
  pickupRateLimit: { maxAttempts: 5, windowMinutes: 15, pruneIntervalMs: 60_000 },
};

export interface TestHarness {
  store: MemoryStore;
  clock: FixedClock;
  lock: InProcessLocationLock;
  services: AppServices;
}

export function createHarness(
  opts: { now?: string; settings?: ServiceSettings; randomIndex?: (max: number) => number } = {}
): TestHarness {
  const store = new MemoryStore();
  const clock = new FixedClock(opts.now ?? '2026-03-08T15:00:00.000Z');
  const settings = opts.settings ?? TEST_SETTINGS;
  const lock = new InProcessLocationLock(settings.capacity.lockTimeoutMs);
  const services = createServices(
    {
      directory: store,
      locationSettings: store,
      attendance: store,
      securityCodes: store,
      pickups: store,
      locationLock: lock,
    },
    settings,
    clock,
    silentLogger,
    { randomIndex: opts.randomIndex }
  );
  return { store, clock, lock, services };
}
