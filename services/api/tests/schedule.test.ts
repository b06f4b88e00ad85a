import { describe, it, expect } from 'vitest';
import { isCheckinWindowOpen } from '../src/checkin/schedule.js';
import type { ScheduleRecord } from '../src/directory/types.js';
import type { LocalDateTime } from '../src/time/clock.js';

function schedule(overrides: Partial<ScheduleRecord> = {}): ScheduleRecord {
  return {
    id: '00000000-0000-4000-8000-0000000000aa',
    name: 'Sunday 9am',
    isActive: true,
    weeklyDayOfWeek: 0,
    weeklyStartMinute: 9 * 60,
    checkInStartOffsetMinutes: null,
    checkInEndOffsetMinutes: null,
    ...overrides,
  };
}

function at(dayOfWeek: number, hh: number, mm: number): LocalDateTime {
  return { date: '2026-03-08', dayOfWeek, minuteOfDay: hh * 60 + mm };
}

describe('isCheckinWindowOpen', () => {
  it('opens 60 minutes before the start and closes 30 minutes after by default', () => {
    expect(isCheckinWindowOpen(schedule(), at(0, 7, 59))).toBe(false);
    expect(isCheckinWindowOpen(schedule(), at(0, 8, 0))).toBe(true);
    expect(isCheckinWindowOpen(schedule(), at(0, 9, 30))).toBe(true);
    expect(isCheckinWindowOpen(schedule(), at(0, 9, 31))).toBe(false);
  });

  it('is closed on other days of the week', () => {
    expect(isCheckinWindowOpen(schedule(), at(1, 9, 0))).toBe(false);
  });

  it('honours per-schedule offsets', () => {
    const tight = schedule({ checkInStartOffsetMinutes: 15, checkInEndOffsetMinutes: 0 });
    expect(isCheckinWindowOpen(tight, at(0, 8, 44))).toBe(false);
    expect(isCheckinWindowOpen(tight, at(0, 8, 45))).toBe(true);
    expect(isCheckinWindowOpen(tight, at(0, 9, 0))).toBe(true);
    expect(isCheckinWindowOpen(tight, at(0, 9, 1))).toBe(false);
  });

  it('handles windows that open on the previous day of the week', () => {
    const earlySunday = schedule({ weeklyStartMinute: 15 });
    expect(isCheckinWindowOpen(earlySunday, at(6, 23, 30))).toBe(true);
    expect(isCheckinWindowOpen(earlySunday, at(6, 23, 14))).toBe(false);
  });

  it('is always closed for an inactive schedule', () => {
    expect(isCheckinWindowOpen(schedule({ isActive: false }), at(0, 9, 0))).toBe(false);
  });

  it('is always open for a schedule with no weekly slot', () => {
    const unscheduled = schedule({ weeklyDayOfWeek: null, weeklyStartMinute: null });
    expect(isCheckinWindowOpen(unscheduled, at(3, 2, 0))).toBe(true);
  });
});
