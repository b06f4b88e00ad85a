import type { ScheduleRecord } from '../directory/types.js';
import type { LocalDateTime } from '../time/clock.js';

export const DEFAULT_CHECKIN_START_OFFSET_MINUTES = 60;
export const DEFAULT_CHECKIN_END_OFFSET_MINUTES = 30;

const MINUTES_PER_DAY = 24 * 60;
const MINUTES_PER_WEEK = 7 * MINUTES_PER_DAY;

/**
 * Signed minutes from the scheduled start to `local`, taking the nearest
 * weekly occurrence so windows that straddle midnight or Saturday→Sunday work.
 */
function minutesFromWeeklyStart(local: LocalDateTime, dayOfWeek: number, startMinute: number): number {
  const nowInWeek = local.dayOfWeek * MINUTES_PER_DAY + local.minuteOfDay;
  const startInWeek = dayOfWeek * MINUTES_PER_DAY + startMinute;

  let diff = (nowInWeek - startInWeek) % MINUTES_PER_WEEK;
  if (diff > MINUTES_PER_WEEK / 2) diff -= MINUTES_PER_WEEK;
  if (diff <= -MINUTES_PER_WEEK / 2) diff += MINUTES_PER_WEEK;
  return diff;
}

/**
 * Whether check-in is open for the schedule at the given local time.
 * Inactive schedules are closed; schedules without a weekly slot are always open.
 */
export function isCheckinWindowOpen(schedule: ScheduleRecord, local: LocalDateTime): boolean {
  if (!schedule.isActive) return false;
  if (schedule.weeklyDayOfWeek === null || schedule.weeklyStartMinute === null) return true;

  const opensBefore = schedule.checkInStartOffsetMinutes ?? DEFAULT_CHECKIN_START_OFFSET_MINUTES;
  const closesAfter = schedule.checkInEndOffsetMinutes ?? DEFAULT_CHECKIN_END_OFFSET_MINUTES;
  const diff = minutesFromWeeklyStart(local, schedule.weeklyDayOfWeek, schedule.weeklyStartMinute);

  return diff >= -opensBefore && diff <= closesAfter;
}
