import { getDay } from 'date-fns';
import type { CalendarDate, WallClockTime } from '../../types';
import { TimeFormatter } from '../../utils/time';
import type { AvailabilityWindow } from './AppointmentStore';

export const BUSINESS_HOURS = { start: '09:00', end: '17:00' } as const;

/** Offered slot length when listing free times */
export const SLOT_MINUTES = 60;

/**
 * Monday-based weekday index (0 = Monday … 6 = Sunday), or null for an invalid date
 */
export function dayOfWeek(date: CalendarDate): number | null {
  const parsed = TimeFormatter.parseCalendarDate(date);
  return parsed ? (getDay(parsed) + 6) % 7 : null;
}

/**
 * Whether a person with the given weekly windows can be booked at date/time.
 * A person without windows is available on weekdays during business hours.
 * Both ends of a window are bookable.
 */
export function isWithinAvailability(
  windows: readonly AvailabilityWindow[],
  date: CalendarDate,
  time: WallClockTime
): boolean {
  const weekday = dayOfWeek(date);
  if (weekday === null) return false;

  if (windows.length === 0) {
    return weekday < 5 && time >= BUSINESS_HOURS.start && time <= BUSINESS_HOURS.end;
  }
  return windows.some(w => w.dayOfWeek === weekday && time >= w.startTime && time <= w.endTime);
}

/**
 * Hourly candidate times for a date, before bookings are taken out
 */
export function candidateTimes(windows: readonly AvailabilityWindow[], date: CalendarDate): WallClockTime[] {
  const weekday = dayOfWeek(date);
  if (weekday === null) return [];

  const ranges =
    windows.length === 0
      ? weekday < 5
        ? [{ start: BUSINESS_HOURS.start, end: BUSINESS_HOURS.end }]
        : []
      : windows.filter(w => w.dayOfWeek === weekday).map(w => ({ start: w.startTime, end: w.endTime }));

  const times = new Set<WallClockTime>();
  for (const range of ranges) {
    for (let minute = toMinutes(range.start); minute <= toMinutes(range.end); minute += SLOT_MINUTES) {
      times.add(TimeFormatter.toWallClock(Math.floor(minute / 60), minute % 60));
    }
  }
  return [...times].sort();
}

function toMinutes(time: WallClockTime): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}
