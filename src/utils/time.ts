/**
 * Calendar slot formatting
 *
 * Slots travel as "yyyy-MM-dd" dates and "HH:mm" 24-hour times; these helpers
 * convert between that canonical form, Date objects and display text.
 */

import { format, isValid, parse } from 'date-fns';
import type { CalendarDate, WallClockTime } from '../types';

export const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';
export const WALL_CLOCK_FORMAT = 'HH:mm';

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const WALL_CLOCK_PATTERN = /^(?:[01]\d|2[0-3]):[0-5]\d$/;

export class TimeFormatter {
  static toCalendarDate(date: Date): CalendarDate {
    return format(date, CALENDAR_DATE_FORMAT);
  }

  static toWallClock(hours: number, minutes: number): WallClockTime {
    return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
  }

  static isCalendarDate(value: string): value is CalendarDate {
    return CALENDAR_DATE_PATTERN.test(value) && this.parseCalendarDate(value) !== null;
  }

  static isWallClock(value: string): value is WallClockTime {
    return WALL_CLOCK_PATTERN.test(value);
  }

  /**
   * Local-midnight Date for a canonical date, or null when the day does not exist
   */
  static parseCalendarDate(value: CalendarDate): Date | null {
    const parsed = parse(value, CALENDAR_DATE_FORMAT, new Date(2000, 0, 1));
    return isValid(parsed) && format(parsed, CALENDAR_DATE_FORMAT) === value ? parsed : null;
  }

  /**
   * "2025-06-20" → "Friday, June 20, 2025"
   */
  static formatDateForDisplay(value: CalendarDate): string {
    const parsed = this.parseCalendarDate(value);
    return parsed ? format(parsed, 'EEEE, MMMM d, yyyy') : value;
  }

  /**
   * "15:00" → "3:00 PM"
   */
  static formatTimeForDisplay(value: WallClockTime): string {
    const parsed = parse(value, WALL_CLOCK_FORMAT, new Date(2000, 0, 1));
    return isValid(parsed) ? format(parsed, 'h:mm a') : value;
  }
}
