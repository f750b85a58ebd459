import * as chrono from 'chrono-node';
import {
  addDays,
  addMonths,
  addWeeks,
  addYears,
  endOfMonth,
  isBefore,
  startOfDay,
  startOfMonth,
  startOfWeek,
} from 'date-fns';
import { DialogueConfig, type NamedPeriod } from '../../config/dialogue';
import type { CalendarDate, ResolvedDateTime, WallClockTime } from '../../types';
import { TimeFormatter } from '../../utils/time';
import { UnresolvableError } from '../errors';

export type NormalizeResult =
  | { success: true; value: ResolvedDateTime }
  | { success: false; error: UnresolvableError };

const MONTH_INDEX: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

const WEEKDAY_INDEX: Record<string, number> = {
  sunday: 0, monday: 1, tuesday: 2, wednesday: 3, thursday: 4, friday: 5, saturday: 6,
};

const PERIOD_WORDS: Record<string, NamedPeriod> = {
  morning: 'morning', afternoon: 'afternoon', evening: 'evening', noon: 'noon',
  midday: 'noon', midnight: 'midnight', night: 'night',
};

const COUNT_WORDS: Record<string, number> = {
  a: 1, an: 1, one: 1, two: 2, three: 3, four: 4, five: 5,
  six: 6, seven: 7, eight: 8, nine: 9, ten: 10,
};

const MONTH_NAME = '(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\\.?';
const MONTH_DAY = new RegExp(`^${MONTH_NAME}\\s+(\\d{1,2})(?:st|nd|rd|th)?(?:,?\\s*(\\d{4}))?$`);
const DAY_MONTH = new RegExp(`^(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?${MONTH_NAME}(?:,?\\s*(\\d{4}))?$`);
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const OFFSET_FROM = /^(\d+|an?|one|two|three|four|five|six|seven|eight|nine|ten)\s+(day|week|month)s?\s+(?:from|after)\s+(.+)$/;
const OFFSET_IN = /^(?:in|after)\s+(\d+|an?|one|two|three|four|five|six|seven|eight|nine|ten)\s+(day|week|month)s?$/;
const MONTH_EDGE = /^(end|beginning|start)\s+of\s+(?:the\s+)?(next\s+)?month$/;
const WEEKDAY = /^(?:(next|this|coming)\s+)?(monday|tuesday|wednesday|thursday|friday|saturday|sunday)$/;

const MERIDIEM_TIME = /(\d{1,2})(?:[:.](\d{2}))?\s*(a|p)\.?m\.?(?![a-z])/;
const TWENTY_FOUR_HOUR = /\b([01]\d|2[0-3]):([0-5]\d)\b/;
const BARE_HOUR = /\b(\d{1,2})(?::([0-5]\d))?\b/;
const PERIOD = /\b(morning|afternoon|evening|noon|midday|midnight|night)\b/;

/**
 * Date/Time Normalizer
 *
 * Turns date and time fragments into canonical calendar slots relative to a
 * reference "now". Canonical input ("2025-06-20", "15:00") normalizes to itself.
 */
export class DateTimeNormalizer {
  normalize(dateExpr: string | null, timeExpr: string | null, referenceNow: Date): NormalizeResult {
    const date = dateExpr ? this.resolveDate(dateExpr, referenceNow) : null;
    const time = timeExpr ? this.resolveTime(timeExpr) : null;

    if (date === null && time === null) {
      const fragment = [dateExpr, timeExpr].filter(Boolean).join(' ');
      return { success: false, error: new UnresolvableError(fragment) };
    }

    return { success: true, value: { date, time } };
  }

  resolveDate(expr: string, referenceNow: Date): CalendarDate | null {
    const text = expr.toLowerCase().trim().replace(/\s+/g, ' ');
    const today = startOfDay(referenceNow);
    const resolved = this.resolveDateObject(text, today);
    return resolved ? TimeFormatter.toCalendarDate(resolved) : null;
  }

  resolveTime(expr: string): WallClockTime | null {
    const text = expr.toLowerCase().trim();

    // Explicit meridiem always wins
    const meridiem = text.match(MERIDIEM_TIME);
    if (meridiem) {
      const hour = Number(meridiem[1]);
      const minutes = Number(meridiem[2] ?? '0');
      if (hour >= 1 && hour <= 12 && minutes <= 59) {
        const isPm = meridiem[3] === 'p';
        return TimeFormatter.toWallClock((hour % 12) + (isPm ? 12 : 0), minutes);
      }
    }

    const twentyFour = text.match(TWENTY_FOUR_HOUR);
    if (twentyFour) {
      return TimeFormatter.toWallClock(Number(twentyFour[1]), Number(twentyFour[2]));
    }

    const periodMatch = text.match(PERIOD);
    const period = periodMatch ? PERIOD_WORDS[periodMatch[1]] ?? null : null;

    const bare = text.match(BARE_HOUR);
    if (bare) {
      const hour = Number(bare[1]);
      const minutes = Number(bare[2] ?? '0');
      if (hour > 23) return null;
      if (hour === 0 || hour >= 12) return TimeFormatter.toWallClock(hour, minutes);
      return TimeFormatter.toWallClock(applyMeridiemPolicy(hour, period), minutes);
    }

    return period ? DialogueConfig.PERIOD_DEFAULTS[period] : null;
  }

  /**
   * Combine a resolved date and time into a local Date.
   * A missing time means the start of the day.
   */
  static toInstant(resolved: ResolvedDateTime): Date | null {
    if (!resolved.date) return null;
    const day = TimeFormatter.parseCalendarDate(resolved.date);
    if (!day) return null;
    if (!resolved.time) return day;
    const [hours, minutes] = resolved.time.split(':').map(Number);
    return new Date(day.getFullYear(), day.getMonth(), day.getDate(), hours, minutes);
  }

  private resolveDateObject(text: string, today: Date): Date | null {
    const iso = text.match(ISO_DATE);
    if (iso) {
      return buildDate(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
    }

    const monthDay = text.match(MONTH_DAY);
    if (monthDay) {
      return this.calendarDay(MONTH_INDEX[monthDay[1]], Number(monthDay[2]), monthDay[3], today);
    }

    const dayMonth = text.match(DAY_MONTH);
    if (dayMonth) {
      return this.calendarDay(MONTH_INDEX[dayMonth[2]], Number(dayMonth[1]), dayMonth[3], today);
    }

    // "4 days from June 20", "2 weeks after Friday"
    const offsetFrom = text.match(OFFSET_FROM);
    if (offsetFrom) {
      const base = offsetFrom[3] === 'now' ? today : this.resolveDateObject(offsetFrom[3], today);
      return base ? addUnits(base, toCount(offsetFrom[1]), offsetFrom[2]) : null;
    }

    if (text === 'today' || text === 'tonight') return today;
    if (text === 'tomorrow') return addDays(today, 1);
    if (text === 'day after tomorrow') return addDays(today, 2);

    const offset = text.match(OFFSET_IN);
    if (offset) {
      return addUnits(today, toCount(offset[1]), offset[2]);
    }

    const edge = text.match(MONTH_EDGE);
    if (edge) {
      const month = edge[2] ? addMonths(today, 1) : today;
      return edge[1] === 'end' ? startOfDay(endOfMonth(month)) : startOfMonth(month);
    }

    if (text === 'next week') {
      return startOfWeek(addWeeks(today, 1), { weekStartsOn: DialogueConfig.WEEK_STARTS_ON });
    }
    if (text === 'next month') {
      return startOfMonth(addMonths(today, 1));
    }

    const weekday = text.match(WEEKDAY);
    if (weekday) {
      const delta = (WEEKDAY_INDEX[weekday[2]] - today.getDay() + 7) % 7;
      // "next" never means today
      return addDays(today, weekday[1] === 'next' && delta === 0 ? 7 : delta);
    }

    // Remaining numeric forms (e.g. 6/20/2025)
    if (/\d/.test(text)) {
      const parsed = chrono.parseDate(text, today, { forwardDate: true });
      return parsed ? startOfDay(parsed) : null;
    }

    return null;
  }

  /**
   * A month/day with an optional year. Without a year the reference year is used,
   * rolled forward when that day has already passed.
   */
  private calendarDay(month: number, day: number, year: string | undefined, today: Date): Date | null {
    if (year) {
      return buildDate(Number(year), month, day);
    }
    const candidate = buildDate(today.getFullYear(), month, day);
    if (candidate && isBefore(candidate, today)) {
      return buildDate(today.getFullYear() + 1, month, day) ?? addYears(candidate, 1);
    }
    return candidate;
  }
}

function buildDate(year: number, month: number, day: number): Date | null {
  const date = new Date(year, month, day);
  // Rejects overflow such as February 30
  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) {
    return null;
  }
  return date;
}

function toCount(raw: string): number {
  return COUNT_WORDS[raw] ?? Number(raw);
}

function addUnits(base: Date, count: number, unit: string): Date {
  switch (unit) {
    case 'week':
      return addWeeks(base, count);
    case 'month':
      return addMonths(base, count);
    default:
      return addDays(base, count);
  }
}

/**
 * Meridiem for a bare hour 1-11: a morning period makes it AM, anything else PM
 */
function applyMeridiemPolicy(hour: number, period: NamedPeriod | null): number {
  return period === 'morning' ? hour : hour + 12;
}
