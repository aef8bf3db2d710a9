import {
  addDays,
  atTimeOfDay,
  daysInMonth,
  formatDate,
  timeOfDayMs,
  toDateString,
  weekdayOf,
} from '../common/utils/date.util';
import type { EventRecord } from '../database/schema';

/** Inclusive range of `YYYY-MM-DD` dates. */
export interface DateRange {
  from: string;
  to: string;
}

export interface EventOccurrence extends EventRecord {
  isRepeatInstance: boolean;
  /** Start date of the stored event. */
  originalDate: string;
  /** Only set on repeat instances. */
  instanceDate?: string;
}

/**
 * Expands a stored event into the concrete occurrences that fall inside `range`.
 * Each repeat instance keeps the event's UTC time of day and its duration.
 */
export function expandOccurrences(
  event: EventRecord,
  repeatDays: readonly number[],
  range: DateRange,
): EventOccurrence[] {
  const originalDate = toDateString(event.startTime);

  if (!event.repeatPattern) {
    if (originalDate < range.from || originalDate > range.to) return [];
    return [{ ...event, isRepeatInstance: false, originalDate }];
  }

  const first = originalDate > range.from ? originalDate : range.from;
  const last = event.repeatUntil && event.repeatUntil < range.to ? event.repeatUntil : range.to;
  if (first > last) return [];

  const dates =
    event.repeatPattern === 'monthly'
      ? monthlyDates(Number(originalDate.slice(8, 10)), first, last)
      : weekdayDates(repeatDays.length > 0 ? repeatDays : [weekdayOf(originalDate)], first, last);

  const offsetMs = timeOfDayMs(event.startTime);
  const durationMs = event.endTime.getTime() - event.startTime.getTime();

  return dates.map((instanceDate) => {
    const startTime = atTimeOfDay(instanceDate, offsetMs);
    return {
      ...event,
      startTime,
      endTime: new Date(startTime.getTime() + durationMs),
      isRepeatInstance: true,
      originalDate,
      instanceDate,
    };
  });
}

// Steps a week at a time from the first matching date of each weekday.
function weekdayDates(days: readonly number[], first: string, last: string): string[] {
  const firstWeekday = weekdayOf(first);
  const dates: string[] = [];
  for (const day of new Set(days)) {
    const offset = (day - firstWeekday + 7) % 7;
    for (let date = addDays(first, offset); date <= last; date = addDays(date, 7)) {
      dates.push(date);
    }
  }
  return dates.sort();
}

// Months too short for `dayOfMonth` have no occurrence.
function monthlyDates(dayOfMonth: number, first: string, last: string): string[] {
  const dates: string[] = [];
  let year = Number(first.slice(0, 4));
  let month = Number(first.slice(5, 7));
  const lastYear = Number(last.slice(0, 4));
  const lastMonth = Number(last.slice(5, 7));

  while (year < lastYear || (year === lastYear && month <= lastMonth)) {
    if (dayOfMonth <= daysInMonth(year, month)) {
      const date = formatDate(year, month, dayOfMonth);
      if (date >= first && date <= last) dates.push(date);
    }
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }
  return dates;
}

export function compareByStartTime(a: EventOccurrence, b: EventOccurrence): number {
  return a.startTime.getTime() - b.startTime.getTime();
}
