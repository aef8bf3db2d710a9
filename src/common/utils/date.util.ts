import { UTCDate } from '@date-fns/utc';
import {
  addDays as addCalendarDays,
  addMilliseconds,
  differenceInCalendarDays,
  differenceInMilliseconds,
  endOfMonth,
  format,
  getDay,
  getDaysInMonth,
  startOfDay,
  startOfMonth,
} from 'date-fns';

/**
 * Calendar-date helpers. Dates travel as `YYYY-MM-DD` strings and are
 * interpreted in UTC, so lexical order equals chronological order.
 */

const DATE_FORMAT = 'yyyy-MM-dd';

function utcDay(value: string): UTCDate {
  return new UTCDate(`${value}T00:00:00.000Z`);
}

export function toDateString(value: Date): string {
  return format(new UTCDate(value), DATE_FORMAT);
}

export function parseDateString(value: string): Date {
  return new Date(utcDay(value).getTime());
}

export function todayDateString(now: Date = new Date()): string {
  return toDateString(now);
}

export function addDays(value: string, days: number): string {
  return format(addCalendarDays(utcDay(value), days), DATE_FORMAT);
}

/** Whole days from `from` to `to`; negative when `to` comes first. */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(utcDay(to), utcDay(from));
}

/** 0 = Sunday … 6 = Saturday. */
export function weekdayOf(value: string): number {
  return getDay(utcDay(value));
}

export function daysInMonth(year: number, month: number): number {
  return getDaysInMonth(new UTCDate(year, month - 1, 1));
}

export function formatDate(year: number, month: number, day: number): string {
  return format(new UTCDate(year, month - 1, day), DATE_FORMAT);
}

export function monthBounds(value: string): { first: string; last: string } {
  const day = utcDay(value);
  return {
    first: format(startOfMonth(day), DATE_FORMAT),
    last: format(endOfMonth(day), DATE_FORMAT),
  };
}

/** Milliseconds elapsed since UTC midnight of the instant's own day. */
export function timeOfDayMs(value: Date): number {
  const instant = new UTCDate(value);
  return differenceInMilliseconds(instant, startOfDay(instant));
}

export function atTimeOfDay(date: string, offsetMs: number): Date {
  return new Date(addMilliseconds(utcDay(date), offsetMs).getTime());
}
