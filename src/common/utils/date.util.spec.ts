import {
  addDays,
  atTimeOfDay,
  daysBetween,
  daysInMonth,
  formatDate,
  monthBounds,
  parseDateString,
  timeOfDayMs,
  toDateString,
  weekdayOf,
} from './date.util';

describe('date utils', () => {
  it('formats instants as UTC calendar dates', () => {
    expect(toDateString(new Date('2025-03-09T23:30:00-02:00'))).toBe('2025-03-10');
  });

  it('adds days across month and year boundaries', () => {
    expect(addDays('2025-01-31', 1)).toBe('2025-02-01');
    expect(addDays('2025-01-01', -1)).toBe('2024-12-31');
  });

  it('counts calendar days between dates', () => {
    expect(daysBetween('2026-03-01', '2026-03-01')).toBe(0);
    expect(daysBetween('2026-02-27', '2026-03-02')).toBe(3);
    expect(daysBetween('2026-01-01', '2027-01-01')).toBe(365);
    expect(daysBetween('2026-03-02', '2026-03-01')).toBe(-1);
  });

  it('numbers weekdays from Sunday', () => {
    expect(weekdayOf('2025-03-09')).toBe(0);
    expect(weekdayOf('2025-03-15')).toBe(6);
  });

  it('knows month lengths including leap years', () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2025, 2)).toBe(28);
    expect(daysInMonth(2025, 12)).toBe(31);
  });

  it('computes the bounds of the containing month', () => {
    expect(monthBounds('2024-02-14')).toEqual({ first: '2024-02-01', last: '2024-02-29' });
    expect(monthBounds('2025-12-01')).toEqual({ first: '2025-12-01', last: '2025-12-31' });
  });

  it('moves a time of day onto another date', () => {
    const offset = timeOfDayMs(new Date('2025-03-03T16:45:00Z'));

    expect(atTimeOfDay('2025-04-10', offset).toISOString()).toBe('2025-04-10T16:45:00.000Z');
  });

  it('pads dates and parses them at UTC midnight', () => {
    expect(formatDate(2026, 3, 5)).toBe('2026-03-05');
    expect(parseDateString('2026-03-05').toISOString()).toBe('2026-03-05T00:00:00.000Z');
  });
});
