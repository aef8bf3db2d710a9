import { BadRequestException } from '@nestjs/common';

import {
  type EventShape,
  assertRepeatDaysPresent,
  assertStoresRepeatDays,
  assertValidEvent,
  isDayBased,
  normalizeRepeatDays,
} from './event.validation';

const weekly: EventShape = {
  eventType: 'repeat',
  startTime: new Date('2026-03-02T16:00:00.000Z'),
  endTime: new Date('2026-03-02T17:00:00.000Z'),
  repeatPattern: 'weekly',
  repeatUntil: null,
};

describe('assertValidEvent', () => {
  it('accepts a weekly event with repeat days', () => {
    expect(() => assertValidEvent(weekly, [1, 3])).not.toThrow();
  });

  it('accepts a monthly event without repeat days', () => {
    expect(() => assertValidEvent({ ...weekly, repeatPattern: 'monthly' }, [])).not.toThrow();
  });

  it('rejects weekdays outside 0..6', () => {
    expect(() => assertValidEvent(weekly, [1, 7])).toThrow(
      new BadRequestException('Repeat days must be between 0 (Sunday) and 6 (Saturday)'),
    );
    expect(() => assertValidEvent(weekly, [-1])).toThrow(
      'Repeat days must be between 0 (Sunday) and 6 (Saturday)',
    );
  });

  it('rejects an end time that is not after the start', () => {
    expect(() => assertValidEvent({ ...weekly, endTime: weekly.startTime }, [1])).toThrow(
      'Start time must be before end time',
    );
  });

  it('requires the event type and pattern to agree', () => {
    expect(() => assertValidEvent({ ...weekly, eventType: 'once' }, [1])).toThrow(
      'One-off events cannot have a repeat pattern',
    );
    expect(() => assertValidEvent({ ...weekly, repeatPattern: null }, [])).toThrow(
      'Repeating events require a repeat pattern',
    );
  });

  it('requires repeat days for day-based patterns', () => {
    expect(() => assertValidEvent(weekly, [])).toThrow(
      'Weekly repeat pattern requires repeat days',
    );
    expect(() => assertValidEvent({ ...weekly, repeatPattern: 'custom_days' }, [])).toThrow(
      'Custom days repeat pattern requires repeat days',
    );
  });

  it('rejects a repeatUntil before the start date', () => {
    expect(() => assertValidEvent({ ...weekly, repeatUntil: '2026-03-01' }, [1])).toThrow(
      'Repeat until date cannot be before the start date',
    );
    expect(() => assertValidEvent({ ...weekly, repeatUntil: '2026-03-02' }, [1])).not.toThrow();
  });
});

describe('normalizeRepeatDays', () => {
  it('sorts and removes duplicates', () => {
    expect(normalizeRepeatDays([5, 1, 5, 3])).toEqual([1, 3, 5]);
  });
});

describe('isDayBased', () => {
  it('is true for weekly and custom_days only', () => {
    expect(isDayBased('weekly')).toBe(true);
    expect(isDayBased('custom_days')).toBe(true);
    expect(isDayBased('monthly')).toBe(false);
    expect(isDayBased(null)).toBe(false);
  });

  it('keeps at least one repeat day on day-based events', () => {
    expect(() => assertRepeatDaysPresent('custom_days', 0)).toThrow(
      'Custom days repeat pattern requires repeat days',
    );
    expect(() => assertRepeatDaysPresent('weekly', 1)).not.toThrow();
    expect(() => assertRepeatDaysPresent('monthly', 0)).not.toThrow();
    expect(() => assertRepeatDaysPresent(null, 0)).not.toThrow();
  });

  it('stores repeat days only for weekly and custom days events', () => {
    expect(() => assertStoresRepeatDays('weekly')).not.toThrow();
    expect(() => assertStoresRepeatDays('custom_days')).not.toThrow();
    expect(() => assertStoresRepeatDays('monthly')).toThrow(
      'Repeat days can only be set on weekly and custom days events',
    );
    expect(() => assertStoresRepeatDays(null)).toThrow(BadRequestException);
  });
});
