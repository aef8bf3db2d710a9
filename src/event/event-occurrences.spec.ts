import type { EventRecord } from '../database/schema';
import { compareByStartTime, expandOccurrences } from './event-occurrences';

// 2026-03-02 is a Monday.
function makeEvent(overrides: Partial<EventRecord> = {}): EventRecord {
  return {
    id: 1,
    title: 'Algebra',
    description: null,
    eventType: 'repeat',
    startTime: new Date('2026-03-02T16:00:00.000Z'),
    endTime: new Date('2026-03-02T17:30:00.000Z'),
    repeatPattern: 'weekly',
    repeatUntil: null,
    ownerId: 1,
    createdAt: new Date('2026-02-01T00:00:00.000Z'),
    updatedAt: new Date('2026-02-01T00:00:00.000Z'),
    ...overrides,
  };
}

const march = { from: '2026-03-01', to: '2026-03-31' };

describe('expandOccurrences', () => {
  describe('one-off events', () => {
    const once = makeEvent({ eventType: 'once', repeatPattern: null });

    it('yields the event itself when it starts inside the range', () => {
      expect(expandOccurrences(once, [], march)).toEqual([
        { ...once, isRepeatInstance: false, originalDate: '2026-03-02' },
      ]);
    });

    it('yields nothing outside the range', () => {
      expect(expandOccurrences(once, [], { from: '2026-04-01', to: '2026-04-30' })).toEqual([]);
    });
  });

  describe('weekly events', () => {
    it('repeats on each stored weekday from the start date', () => {
      const occurrences = expandOccurrences(makeEvent(), [1, 3], {
        from: '2026-03-01',
        to: '2026-03-14',
      });

      expect(occurrences.map((o) => o.instanceDate)).toEqual([
        '2026-03-02',
        '2026-03-04',
        '2026-03-09',
        '2026-03-11',
      ]);
      expect(occurrences[1]).toMatchObject({
        id: 1,
        isRepeatInstance: true,
        originalDate: '2026-03-02',
        startTime: new Date('2026-03-04T16:00:00.000Z'),
        endTime: new Date('2026-03-04T17:30:00.000Z'),
      });
    });

    it('orders dates from several weekdays across a year boundary', () => {
      const occurrences = expandOccurrences(makeEvent(), [5, 0, 3], {
        from: '2026-12-28',
        to: '2027-01-06',
      });

      expect(occurrences.map((o) => o.instanceDate)).toEqual([
        '2026-12-30',
        '2027-01-01',
        '2027-01-03',
        '2027-01-06',
      ]);
    });

    it('falls back to the weekday of the start date', () => {
      const occurrences = expandOccurrences(makeEvent(), [], {
        from: '2026-03-01',
        to: '2026-03-20',
      });

      expect(occurrences.map((o) => o.instanceDate)).toEqual([
        '2026-03-02',
        '2026-03-09',
        '2026-03-16',
      ]);
    });

    it('stops at repeatUntil', () => {
      const event = makeEvent({ repeatUntil: '2026-03-10' });
      const occurrences = expandOccurrences(event, [1, 3], march);

      expect(occurrences.map((o) => o.instanceDate)).toEqual([
        '2026-03-02',
        '2026-03-04',
        '2026-03-09',
      ]);
    });

    it('yields nothing when the series ended before the range', () => {
      expect(expandOccurrences(makeEvent({ repeatUntil: '2026-02-20' }), [1], march)).toEqual([]);
    });

    it('keeps the duration of sessions that run past midnight', () => {
      const late = makeEvent({
        startTime: new Date('2026-03-02T23:00:00.000Z'),
        endTime: new Date('2026-03-03T00:30:00.000Z'),
      });

      const [occurrence] = expandOccurrences(late, [1], { from: '2026-03-08', to: '2026-03-10' });

      expect(occurrence.instanceDate).toBe('2026-03-09');
      expect(occurrence.startTime).toEqual(new Date('2026-03-09T23:00:00.000Z'));
      expect(occurrence.endTime).toEqual(new Date('2026-03-10T00:30:00.000Z'));
    });
  });

  it('treats custom_days like weekly', () => {
    const occurrences = expandOccurrences(makeEvent({ repeatPattern: 'custom_days' }), [5], {
      from: '2026-03-01',
      to: '2026-03-14',
    });

    expect(occurrences.map((o) => o.instanceDate)).toEqual(['2026-03-06', '2026-03-13']);
  });

  describe('monthly events', () => {
    it('skips months that lack the day of month', () => {
      const monthly = makeEvent({
        repeatPattern: 'monthly',
        startTime: new Date('2026-01-31T09:00:00.000Z'),
        endTime: new Date('2026-01-31T10:00:00.000Z'),
      });

      const occurrences = expandOccurrences(monthly, [], { from: '2026-01-01', to: '2026-05-31' });

      expect(occurrences.map((o) => o.instanceDate)).toEqual([
        '2026-01-31',
        '2026-03-31',
        '2026-05-31',
      ]);
      expect(occurrences[2].startTime).toEqual(new Date('2026-05-31T09:00:00.000Z'));
    });

    it('does not produce dates before the start of the series', () => {
      const monthly = makeEvent({
        repeatPattern: 'monthly',
        startTime: new Date('2026-03-15T09:00:00.000Z'),
        endTime: new Date('2026-03-15T10:00:00.000Z'),
      });

      const occurrences = expandOccurrences(monthly, [], { from: '2026-02-01', to: '2026-04-30' });

      expect(occurrences.map((o) => o.instanceDate)).toEqual(['2026-03-15', '2026-04-15']);
    });
  });
});

describe('compareByStartTime', () => {
  it('orders occurrences of different events chronologically', () => {
    const weekly = expandOccurrences(makeEvent(), [1], { from: '2026-03-01', to: '2026-03-10' });
    const once = expandOccurrences(
      makeEvent({
        id: 2,
        eventType: 'once',
        repeatPattern: null,
        startTime: new Date('2026-03-05T08:00:00.000Z'),
        endTime: new Date('2026-03-05T09:00:00.000Z'),
      }),
      [],
      { from: '2026-03-01', to: '2026-03-10' },
    );

    const sorted = [...weekly, ...once].sort(compareByStartTime);

    expect(sorted.map((o) => [o.id, o.startTime.toISOString()])).toEqual([
      [1, '2026-03-02T16:00:00.000Z'],
      [2, '2026-03-05T08:00:00.000Z'],
      [1, '2026-03-09T16:00:00.000Z'],
    ]);
  });
});
