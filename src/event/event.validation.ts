import { BadRequestException } from '@nestjs/common';

import { toDateString } from '../common/utils/date.util';
import { DAY_BASED_PATTERNS, type EventType, type RepeatPattern } from '../database/enums';

export interface EventShape {
  eventType: EventType;
  startTime: Date;
  endTime: Date;
  repeatPattern: RepeatPattern | null;
  repeatUntil: string | null;
}

const PATTERN_LABELS: Record<RepeatPattern, string> = {
  weekly: 'Weekly',
  monthly: 'Monthly',
  custom_days: 'Custom days',
};

export function isDayBased(pattern: RepeatPattern | null): boolean {
  return pattern !== null && DAY_BASED_PATTERNS.includes(pattern);
}

/** Sorted, without duplicates. */
export function normalizeRepeatDays(days: readonly number[]): number[] {
  return [...new Set(days)].sort((a, b) => a - b);
}

export function assertRepeatDayRange(days: readonly number[]): void {
  if (days.some((day) => !Number.isInteger(day) || day < 0 || day > 6)) {
    throw new BadRequestException('Repeat days must be between 0 (Sunday) and 6 (Saturday)');
  }
}

/** Day-based events keep at least one repeat day. */
export function assertRepeatDaysPresent(
  pattern: RepeatPattern | null,
  dayCount: number,
): void {
  if (pattern !== null && isDayBased(pattern) && dayCount === 0) {
    throw new BadRequestException(`${PATTERN_LABELS[pattern]} repeat pattern requires repeat days`);
  }
}

export function assertStoresRepeatDays(pattern: RepeatPattern | null): void {
  if (!isDayBased(pattern)) {
    throw new BadRequestException(
      'Repeat days can only be set on weekly and custom days events',
    );
  }
}

/**
 * Checks an event as it would be stored, together with the repeat days it would have.
 *
 * @throws BadRequestException on the first rule the event breaks
 */
export function assertValidEvent(event: EventShape, repeatDays: readonly number[]): void {
  assertRepeatDayRange(repeatDays);

  if (event.startTime.getTime() >= event.endTime.getTime()) {
    throw new BadRequestException('Start time must be before end time');
  }
  if (event.eventType === 'once' && event.repeatPattern !== null) {
    throw new BadRequestException('One-off events cannot have a repeat pattern');
  }
  if (event.eventType === 'repeat' && event.repeatPattern === null) {
    throw new BadRequestException('Repeating events require a repeat pattern');
  }
  assertRepeatDaysPresent(event.repeatPattern, repeatDays.length);
  if (event.repeatUntil !== null && event.repeatUntil < toDateString(event.startTime)) {
    throw new BadRequestException('Repeat until date cannot be before the start date');
  }
}
