import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { EVENT_TYPES, REPEAT_PATTERNS } from '../../database/enums';

export const EventResponseSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  eventType: z.enum(EVENT_TYPES),
  startTime: z.iso.datetime(),
  endTime: z.iso.datetime(),
  repeatPattern: z.enum(REPEAT_PATTERNS).nullable(),
  repeatUntil: z.iso.date().nullable(),
  ownerId: z.number().int(),
  createdAt: z.iso.datetime(),
  updatedAt: z.iso.datetime(),
});

export class EventResponseDto extends createZodDto(EventResponseSchema) {}

export const EventDetailsSchema = EventResponseSchema.extend({
  repeatDays: z.array(z.number().int()),
});

export class EventDetailsDto extends createZodDto(EventDetailsSchema) {}

export const EventOccurrenceSchema = EventResponseSchema.extend({
  isRepeatInstance: z.boolean(),
  originalDate: z.iso.date(),
  instanceDate: z.iso.date().optional(),
});

export class EventOccurrenceDto extends createZodDto(EventOccurrenceSchema) {}

export const RepeatDayResponseSchema = z.object({
  id: z.number().int(),
  eventId: z.number().int(),
  dayOfWeek: z.number().int(),
});

export class RepeatDayResponseDto extends createZodDto(RepeatDayResponseSchema) {}

export const EventPupilResponseSchema = z.object({
  id: z.number().int(),
  eventId: z.number().int(),
  pupilId: z.number().int(),
  addedAt: z.iso.datetime(),
});

export class EventPupilResponseDto extends createZodDto(EventPupilResponseSchema) {}
