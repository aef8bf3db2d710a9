import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { EVENT_TYPES, REPEAT_PATTERNS } from '../../database/enums';

export const EventFieldsSchema = z.object({
  title: z.string().trim().min(1).max(255),
  description: z.string().nullish(),
  eventType: z.enum(EVENT_TYPES),
  startTime: z.iso.datetime({ offset: true }),
  endTime: z.iso.datetime({ offset: true }),
  repeatPattern: z.enum(REPEAT_PATTERNS).nullish(),
  repeatUntil: z.iso.date().nullish(),
});

// Day range is checked by the service so the error names the allowed weekdays.
const RepeatDaysSchema = z.array(z.number().int());

export const CreateEventSchema = EventFieldsSchema.extend({
  repeatDays: RepeatDaysSchema.optional(),
});

export class CreateEventDto extends createZodDto(CreateEventSchema) {}

export const UpdateEventSchema = EventFieldsSchema.partial().extend({
  repeatDays: RepeatDaysSchema.optional(),
});

export class UpdateEventDto extends createZodDto(UpdateEventSchema) {}
