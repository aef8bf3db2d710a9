import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { BooleanQuerySchema } from '../../common/dto/pagination.dto';
import { EVENT_TYPES } from '../../database/enums';

export const EventListQuerySchema = z.object({
  startDate: z.iso.date().optional(),
  endDate: z.iso.date().optional(),
  eventType: z.enum(EVENT_TYPES).optional(),
  includeRepeats: BooleanQuerySchema.default('true'),
});

export class EventListQueryDto extends createZodDto(EventListQuerySchema) {}

export const UpdateEventQuerySchema = z.object({
  updateFutureOnly: BooleanQuerySchema.default('false'),
});

export class UpdateEventQueryDto extends createZodDto(UpdateEventQuerySchema) {}

export const DeleteEventQuerySchema = z.object({
  deleteFutureOnly: BooleanQuerySchema.default('false'),
});

export class DeleteEventQueryDto extends createZodDto(DeleteEventQuerySchema) {}
