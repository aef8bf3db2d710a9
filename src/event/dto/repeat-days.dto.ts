import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

const IdSchema = z.number().int().positive();

export const CreateRepeatDaysSchema = z.object({
  days: z.array(z.object({ dayOfWeek: z.number().int() })).min(1),
});

export class CreateRepeatDaysDto extends createZodDto(CreateRepeatDaysSchema) {}

export const UpdateRepeatDaysSchema = z.object({
  days: z.array(z.object({ id: IdSchema, dayOfWeek: z.number().int() })).min(1),
});

export class UpdateRepeatDaysDto extends createZodDto(UpdateRepeatDaysSchema) {}

export const DeleteRepeatDaysSchema = z.object({
  ids: z.array(IdSchema).min(1),
});

export class DeleteRepeatDaysDto extends createZodDto(DeleteRepeatDaysSchema) {}
