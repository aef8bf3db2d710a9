import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

const IdSchema = z.number().int().positive();

export const AddEventPupilsSchema = z.object({
  pupils: z.array(z.object({ pupilId: IdSchema })).min(1),
});

export class AddEventPupilsDto extends createZodDto(AddEventPupilsSchema) {}

export const UpdateEventPupilsSchema = z.object({
  pupils: z.array(z.object({ id: IdSchema, pupilId: IdSchema })).min(1),
});

export class UpdateEventPupilsDto extends createZodDto(UpdateEventPupilsSchema) {}

export const RemoveEventPupilsSchema = z.object({
  pupilIds: z.array(IdSchema).min(1),
});

export class RemoveEventPupilsDto extends createZodDto(RemoveEventPupilsSchema) {}
