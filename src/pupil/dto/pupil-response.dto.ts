import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { GENDERS } from '../../database/enums';

export const PupilResponseSchema = z.object({
  id: z.number().int(),
  fullName: z.string(),
  email: z.string().nullable(),
  mobile: z.string(),
  fatherName: z.string(),
  motherName: z.string(),
  dateOfBirth: z.iso.date(),
  gender: z.enum(GENDERS),
  enrolledOn: z.iso.date(),
  ownerId: z.number().int(),
  createdAt: z.iso.datetime(),
  updatedAt: z.iso.datetime(),
});

export class PupilResponseDto extends createZodDto(PupilResponseSchema) {}

export const PupilCountSchema = z.object({
  totalPupils: z.number().int(),
});

export class PupilCountDto extends createZodDto(PupilCountSchema) {}
