import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { GENDERS } from '../../database/enums';

export const CreatePupilSchema = z.object({
  fullName: z.string().trim().min(1).max(255),
  email: z.email().max(320).nullish(),
  mobile: z.string().trim().min(1).max(15),
  fatherName: z.string().trim().min(1).max(255),
  motherName: z.string().trim().min(1).max(255),
  dateOfBirth: z.iso.date(),
  gender: z.enum(GENDERS),
  enrolledOn: z.iso.date(),
});

export class CreatePupilDto extends createZodDto(CreatePupilSchema) {}
