import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { PaginationSchema } from '../../common/dto/pagination.dto';
import { GENDERS } from '../../database/enums';

export const PupilListQuerySchema = PaginationSchema.extend({
  search: z.string().trim().max(255).optional(),
});

export class PupilListQueryDto extends createZodDto(PupilListQuerySchema) {}

export const PupilNameQuerySchema = z.object({
  name: z.string().trim().min(2).max(255),
});

export class PupilNameQueryDto extends createZodDto(PupilNameQuerySchema) {}

export const GenderParamSchema = z.object({
  gender: z.enum(GENDERS),
});

export class GenderParamDto extends createZodDto(GenderParamSchema) {}
