import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const PaginationSchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export class PaginationDto extends createZodDto(PaginationSchema) {}

/** Query-string booleans arrive as text; controllers compare against 'true'/'false'. */
export const BooleanQuerySchema = z.enum(['true', 'false']);
