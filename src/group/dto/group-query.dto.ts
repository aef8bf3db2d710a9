import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const GroupSearchQuerySchema = z.object({
  name: z.string().trim().max(255).optional(),
});

export class GroupSearchQueryDto extends createZodDto(GroupSearchQuerySchema) {}
