import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const HealthSchema = z.object({
  status: z.literal('ok'),
  database: z.literal('up'),
  timestamp: z.iso.datetime(),
});

export type HealthStatus = z.infer<typeof HealthSchema>;

export class HealthDto extends createZodDto(HealthSchema) {}
