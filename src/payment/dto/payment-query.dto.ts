import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { PaginationSchema } from '../../common/dto/pagination.dto';

export const PaymentListQuerySchema = PaginationSchema.extend({
  pupilId: z.coerce.number().int().positive().optional(),
  month: z.coerce.number().int().min(1).max(12).optional(),
  year: z.coerce.number().int().min(1900).optional(),
});

export class PaymentListQueryDto extends createZodDto(PaymentListQuerySchema) {}
