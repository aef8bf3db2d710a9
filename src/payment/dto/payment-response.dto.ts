import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { PAYMENT_MODES } from '../../database/enums';

export const PaymentResponseSchema = z.object({
  id: z.number().int(),
  pupilId: z.number().int(),
  amount: z.string().meta({ example: '1500.00' }),
  month: z.number().int(),
  year: z.number().int(),
  paymentDate: z.iso.date(),
  paymentMode: z.enum(PAYMENT_MODES),
  notes: z.string().nullable(),
  createdAt: z.iso.datetime(),
});

export class PaymentResponseDto extends createZodDto(PaymentResponseSchema) {}
