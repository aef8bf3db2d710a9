import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { PAYMENT_MODES } from '../../database/enums';

export const CreatePaymentSchema = z.object({
  pupilId: z.number().int().positive(),
  // numeric(10, 2)
  amount: z.number().positive().multipleOf(0.01).max(99_999_999.99),
  month: z.number().int().min(1).max(12),
  year: z.number().int().min(1900),
  paymentDate: z.iso.date(),
  paymentMode: z.enum(PAYMENT_MODES),
  notes: z.string().nullish(),
});

export class CreatePaymentDto extends createZodDto(CreatePaymentSchema) {}

export const UpdatePaymentSchema = CreatePaymentSchema.omit({ pupilId: true }).partial();

export class UpdatePaymentDto extends createZodDto(UpdatePaymentSchema) {}
