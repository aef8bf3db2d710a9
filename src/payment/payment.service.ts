import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { and, asc, eq, getTableColumns } from 'drizzle-orm';

import type { MessageResponse } from '../common/dto/message.dto';
import { assertOwnership } from '../common/utils/ownership.util';
import { DRIZZLE, type Database } from '../database/database.constants';
import { type NewPayment, type Payment, payments, pupils } from '../database/schema';
import { PupilService } from '../pupil/pupil.service';
import { CreatePaymentDto, UpdatePaymentDto } from './dto/create-payment.dto';
import { PaymentListQueryDto } from './dto/payment-query.dto';

const paymentColumns = getTableColumns(payments);

/** Amounts are stored as `numeric(10, 2)` text. */
function toAmount(value: number): string {
  return value.toFixed(2);
}

@Injectable()
export class PaymentService {
  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
    private readonly pupilService: PupilService,
  ) {}

  async create(ownerId: number, createPaymentDto: CreatePaymentDto): Promise<Payment> {
    await this.pupilService.findOne(createPaymentDto.pupilId, ownerId);

    const [payment] = await this.db
      .insert(payments)
      .values({
        ...createPaymentDto,
        amount: toAmount(createPaymentDto.amount),
        notes: createPaymentDto.notes ?? null,
      })
      .returning();
    return payment;
  }

  findAll(ownerId: number, query: PaymentListQueryDto): Promise<Payment[]> {
    return this.db
      .select(paymentColumns)
      .from(payments)
      .innerJoin(pupils, eq(payments.pupilId, pupils.id))
      .where(
        and(
          eq(pupils.ownerId, ownerId),
          query.pupilId !== undefined ? eq(payments.pupilId, query.pupilId) : undefined,
          query.month !== undefined ? eq(payments.month, query.month) : undefined,
          query.year !== undefined ? eq(payments.year, query.year) : undefined,
        ),
      )
      .orderBy(asc(payments.id))
      .offset(query.skip)
      .limit(query.limit);
  }

  async findOne(id: number, ownerId: number, action = 'access'): Promise<Payment> {
    const [row] = await this.db
      .select({ payment: paymentColumns, ownerId: pupils.ownerId })
      .from(payments)
      .innerJoin(pupils, eq(payments.pupilId, pupils.id))
      .where(eq(payments.id, id));
    return assertOwnership(row, ownerId, 'Payment', action).payment;
  }

  async update(id: number, ownerId: number, updatePaymentDto: UpdatePaymentDto): Promise<Payment> {
    const payment = await this.findOne(id, ownerId, 'update');

    const { amount, ...rest } = updatePaymentDto;
    const values: Partial<NewPayment> = { ...rest };
    if (amount !== undefined) values.amount = toAmount(amount);
    if (Object.keys(values).length === 0) {
      return payment;
    }

    const [updated] = await this.db
      .update(payments)
      .set(values)
      .where(eq(payments.id, id))
      .returning();
    return updated;
  }

  async remove(id: number, ownerId: number): Promise<MessageResponse> {
    await this.findOne(id, ownerId, 'delete');
    await this.db.delete(payments).where(eq(payments.id, id));
    return { message: 'Payment deleted successfully' };
  }

  async findByPupil(
    pupilId: number,
    ownerId: number,
    skip: number,
    limit: number,
  ): Promise<Payment[]> {
    await this.pupilService.findOne(pupilId, ownerId);
    return this.db
      .select()
      .from(payments)
      .where(eq(payments.pupilId, pupilId))
      .orderBy(asc(payments.id))
      .offset(skip)
      .limit(limit);
  }

  async findByPupilAndMonth(
    pupilId: number,
    ownerId: number,
    year: number,
    month: number,
  ): Promise<Payment[]> {
    if (month < 1 || month > 12) {
      throw new BadRequestException('Month must be between 1 and 12');
    }
    if (year < 1900) {
      throw new BadRequestException('Year must be 1900 or later');
    }

    await this.pupilService.findOne(pupilId, ownerId);
    return this.db
      .select()
      .from(payments)
      .where(and(eq(payments.pupilId, pupilId), eq(payments.year, year), eq(payments.month, month)))
      .orderBy(asc(payments.id));
  }
}
