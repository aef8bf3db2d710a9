import { Module } from '@nestjs/common';

import { PupilModule } from '../pupil/pupil.module';
import { PaymentController } from './payment.controller';
import { PaymentService } from './payment.service';

@Module({
  imports: [PupilModule],
  controllers: [PaymentController],
  providers: [PaymentService],
})
export class PaymentModule {}
