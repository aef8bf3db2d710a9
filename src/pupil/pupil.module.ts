import { Module } from '@nestjs/common';

import { PupilController } from './pupil.controller';
import { PupilService } from './pupil.service';

@Module({
  controllers: [PupilController],
  providers: [PupilService],
  exports: [PupilService],
})
export class PupilModule {}
