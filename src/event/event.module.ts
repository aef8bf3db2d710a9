import { Module } from '@nestjs/common';

import { PupilModule } from '../pupil/pupil.module';
import { EventController } from './event.controller';
import { EventService } from './event.service';

@Module({
  imports: [PupilModule],
  controllers: [EventController],
  providers: [EventService],
})
export class EventModule {}
