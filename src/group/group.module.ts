import { Module } from '@nestjs/common';

import { PupilModule } from '../pupil/pupil.module';
import { GroupController } from './group.controller';
import { GroupService } from './group.service';

@Module({
  imports: [PupilModule],
  controllers: [GroupController],
  providers: [GroupService],
})
export class GroupModule {}
