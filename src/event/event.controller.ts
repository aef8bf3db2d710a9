import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';

import { CurrentUser } from '../common/decorators/current-user.decorator';
import {
  ApiStandardResponse,
  ApiStandardResponseArray,
} from '../common/decorators/swagger-response.decorator';
import { MessageDto, type MessageResponse } from '../common/dto/message.dto';
import type { EventPupil, EventRecord, EventRepeatDay } from '../database/schema';
import { CreateEventDto, UpdateEventDto } from './dto/create-event.dto';
import {
  AddEventPupilsDto,
  RemoveEventPupilsDto,
  UpdateEventPupilsDto,
} from './dto/event-pupils.dto';
import { DeleteEventQueryDto, EventListQueryDto, UpdateEventQueryDto } from './dto/event-query.dto';
import {
  EventDetailsDto,
  EventOccurrenceDto,
  EventPupilResponseDto,
  RepeatDayResponseDto,
} from './dto/event-response.dto';
import {
  CreateRepeatDaysDto,
  DeleteRepeatDaysDto,
  UpdateRepeatDaysDto,
} from './dto/repeat-days.dto';
import type { EventOccurrence } from './event-occurrences';
import { type EventDetails, EventService } from './event.service';

@ApiTags('events')
@ApiBearerAuth()
@Controller('events')
export class EventController {
  constructor(private readonly eventService: EventService) {}

  @Post()
  @ApiStandardResponse(EventDetailsDto)
  create(
    @CurrentUser('id') userId: number,
    @Body() createEventDto: CreateEventDto,
  ): Promise<EventDetails> {
    return this.eventService.create(userId, createEventDto);
  }

  @Get()
  @ApiStandardResponseArray(EventOccurrenceDto)
  findAll(
    @CurrentUser('id') userId: number,
    @Query() query: EventListQueryDto,
  ): Promise<EventRecord[] | EventOccurrence[]> {
    return this.eventService.findAll(userId, query);
  }

  @Get(':id')
  @ApiStandardResponse(EventDetailsDto)
  findOne(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
  ): Promise<EventDetails> {
    return this.eventService.findDetails(id, userId);
  }

  @Put(':id')
  @ApiStandardResponse(EventDetailsDto)
  update(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Query() query: UpdateEventQueryDto,
    @Body() updateEventDto: UpdateEventDto,
  ): Promise<EventDetails> {
    return this.eventService.update(id, userId, updateEventDto, query.updateFutureOnly === 'true');
  }

  @Delete(':id')
  @ApiStandardResponse(MessageDto)
  remove(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Query() query: DeleteEventQueryDto,
  ): Promise<MessageResponse> {
    return this.eventService.remove(id, userId, query.deleteFutureOnly === 'true');
  }

  @Get(':id/repeat-days')
  @ApiStandardResponseArray(RepeatDayResponseDto)
  findRepeatDays(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
  ): Promise<EventRepeatDay[]> {
    return this.eventService.findRepeatDays(id, userId);
  }

  @Post(':id/repeat-days')
  @ApiStandardResponseArray(RepeatDayResponseDto)
  addRepeatDays(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() body: CreateRepeatDaysDto,
  ): Promise<EventRepeatDay[]> {
    return this.eventService.addRepeatDays(
      id,
      userId,
      body.days.map((day) => day.dayOfWeek),
    );
  }

  @Put(':id/repeat-days')
  @ApiStandardResponseArray(RepeatDayResponseDto)
  updateRepeatDays(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() body: UpdateRepeatDaysDto,
  ): Promise<EventRepeatDay[]> {
    return this.eventService.updateRepeatDays(id, userId, body.days);
  }

  @Delete(':id/repeat-days')
  @HttpCode(HttpStatus.NO_CONTENT)
  removeRepeatDays(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() body: DeleteRepeatDaysDto,
  ): Promise<void> {
    return this.eventService.removeRepeatDays(id, userId, body.ids);
  }

  @Get(':id/pupils')
  @ApiStandardResponseArray(EventPupilResponseDto)
  findPupils(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
  ): Promise<EventPupil[]> {
    return this.eventService.findPupils(id, userId);
  }

  @Post(':id/pupils')
  @ApiStandardResponseArray(EventPupilResponseDto)
  addPupils(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() body: AddEventPupilsDto,
  ): Promise<EventPupil[]> {
    return this.eventService.addPupils(
      id,
      userId,
      body.pupils.map((pupil) => pupil.pupilId),
    );
  }

  @Put(':id/pupils')
  @ApiStandardResponseArray(EventPupilResponseDto)
  updatePupils(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() body: UpdateEventPupilsDto,
  ): Promise<EventPupil[]> {
    return this.eventService.updatePupils(id, userId, body.pupils);
  }

  @Delete(':id/pupils')
  @HttpCode(HttpStatus.NO_CONTENT)
  removePupils(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() body: RemoveEventPupilsDto,
  ): Promise<void> {
    return this.eventService.removePupils(id, userId, body.pupilIds);
  }
}
