import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Patch,
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
import type { Pupil } from '../database/schema';
import { CreatePupilDto } from './dto/create-pupil.dto';
import { GenderParamDto, PupilListQueryDto, PupilNameQueryDto } from './dto/pupil-query.dto';
import { PupilCountDto, PupilResponseDto } from './dto/pupil-response.dto';
import { UpdatePupilDto } from './dto/update-pupil.dto';
import { PupilService } from './pupil.service';

@ApiTags('pupils')
@ApiBearerAuth()
@Controller('pupils')
export class PupilController {
  constructor(private readonly pupilService: PupilService) {}

  @Post()
  @ApiStandardResponse(PupilResponseDto)
  create(
    @CurrentUser('id') userId: number,
    @Body() createPupilDto: CreatePupilDto,
  ): Promise<Pupil> {
    return this.pupilService.create(userId, createPupilDto);
  }

  @Get()
  @ApiStandardResponseArray(PupilResponseDto)
  findAll(@CurrentUser('id') userId: number, @Query() query: PupilListQueryDto): Promise<Pupil[]> {
    return this.pupilService.findAll(userId, query.skip, query.limit, query.search);
  }

  // Literal paths are declared before ':id' so they are not captured by it.
  @Get('search/by-name')
  @ApiStandardResponseArray(PupilResponseDto)
  searchByName(
    @CurrentUser('id') userId: number,
    @Query() query: PupilNameQueryDto,
  ): Promise<Pupil[]> {
    return this.pupilService.searchByName(userId, query.name);
  }

  @Get('filter/by-gender/:gender')
  @ApiStandardResponseArray(PupilResponseDto)
  findByGender(
    @CurrentUser('id') userId: number,
    @Param() params: GenderParamDto,
  ): Promise<Pupil[]> {
    return this.pupilService.findByGender(userId, params.gender);
  }

  @Get('count/total')
  @ApiStandardResponse(PupilCountDto)
  countAll(@CurrentUser('id') userId: number): Promise<{ totalPupils: number }> {
    return this.pupilService.countAll(userId);
  }

  @Get(':id')
  @ApiStandardResponse(PupilResponseDto)
  findOne(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
  ): Promise<Pupil> {
    return this.pupilService.findOne(id, userId);
  }

  @Put(':id')
  @ApiStandardResponse(PupilResponseDto)
  replace(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() updatePupilDto: UpdatePupilDto,
  ): Promise<Pupil> {
    return this.pupilService.update(id, userId, updatePupilDto);
  }

  @Patch(':id')
  @ApiStandardResponse(PupilResponseDto)
  update(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() updatePupilDto: UpdatePupilDto,
  ): Promise<Pupil> {
    return this.pupilService.update(id, userId, updatePupilDto);
  }

  @Delete(':id')
  @ApiStandardResponse(MessageDto)
  remove(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
  ): Promise<MessageResponse> {
    return this.pupilService.remove(id, userId);
  }
}
