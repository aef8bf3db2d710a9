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
import { PaginationDto } from '../common/dto/pagination.dto';
import type { Group, PupilGroupMembership } from '../database/schema';
import { CreateGroupDto } from './dto/create-group.dto';
import { AddMembersDto, SyncMembersDto } from './dto/group-members.dto';
import { GroupSearchQueryDto } from './dto/group-query.dto';
import { GroupResponseDto, MembershipResponseDto } from './dto/group-response.dto';
import { UpdateGroupDto } from './dto/update-group.dto';
import { GroupService } from './group.service';

@ApiTags('groups')
@ApiBearerAuth()
@Controller('groups')
export class GroupController {
  constructor(private readonly groupService: GroupService) {}

  @Post()
  @ApiStandardResponse(GroupResponseDto)
  create(
    @CurrentUser('id') userId: number,
    @Body() createGroupDto: CreateGroupDto,
  ): Promise<Group> {
    return this.groupService.create(userId, createGroupDto);
  }

  @Get()
  @ApiStandardResponseArray(GroupResponseDto)
  findAll(@CurrentUser('id') userId: number, @Query() query: PaginationDto): Promise<Group[]> {
    return this.groupService.findAll(userId, query.skip, query.limit);
  }

  @Get('search')
  @ApiStandardResponseArray(GroupResponseDto)
  search(@CurrentUser('id') userId: number, @Query() query: GroupSearchQueryDto): Promise<Group[]> {
    return this.groupService.search(userId, query.name);
  }

  @Get(':id')
  @ApiStandardResponse(GroupResponseDto)
  findOne(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
  ): Promise<Group> {
    return this.groupService.findOne(id, userId);
  }

  @Put(':id')
  @ApiStandardResponse(GroupResponseDto)
  update(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() updateGroupDto: UpdateGroupDto,
  ): Promise<Group> {
    return this.groupService.update(id, userId, updateGroupDto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id', ParseIntPipe) id: number, @CurrentUser('id') userId: number): Promise<void> {
    return this.groupService.remove(id, userId);
  }

  @Post(':id/members')
  @ApiStandardResponseArray(MembershipResponseDto)
  addMembers(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() body: AddMembersDto,
  ): Promise<PupilGroupMembership[]> {
    return this.groupService.addMembers(
      id,
      userId,
      body.members.map((member) => member.pupilId),
    );
  }

  @Put(':id/members')
  @ApiStandardResponseArray(MembershipResponseDto)
  syncMembers(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
    @Body() body: SyncMembersDto,
  ): Promise<PupilGroupMembership[]> {
    return this.groupService.syncMembers(
      id,
      userId,
      body.members.map((member) => member.pupilId),
    );
  }

  @Get(':id/members')
  @ApiStandardResponseArray(MembershipResponseDto)
  findMembers(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser('id') userId: number,
  ): Promise<PupilGroupMembership[]> {
    return this.groupService.findMembers(id, userId);
  }

  @Get(':id/members/:pupilId')
  @ApiStandardResponse(MembershipResponseDto)
  findMember(
    @Param('id', ParseIntPipe) id: number,
    @Param('pupilId', ParseIntPipe) pupilId: number,
    @CurrentUser('id') userId: number,
  ): Promise<PupilGroupMembership> {
    return this.groupService.findMember(id, pupilId, userId);
  }

  @Delete(':id/members/:pupilId')
  @HttpCode(HttpStatus.NO_CONTENT)
  removeMember(
    @Param('id', ParseIntPipe) id: number,
    @Param('pupilId', ParseIntPipe) pupilId: number,
    @CurrentUser('id') userId: number,
  ): Promise<void> {
    return this.groupService.removeMember(id, pupilId, userId);
  }
}
