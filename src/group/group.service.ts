import { BadRequestException, Inject, Injectable, NotFoundException } from '@nestjs/common';
import { and, asc, eq, ilike, inArray, notInArray } from 'drizzle-orm';

import { assertOwnership, formatIds } from '../common/utils/ownership.util';
import { containsPattern } from '../common/utils/search.util';
import { DRIZZLE, type Database } from '../database/database.constants';
import {
  type Group,
  type PupilGroupMembership,
  groups,
  pupilGroupMemberships,
} from '../database/schema';
import { PupilService } from '../pupil/pupil.service';
import { CreateGroupDto } from './dto/create-group.dto';
import { UpdateGroupDto } from './dto/update-group.dto';

@Injectable()
export class GroupService {
  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
    private readonly pupilService: PupilService,
  ) {}

  async create(ownerId: number, createGroupDto: CreateGroupDto): Promise<Group> {
    const [group] = await this.db
      .insert(groups)
      .values({
        name: createGroupDto.name,
        description: createGroupDto.description ?? null,
        ownerId,
      })
      .returning();
    return group;
  }

  findAll(ownerId: number, skip: number, limit: number): Promise<Group[]> {
    return this.db
      .select()
      .from(groups)
      .where(eq(groups.ownerId, ownerId))
      .orderBy(asc(groups.id))
      .offset(skip)
      .limit(limit);
  }

  search(ownerId: number, name?: string): Promise<Group[]> {
    return this.db
      .select()
      .from(groups)
      .where(
        and(
          eq(groups.ownerId, ownerId),
          name ? ilike(groups.name, containsPattern(name)) : undefined,
        ),
      )
      .orderBy(asc(groups.id));
  }

  async findOne(id: number, ownerId: number, action = 'access'): Promise<Group> {
    const [group] = await this.db.select().from(groups).where(eq(groups.id, id));
    return assertOwnership(group, ownerId, 'Group', action);
  }

  async update(id: number, ownerId: number, updateGroupDto: UpdateGroupDto): Promise<Group> {
    const group = await this.findOne(id, ownerId, 'update');
    if (Object.keys(updateGroupDto).length === 0) {
      return group;
    }

    const [updated] = await this.db
      .update(groups)
      .set(updateGroupDto)
      .where(eq(groups.id, id))
      .returning();
    return updated;
  }

  async remove(id: number, ownerId: number): Promise<void> {
    await this.findOne(id, ownerId, 'delete');
    await this.db.delete(groups).where(eq(groups.id, id));
  }

  async addMembers(
    groupId: number,
    ownerId: number,
    pupilIds: readonly number[],
  ): Promise<PupilGroupMembership[]> {
    await this.findOne(groupId, ownerId, 'modify');
    const ids = [...new Set(pupilIds)];

    return this.db.transaction(async (tx) => {
      await this.pupilService.assertOwnedPupils(ids, ownerId, tx);

      const existing = await tx
        .select({ pupilId: pupilGroupMemberships.pupilId })
        .from(pupilGroupMemberships)
        .where(
          and(
            eq(pupilGroupMemberships.groupId, groupId),
            inArray(pupilGroupMemberships.pupilId, ids),
          ),
        )
        .orderBy(asc(pupilGroupMemberships.pupilId));
      if (existing.length > 0) {
        const taken = formatIds(existing.map((row) => row.pupilId));
        throw new BadRequestException(`Pupils with IDs ${taken} are already members of this group`);
      }

      return tx
        .insert(pupilGroupMemberships)
        .values(ids.map((pupilId) => ({ pupilId, groupId })))
        .returning();
    });
  }

  /** Makes the membership exactly `pupilIds`: absent pupils are removed, new ones added. */
  async syncMembers(
    groupId: number,
    ownerId: number,
    pupilIds: readonly number[],
  ): Promise<PupilGroupMembership[]> {
    await this.findOne(groupId, ownerId, 'modify');
    const ids = [...new Set(pupilIds)];

    return this.db.transaction(async (tx) => {
      await this.pupilService.assertOwnedPupils(ids, ownerId, tx);

      await tx
        .delete(pupilGroupMemberships)
        .where(
          and(
            eq(pupilGroupMemberships.groupId, groupId),
            ids.length > 0 ? notInArray(pupilGroupMemberships.pupilId, ids) : undefined,
          ),
        );

      if (ids.length > 0) {
        await tx
          .insert(pupilGroupMemberships)
          .values(ids.map((pupilId) => ({ pupilId, groupId })))
          .onConflictDoNothing({
            target: [pupilGroupMemberships.pupilId, pupilGroupMemberships.groupId],
          });
      }

      return tx
        .select()
        .from(pupilGroupMemberships)
        .where(eq(pupilGroupMemberships.groupId, groupId))
        .orderBy(asc(pupilGroupMemberships.id));
    });
  }

  async findMembers(groupId: number, ownerId: number): Promise<PupilGroupMembership[]> {
    await this.findOne(groupId, ownerId);
    return this.db
      .select()
      .from(pupilGroupMemberships)
      .where(eq(pupilGroupMemberships.groupId, groupId))
      .orderBy(asc(pupilGroupMemberships.id));
  }

  async findMember(
    groupId: number,
    pupilId: number,
    ownerId: number,
  ): Promise<PupilGroupMembership> {
    await this.findOne(groupId, ownerId);
    return this.getMembership(groupId, pupilId);
  }

  async removeMember(groupId: number, pupilId: number, ownerId: number): Promise<void> {
    await this.findOne(groupId, ownerId, 'modify');
    const membership = await this.getMembership(groupId, pupilId);
    await this.db.delete(pupilGroupMemberships).where(eq(pupilGroupMemberships.id, membership.id));
  }

  private async getMembership(groupId: number, pupilId: number): Promise<PupilGroupMembership> {
    const [membership] = await this.db
      .select()
      .from(pupilGroupMemberships)
      .where(
        and(eq(pupilGroupMemberships.groupId, groupId), eq(pupilGroupMemberships.pupilId, pupilId)),
      );
    if (!membership) throw new NotFoundException('Membership not found');
    return membership;
  }
}
