import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { and, asc, count, eq, ilike, inArray, or } from 'drizzle-orm';

import type { MessageResponse } from '../common/dto/message.dto';
import { assertOwnership, formatIds } from '../common/utils/ownership.util';
import { containsPattern } from '../common/utils/search.util';
import { DRIZZLE, type Database, type Executor } from '../database/database.constants';
import type { Gender } from '../database/enums';
import { type NewPupil, type Pupil, pupils } from '../database/schema';
import { CreatePupilDto } from './dto/create-pupil.dto';
import { UpdatePupilDto } from './dto/update-pupil.dto';

@Injectable()
export class PupilService {
  constructor(@Inject(DRIZZLE) private readonly db: Database) {}

  async create(ownerId: number, createPupilDto: CreatePupilDto): Promise<Pupil> {
    const [pupil] = await this.db
      .insert(pupils)
      .values({ ...createPupilDto, email: createPupilDto.email ?? null, ownerId })
      .returning();
    return pupil;
  }

  findAll(ownerId: number, skip: number, limit: number, search?: string): Promise<Pupil[]> {
    const pattern = search ? containsPattern(search) : undefined;

    return this.db
      .select()
      .from(pupils)
      .where(
        and(
          eq(pupils.ownerId, ownerId),
          pattern ? or(ilike(pupils.fullName, pattern), ilike(pupils.email, pattern)) : undefined,
        ),
      )
      .orderBy(asc(pupils.id))
      .offset(skip)
      .limit(limit);
  }

  async findOne(id: number, ownerId: number, action = 'access'): Promise<Pupil> {
    const [pupil] = await this.db.select().from(pupils).where(eq(pupils.id, id));
    return assertOwnership(pupil, ownerId, 'Pupil', action);
  }

  async update(id: number, ownerId: number, updatePupilDto: UpdatePupilDto): Promise<Pupil> {
    await this.findOne(id, ownerId, 'update');

    const values: Partial<NewPupil> = { ...updatePupilDto, updatedAt: new Date() };
    const [pupil] = await this.db.update(pupils).set(values).where(eq(pupils.id, id)).returning();
    return pupil;
  }

  async remove(id: number, ownerId: number): Promise<MessageResponse> {
    await this.findOne(id, ownerId, 'delete');
    await this.db.delete(pupils).where(eq(pupils.id, id));
    return { message: `Pupil with ID ${id} has been deleted successfully` };
  }

  searchByName(ownerId: number, name: string): Promise<Pupil[]> {
    return this.db
      .select()
      .from(pupils)
      .where(and(eq(pupils.ownerId, ownerId), ilike(pupils.fullName, containsPattern(name))))
      .orderBy(asc(pupils.id));
  }

  findByGender(ownerId: number, gender: Gender): Promise<Pupil[]> {
    return this.db
      .select()
      .from(pupils)
      .where(and(eq(pupils.ownerId, ownerId), eq(pupils.gender, gender)))
      .orderBy(asc(pupils.id));
  }

  async countAll(ownerId: number): Promise<{ totalPupils: number }> {
    const [row] = await this.db
      .select({ total: count() })
      .from(pupils)
      .where(eq(pupils.ownerId, ownerId));
    return { totalPupils: row.total };
  }

  /**
   * Ensures every id names a pupil of `ownerId`.
   *
   * @throws NotFoundException listing the ids that are missing or owned by someone else
   */
  async assertOwnedPupils(
    pupilIds: readonly number[],
    ownerId: number,
    executor: Executor = this.db,
  ): Promise<void> {
    if (pupilIds.length === 0) return;

    const rows = await executor
      .select({ id: pupils.id })
      .from(pupils)
      .where(and(eq(pupils.ownerId, ownerId), inArray(pupils.id, [...pupilIds])));
    const found = new Set(rows.map((row) => row.id));
    const missing = pupilIds.filter((id) => !found.has(id));

    if (missing.length > 0) {
      throw new NotFoundException(`Pupils with IDs ${formatIds(missing)} not found`);
    }
  }
}
