import { ForbiddenException, Inject, Injectable, NotFoundException } from '@nestjs/common';
import { asc, eq, getTableColumns } from 'drizzle-orm';

import { DRIZZLE, type Database } from '../database/database.constants';
import { type NewUser, type User, users } from '../database/schema';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';

export type PublicUser = Omit<User, 'refreshTokenHash'>;

const { refreshTokenHash: _refreshTokenHash, ...publicColumns } = getTableColumns(users);

@Injectable()
export class UserService {
  constructor(@Inject(DRIZZLE) private readonly db: Database) {}

  async create(createUserDto: CreateUserDto): Promise<PublicUser> {
    const [user] = await this.db
      .insert(users)
      .values({
        googleUserId: createUserDto.googleUserId,
        email: createUserDto.email,
        fullName: createUserDto.fullName,
        profilePicUrl: createUserDto.profilePicUrl ?? null,
        lastLoginAt: createUserDto.lastLoginAt ? new Date(createUserDto.lastLoginAt) : null,
      })
      .returning(publicColumns);
    return user;
  }

  findAll(skip: number, limit: number): Promise<PublicUser[]> {
    return this.db
      .select(publicColumns)
      .from(users)
      .orderBy(asc(users.id))
      .offset(skip)
      .limit(limit);
  }

  async findOne(id: number): Promise<PublicUser> {
    const [user] = await this.db.select(publicColumns).from(users).where(eq(users.id, id));
    if (!user) throw new NotFoundException('User not found');
    return user;
  }

  async findByGoogleUserId(googleUserId: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.googleUserId, googleUserId));
    return user;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.email, email));
    return user;
  }

  /** Includes the refresh token hash; never hand the result to a client. */
  async findAccount(id: number): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id));
    return user;
  }

  async update(
    id: number,
    currentUserId: number,
    updateUserDto: UpdateUserDto,
  ): Promise<PublicUser> {
    await this.findOne(id);
    this.assertSelf(id, currentUserId, 'update');

    const values: Partial<NewUser> = {};
    if (updateUserDto.fullName !== undefined) values.fullName = updateUserDto.fullName;
    if (updateUserDto.profilePicUrl !== undefined) {
      values.profilePicUrl = updateUserDto.profilePicUrl;
    }
    if (updateUserDto.lastLoginAt !== undefined) {
      values.lastLoginAt = updateUserDto.lastLoginAt ? new Date(updateUserDto.lastLoginAt) : null;
    }

    return this.updateAccount(id, values);
  }

  /** Writes account fields without any ownership check; used by the auth flow. */
  async updateAccount(id: number, values: Partial<NewUser>): Promise<PublicUser> {
    if (Object.keys(values).length === 0) {
      return this.findOne(id);
    }
    const [user] = await this.db
      .update(users)
      .set(values)
      .where(eq(users.id, id))
      .returning(publicColumns);
    if (!user) throw new NotFoundException('User not found');
    return user;
  }

  async remove(id: number, currentUserId: number): Promise<void> {
    await this.findOne(id);
    this.assertSelf(id, currentUserId, 'delete');
    await this.db.delete(users).where(eq(users.id, id));
  }

  private assertSelf(id: number, currentUserId: number, action: string): void {
    if (id !== currentUserId) {
      throw new ForbiddenException(`Not authorized to ${action} this user`);
    }
  }
}
