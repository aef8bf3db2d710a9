import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

const MemberSchema = z.object({
  pupilId: z.number().int().positive(),
});

export const AddMembersSchema = z.object({
  members: z.array(MemberSchema).min(1),
});

export class AddMembersDto extends createZodDto(AddMembersSchema) {}

/** An empty list removes every member. */
export const SyncMembersSchema = z.object({
  members: z.array(MemberSchema),
});

export class SyncMembersDto extends createZodDto(SyncMembersSchema) {}
