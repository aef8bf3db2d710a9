import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const GroupResponseSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().nullable(),
  ownerId: z.number().int(),
  createdAt: z.iso.datetime(),
});

export class GroupResponseDto extends createZodDto(GroupResponseSchema) {}

export const MembershipResponseSchema = z.object({
  id: z.number().int(),
  pupilId: z.number().int(),
  groupId: z.number().int(),
  joinedAt: z.iso.datetime(),
});

export class MembershipResponseDto extends createZodDto(MembershipResponseSchema) {}
