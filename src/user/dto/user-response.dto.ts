import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const UserResponseSchema = z.object({
  id: z.number().int(),
  googleUserId: z.string(),
  email: z.email(),
  fullName: z.string(),
  profilePicUrl: z.string().nullable(),
  lastLoginAt: z.iso.datetime().nullable(),
  createdAt: z.iso.datetime(),
});

export class UserResponseDto extends createZodDto(UserResponseSchema) {}
