import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const CreateUserSchema = z.object({
  googleUserId: z.string().trim().min(1).max(255),
  email: z.email().max(320),
  fullName: z.string().trim().min(1).max(255),
  profilePicUrl: z.url().nullish(),
  lastLoginAt: z.iso.datetime({ offset: true }).nullish(),
});

export class CreateUserDto extends createZodDto(CreateUserSchema) {}
