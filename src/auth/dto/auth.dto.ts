import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const LoginSchema = z.object({
  googleUserId: z.string().trim().min(1, 'Google user id is required').max(255),
  email: z.email('Invalid email').max(320),
  fullName: z.string().trim().min(1, 'Full name is required').max(255),
  profilePicUrl: z.url().nullish(),
});

export class LoginDto extends createZodDto(LoginSchema) {}
