import { createZodDto } from 'nestjs-zod';

import { CreateUserSchema } from './create-user.dto';

export const UpdateUserSchema = CreateUserSchema.pick({
  fullName: true,
  profilePicUrl: true,
  lastLoginAt: true,
}).partial();

export class UpdateUserDto extends createZodDto(UpdateUserSchema) {}
