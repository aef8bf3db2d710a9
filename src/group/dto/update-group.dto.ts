import { createZodDto } from 'nestjs-zod';

import { CreateGroupSchema } from './create-group.dto';

export const UpdateGroupSchema = CreateGroupSchema.partial();

export class UpdateGroupDto extends createZodDto(UpdateGroupSchema) {}
