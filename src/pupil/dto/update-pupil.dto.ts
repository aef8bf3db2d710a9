import { createZodDto } from 'nestjs-zod';

import { CreatePupilSchema } from './create-pupil.dto';

export const UpdatePupilSchema = CreatePupilSchema.partial();

export class UpdatePupilDto extends createZodDto(UpdatePupilSchema) {}
