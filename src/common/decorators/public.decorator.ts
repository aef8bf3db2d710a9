import { CustomDecorator, SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/** Lets a route through the global JWT guard. */
export const Public = (): CustomDecorator => SetMetadata(IS_PUBLIC_KEY, true);
