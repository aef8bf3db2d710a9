import { type ExecutionContext, UnauthorizedException, createParamDecorator } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';

import type { AuthUser } from '../../auth/interfaces/auth.interface';

/**
 * `@CurrentUser()` for the whole principal, `@CurrentUser('id')` for one field.
 * Only meaningful behind a guard that sets `request.user`.
 */
export const CurrentUser = createParamDecorator(
  (field: keyof AuthUser | undefined, ctx: ExecutionContext) => {
    const { user } = ctx.switchToHttp().getRequest<FastifyRequest & { user?: AuthUser }>();
    if (!user) {
      throw new UnauthorizedException();
    }

    return field ? user[field] : user;
  },
);
