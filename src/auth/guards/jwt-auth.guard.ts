import { ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGuard } from '@nestjs/passport';
import type { FastifyRequest } from 'fastify';
import { Observable } from 'rxjs';

import { isRoutePublic } from '../../common/utils/metadata.util';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  constructor(private reflector: Reflector) {
    super();
  }

  canActivate(context: ExecutionContext): boolean | Promise<boolean> | Observable<boolean> {
    if (isRoutePublic(this.reflector, context)) {
      return true;
    }

    const request = context.switchToHttp().getRequest<FastifyRequest>();
    if (request.url === '/metrics') {
      return true;
    }

    return super.canActivate(context);
  }
}
