import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

import { ApiSuccess, successResponse } from '../utils/response.util';

/**
 * Wraps successful responses under `/api` as `{ success: true, data, timestamp }`.
 */
@Injectable()
export class TransformInterceptor<T> implements NestInterceptor<T, ApiSuccess<T> | T> {
  intercept(context: ExecutionContext, next: CallHandler<T>): Observable<ApiSuccess<T> | T> {
    const request = context.switchToHttp().getRequest<FastifyRequest>();

    // Docs and metrics live outside the API prefix
    if (!request.url.startsWith('/api')) {
      return next.handle();
    }

    return next.handle().pipe(map((data: T) => successResponse(data)));
  }
}
