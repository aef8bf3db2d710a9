import { Catch, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { ArgumentsHost, ExceptionFilter } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import type { FastifyRequest } from 'fastify';
import { ZodValidationException } from 'nestjs-zod';
import { ZodError } from 'zod';

import { DatabaseErrorLike, findDatabaseError } from '../utils/database-error.util';
import { failureResponse } from '../utils/response.util';

export interface ErrorDescription {
  statusCode: number;
  title: string;
  message: string | object;
}

interface DatabaseErrorResponse {
  statusCode: number;
  message: string;
  error: string;
}

const STATUS_TITLES: Record<number, string> = {
  [HttpStatus.UNAUTHORIZED]: 'Authorization error',
  [HttpStatus.FORBIDDEN]: 'Access denied',
  [HttpStatus.NOT_FOUND]: 'Resource not found',
  [HttpStatus.BAD_REQUEST]: 'Bad request',
  [HttpStatus.CONFLICT]: 'Data conflict',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'Service unavailable',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal server error',
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();

    const { statusCode, title, message } = this.describe(exception, request.url);

    const responseBody = failureResponse({ title, message });
    httpAdapter.reply(ctx.getResponse(), responseBody, statusCode);
  }

  /** Maps any thrown value to the status and error body sent to the client. */
  describe(exception: unknown, url: string): ErrorDescription {
    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let title = STATUS_TITLES[HttpStatus.INTERNAL_SERVER_ERROR];
    let message: string | object = 'An unexpected error occurred';

    const databaseError = findDatabaseError(exception);

    if (exception instanceof ZodValidationException) {
      statusCode = HttpStatus.BAD_REQUEST;
      title = 'Validation error';
      const zodError = exception.getZodError();
      message =
        zodError instanceof ZodError
          ? zodError.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
          : exception.message;
    } else if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      const response = exception.getResponse();
      title = STATUS_TITLES[statusCode] ?? 'Error';

      if (statusCode === HttpStatus.BAD_REQUEST || statusCode === HttpStatus.NOT_FOUND) {
        this.logger.debug(`Error (${statusCode}): ${JSON.stringify(response, null, 2)}`);
      }

      if (typeof response === 'object' && response !== null) {
        const msg = 'message' in response ? response.message : undefined;
        if (Array.isArray(msg)) {
          message = msg.join(', ');
        } else if (typeof msg === 'string') {
          message = msg;
        } else {
          message = response;
        }
      } else {
        message = response;
      }

      // Fastify's default 404 reads "Cannot GET /path"
      if (
        statusCode === HttpStatus.NOT_FOUND &&
        typeof message === 'string' &&
        message.startsWith('Cannot ')
      ) {
        message = `Requested path not found: ${url}`;
      }
    } else if (databaseError) {
      const mapped = this.handleDatabaseError(databaseError);
      if (mapped) {
        statusCode = mapped.statusCode;
        title = mapped.error;
        message = mapped.message;
      } else {
        this.logger.error(exception);
      }
    } else {
      this.logger.error(exception);
    }

    return { statusCode, title, message };
  }

  private handleDatabaseError(error: DatabaseErrorLike): DatabaseErrorResponse | null {
    switch (error.code) {
      case '23505':
        return this.handleUniqueViolation(error);
      case '23503':
        return {
          statusCode: HttpStatus.BAD_REQUEST,
          message: 'Referenced record does not exist',
          error: STATUS_TITLES[HttpStatus.BAD_REQUEST],
        };
      case '22P02':
      case '22003':
      case '23514':
        return {
          statusCode: HttpStatus.BAD_REQUEST,
          message: 'Invalid value for a database field',
          error: STATUS_TITLES[HttpStatus.BAD_REQUEST],
        };
      default:
        return null;
    }
  }

  private handleUniqueViolation(error: DatabaseErrorLike): DatabaseErrorResponse {
    return {
      statusCode: HttpStatus.CONFLICT,
      message: error.constraint
        ? `Unique constraint violated: ${error.constraint}`
        : 'Unique constraint violated',
      error: STATUS_TITLES[HttpStatus.CONFLICT],
    };
  }
}
