import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';

import type { ErrorResponse } from '@activity-signup/shared';

/**
 * Renders every error as `{ detail }`. HTTP exceptions keep their status and
 * message; anything else is logged and reported as a 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();

    if (exception instanceof HttpException) {
      const body: ErrorResponse = { detail: extractDetail(exception) };
      httpAdapter.reply(ctx.getResponse(), body, exception.getStatus());
      return;
    }

    this.logger.error(
      'Unhandled error while serving request',
      exception instanceof Error ? exception.stack : String(exception),
    );
    const body: ErrorResponse = { detail: 'Internal Server Error' };
    httpAdapter.reply(ctx.getResponse(), body, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}

function extractDetail(exception: HttpException): string | string[] {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return response;
  }

  if (typeof response === 'object' && response !== null && 'message' in response) {
    const { message } = response;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message) && message.every((item) => typeof item === 'string')) {
      return message;
    }
  }

  return exception.message;
}
