// ============================================================
// Clickgraph — HTTP Exception Filter
//
// Converts all thrown exceptions to:
//   { status: "error", kind: "<ErrorKind>", message: "<reason>" }
//
// Responses relayed by the forwarding proxy never pass through
// here; only errors the proxy raises itself do.
// ============================================================

import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorKind, errorKindFor } from '../errors';

export interface ErrorBody {
  status: 'error';
  kind: ErrorKind;
  message: string;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number;
    let message: string;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = messageOf(exception);

      if (status >= 500) {
        this.logger.warn(
          `${request.method} ${request.url} → ${status}: ${message}`,
        );
      }
    } else {
      // Unexpected errors — log full details, return generic message.
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = 'Internal server error';

      this.logger.error(
        `Unhandled exception on ${request.method} ${request.url}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    if (response.headersSent) {
      return;
    }

    const body: ErrorBody = {
      status: 'error',
      kind: errorKindFor(status),
      message,
    };
    response.status(status).json(body);
  }
}

/**
 * class-validator returns { message: string[] } for validation
 * errors; flatten to a single string.
 */
function messageOf(exception: HttpException): string {
  const exceptionResponse = exception.getResponse();

  if (typeof exceptionResponse === 'string') {
    return exceptionResponse;
  }
  if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
    const message: unknown = Reflect.get(exceptionResponse, 'message');
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return exception.message;
}
