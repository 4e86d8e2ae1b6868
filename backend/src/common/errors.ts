// ============================================================
// Clickgraph — Error taxonomy
//
// Every failure that leaves either service is one of these
// kinds. HttpExceptionFilter derives the kind from the HTTP
// status, so plain Nest exceptions (BadRequestException from
// the ValidationPipe, ForbiddenException from a guard) map
// without wrapping.
// ============================================================

import { HttpException, HttpStatus } from '@nestjs/common';

export type ErrorKind =
  | 'client_input'
  | 'auth_rejected'
  | 'upstream_unavailable'
  | 'internal';

export function errorKindFor(status: number): ErrorKind {
  if (status === HttpStatus.UNAUTHORIZED || status === HttpStatus.FORBIDDEN) {
    return 'auth_rejected';
  }
  if (status >= 400 && status < 500) {
    return 'client_input';
  }
  if (
    status === HttpStatus.BAD_GATEWAY ||
    status === HttpStatus.SERVICE_UNAVAILABLE ||
    status === HttpStatus.GATEWAY_TIMEOUT
  ) {
    return 'upstream_unavailable';
  }
  return 'internal';
}

type UpstreamStatus =
  | HttpStatus.BAD_GATEWAY
  | HttpStatus.SERVICE_UNAVAILABLE
  | HttpStatus.GATEWAY_TIMEOUT;

/**
 * A dependency (graph store, credential minting, the ingestion
 * API behind the proxy) could not be reached in time.
 */
export class UpstreamUnavailableException extends HttpException {
  constructor(
    message: string,
    status: UpstreamStatus = HttpStatus.SERVICE_UNAVAILABLE,
    options?: { cause?: unknown },
  ) {
    super(message, status, options);
  }
}
