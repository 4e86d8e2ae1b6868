// ============================================================
// Clickgraph — Deadline Interceptor
//
// Bounds every ingestion API handler by REQUEST_DEADLINE_MS so a
// stalled graph store cannot hold a request open indefinitely.
// The Neo4j transaction timeout is shorter and normally fires
// first; this is the outer bound.
// ============================================================

import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpStatus,
} from '@nestjs/common';
import { Observable, throwError } from 'rxjs';
import { timeout } from 'rxjs/operators';
import { ConfigService } from '../../config/config.service';
import { UpstreamUnavailableException } from '../errors';

@Injectable()
export class DeadlineInterceptor<T> implements NestInterceptor<T, T> {
  private readonly deadlineMs: number;

  constructor(config: ConfigService) {
    this.deadlineMs = config.requestDeadlineMs;
  }

  intercept(context: ExecutionContext, next: CallHandler<T>): Observable<T> {
    return next.handle().pipe(
      timeout({
        first: this.deadlineMs,
        with: () =>
          throwError(
            () =>
              new UpstreamUnavailableException(
                `Request exceeded its ${this.deadlineMs} ms deadline`,
                HttpStatus.GATEWAY_TIMEOUT,
              ),
          ),
      }),
    );
  }
}
