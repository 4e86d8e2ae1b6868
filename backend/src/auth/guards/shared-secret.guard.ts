// ============================================================
// Clickgraph — Shared Secret Guard
//
// Validates the X-Api-Key header against the configured
// API_KEY. Both sides are SHA-256 hashed before a constant-time
// compare so neither the length nor the content of the secret
// leaks through timing.
//
//   missing header → 401
//   wrong secret   → 403
// ============================================================

import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { createHash, timingSafeEqual } from 'crypto';
import { Request } from 'express';
import { ConfigService } from '../../config/config.service';

export const SHARED_SECRET_HEADER = 'x-api-key';

@Injectable()
export class SharedSecretGuard implements CanActivate {
  private readonly expected: Buffer;

  constructor(config: ConfigService) {
    this.expected = digest(config.sharedSecret());
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const provided = request.headers[SHARED_SECRET_HEADER];

    if (typeof provided !== 'string' || provided.length === 0) {
      throw new UnauthorizedException('Missing or invalid X-Api-Key');
    }

    if (!timingSafeEqual(digest(provided), this.expected)) {
      throw new ForbiddenException('Invalid X-Api-Key');
    }

    return true;
  }
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}
