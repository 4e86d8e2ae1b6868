// ============================================================
// Clickgraph — ID Token Service
//
// Mints audience-scoped identity tokens for outbound calls.
// Tokens are cached per audience until shortly before their
// `exp` claim; a token is never handed out for an audience
// other than the one it was minted for. Concurrent requests
// for the same audience share one in-flight mint.
// ============================================================

import { Inject, Injectable, Logger } from '@nestjs/common';
import { GoogleAuth } from 'google-auth-library';
import { ConfigService } from '../config/config.service';
import { CLOCK, Clock } from '../common/clock';
import { withDeadline } from '../common/deadline';

export const ID_TOKEN_SOURCE = Symbol('ID_TOKEN_SOURCE');

/** Refresh this long before the token's own expiry. */
const EXPIRY_SKEW_MS = 60 * 1000;

export interface IdTokenSource {
  fetchIdToken(audience: string): Promise<string>;
}

/**
 * Application Default Credentials: the metadata server on Cloud
 * Run / GCE, or a service-account key file locally.
 */
@Injectable()
export class GoogleIdTokenSource implements IdTokenSource {
  private readonly auth = new GoogleAuth();

  async fetchIdToken(audience: string): Promise<string> {
    const client = await this.auth.getIdTokenClient(audience);
    return client.idTokenProvider.fetchIdToken(audience);
  }
}

interface CachedToken {
  token: string;
  expiresAtMs: number;
}

@Injectable()
export class IdTokenService {
  private readonly logger = new Logger(IdTokenService.name);
  private readonly cache = new Map<string, CachedToken>();
  private readonly inflight = new Map<string, Promise<string>>();
  private readonly timeoutMs: number;

  constructor(
    @Inject(ID_TOKEN_SOURCE) private readonly source: IdTokenSource,
    @Inject(CLOCK) private readonly clock: Clock,
    config: ConfigService,
  ) {
    this.timeoutMs = config.proxy().idTokenTimeoutMs;
  }

  async tokenFor(audience: string): Promise<string> {
    const cached = this.cache.get(audience);
    if (cached && cached.expiresAtMs - EXPIRY_SKEW_MS > this.clock().getTime()) {
      this.logger.debug(`ID token cache hit for ${audience}`);
      return cached.token;
    }

    const pending = this.inflight.get(audience);
    if (pending) {
      return pending;
    }

    const minting = this.mint(audience).finally(() => {
      this.inflight.delete(audience);
    });
    this.inflight.set(audience, minting);
    return minting;
  }

  private async mint(audience: string): Promise<string> {
    const token = await withDeadline(
      this.source.fetchIdToken(audience),
      this.timeoutMs,
      'ID token minting',
    );

    const expiresAtMs = expiryOf(token);
    if (expiresAtMs === null) {
      this.cache.delete(audience);
      this.logger.warn(`ID token for ${audience} has no readable exp; not cached`);
    } else {
      this.cache.set(audience, { token, expiresAtMs });
      this.logger.debug(`ID token minted for ${audience}`);
    }
    return token;
  }
}

/** The `exp` claim of a JWT in epoch milliseconds, or null. */
export function expiryOf(token: string): number | null {
  const [, payload] = token.split('.');
  if (!payload) return null;

  try {
    const claims: unknown = JSON.parse(
      Buffer.from(payload, 'base64url').toString('utf8'),
    );
    if (typeof claims !== 'object' || claims === null) return null;
    const exp: unknown = Reflect.get(claims, 'exp');
    return typeof exp === 'number' && Number.isFinite(exp) ? exp * 1000 : null;
  } catch {
    return null;
  }
}
