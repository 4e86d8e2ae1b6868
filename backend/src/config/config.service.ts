// ============================================================
// Clickgraph — Config Service
//
// Typed access to the environment. Both services (ingestion
// API and forwarding proxy) read their settings through here;
// each only asks for the sections it needs, so a proxy
// deployment never has to carry Neo4j credentials.
//
// Required variables that are missing fail fast with a message
// listing every missing name.
// ============================================================

import { Inject, Injectable, Optional } from '@nestjs/common';

export interface Neo4jSettings {
  uri: string;
  username: string;
  password: string;
  database: string;
  txTimeoutMs: number;
  ensureSchema: boolean;
}

export interface ProxySettings {
  targetUrl: string;
  audience: string;
  upstreamApiKey: string;
  idTokenTimeoutMs: number;
  upstreamTimeoutMs: number;
  bodyLimit: string;
}

export interface ThrottleSettings {
  ttlMs: number;
  limit: number;
}

export type Env = Record<string, string | undefined>;

/** Optional override of process.env, used by tests. */
export const ENV = Symbol('ENV');

@Injectable()
export class ConfigService {
  private readonly env: Env;

  constructor(@Optional() @Inject(ENV) env?: Env) {
    this.env = env ?? process.env;
  }

  get port(): number {
    return this.int('PORT', 8080);
  }

  get environment(): string {
    return this.env.NODE_ENV || 'development';
  }

  get requestDeadlineMs(): number {
    return this.int('REQUEST_DEADLINE_MS', 30000);
  }

  get throttle(): ThrottleSettings {
    return {
      ttlMs: this.int('THROTTLE_TTL_MS', 60000),
      limit: this.int('THROTTLE_LIMIT', 600),
    };
  }

  /** Shared secret expected in X-Api-Key on inbound requests. */
  sharedSecret(): string {
    const value = this.first('API_KEY');
    if (!value) {
      throw new Error('Missing required environment variables: API_KEY');
    }
    return value;
  }

  /**
   * Neo4j connection settings. Accepts both the NEO4J_USERNAME and
   * NEO4J_USER naming conventions (and likewise for password/db).
   */
  neo4j(): Neo4jSettings {
    const uri = this.first('NEO4J_URI');
    const username = this.first('NEO4J_USERNAME', 'NEO4J_USER') ?? 'neo4j';
    const password = this.first('NEO4J_PASSWORD', 'NEO4J_PASS');

    const missing: string[] = [];
    if (!uri) missing.push('NEO4J_URI');
    if (!password) missing.push('NEO4J_PASSWORD/NEO4J_PASS');
    if (!uri || !password) {
      throw new Error(
        `Missing required environment variables: ${missing.join(', ')}`,
      );
    }

    return {
      uri,
      username,
      password,
      database: this.first('NEO4J_DATABASE', 'NEO4J_DB') ?? 'neo4j',
      txTimeoutMs: this.int('NEO4J_TX_TIMEOUT_MS', 15000),
      ensureSchema: this.bool('NEO4J_ENSURE_SCHEMA', true),
    };
  }

  proxy(): ProxySettings {
    const target = this.first('TARGET_URL');
    const apiKey = this.first('UPSTREAM_API_KEY', 'API_KEY');

    const missing: string[] = [];
    if (!target) missing.push('TARGET_URL');
    if (!apiKey) missing.push('UPSTREAM_API_KEY/API_KEY');
    if (!target || !apiKey) {
      throw new Error(
        `Missing required environment variables: ${missing.join(', ')}`,
      );
    }

    const targetUrl = target.replace(/\/+$/, '');
    return {
      targetUrl,
      audience: this.first('ID_TOKEN_AUDIENCE') ?? targetUrl,
      upstreamApiKey: apiKey,
      idTokenTimeoutMs: this.int('ID_TOKEN_TIMEOUT_MS', 10000),
      upstreamTimeoutMs: this.int('UPSTREAM_TIMEOUT_MS', 60000),
      bodyLimit: this.first('PROXY_BODY_LIMIT') ?? '10mb',
    };
  }

  // ── helpers ───────────────────────────────────────────────

  /** First non-blank value among the given variable names. */
  private first(...names: string[]): string | undefined {
    for (const name of names) {
      const value = this.env[name]?.trim();
      if (value) return value;
    }
    return undefined;
  }

  private int(name: string, fallback: number): number {
    const raw = this.first(name);
    if (raw === undefined) return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
  }

  private bool(name: string, fallback: boolean): boolean {
    const raw = this.first(name)?.toLowerCase();
    if (raw === undefined) return fallback;
    return !['0', 'false', 'no', 'off'].includes(raw);
  }
}
