// ============================================================
// Clickgraph — Proxy Service
// Forward(request) toward the ingestion API
//
//   1. mint an ID token for the ingestion API's audience
//   2. copy method, path, query, body and end-to-end headers;
//      set Authorization and X-Api-Key regardless of what the
//      caller sent
//   3. send, accepting every status
//   4. hand back status, headers and body untouched
//
// Fails closed: if no token can be minted, nothing is sent.
// No retries; the caller decides.
// ============================================================

import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import type { IncomingHttpHeaders } from 'http';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { ConfigService, ProxySettings } from '../config/config.service';
import { UpstreamUnavailableException } from '../common/errors';
import { SHARED_SECRET_HEADER } from '../auth/guards/shared-secret.guard';
import { IdTokenService } from './id-token.service';

export const UPSTREAM_HTTP = Symbol('UPSTREAM_HTTP');

/** Never copied from the inbound request. */
const DROPPED_REQUEST_HEADERS = new Set([
  'host',
  'authorization',
  SHARED_SECRET_HEADER,
  'content-length',
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

/** Never copied from the upstream response. */
const DROPPED_RESPONSE_HEADERS = new Set([
  'content-length',
  'transfer-encoding',
  'content-encoding',
  'connection',
]);

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export type HeaderMap = Record<string, string | string[]>;

export interface InboundRequest {
  method: string;
  /** Path plus query string, as received. */
  url: string;
  headers: IncomingHttpHeaders;
  body: Buffer | undefined;
}

export interface RelayedResponse {
  status: number;
  headers: HeaderMap;
  body: Buffer;
}

@Injectable()
export class ProxyService {
  private readonly logger = new Logger(ProxyService.name);
  private readonly settings: ProxySettings;

  constructor(
    @Inject(UPSTREAM_HTTP) private readonly http: AxiosInstance,
    private readonly tokens: IdTokenService,
    config: ConfigService,
  ) {
    this.settings = config.proxy();
  }

  async forward(request: InboundRequest): Promise<RelayedResponse> {
    const token = await this.mintOrFail();

    const headers = outboundHeaders(request.headers);
    headers['authorization'] = `Bearer ${token}`;
    headers[SHARED_SECRET_HEADER] = this.settings.upstreamApiKey;

    const url = `${this.settings.targetUrl}${request.url}`;
    let response: AxiosResponse<ArrayBuffer | Buffer>;
    try {
      response = await this.http.request<ArrayBuffer | Buffer>({
        method: request.method,
        url,
        headers,
        data: request.body,
        responseType: 'arraybuffer',
        validateStatus: () => true,
        maxRedirects: 0,
        timeout: this.settings.upstreamTimeoutMs,
      });
    } catch (error) {
      throw this.unreachable(error, request);
    }

    this.logger.log(
      `${request.method} ${request.url} → ${response.status}`,
    );

    return {
      status: response.status,
      headers: relayedHeaders(response.headers),
      body: Buffer.isBuffer(response.data)
        ? response.data
        : Buffer.from(response.data),
    };
  }

  private async mintOrFail(): Promise<string> {
    try {
      return await this.tokens.tokenFor(this.settings.audience);
    } catch (error) {
      this.logger.error(
        `ID token minting failed for ${this.settings.audience}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new UpstreamUnavailableException(
        'Unable to mint identity credential',
        HttpStatus.SERVICE_UNAVAILABLE,
        { cause: error },
      );
    }
  }

  private unreachable(
    error: unknown,
    request: InboundRequest,
  ): UpstreamUnavailableException {
    const timedOut =
      axios.isAxiosError(error) &&
      error.code !== undefined &&
      TIMEOUT_CODES.has(error.code);
    const reason = error instanceof Error ? error.message : String(error);

    this.logger.warn(
      `${request.method} ${request.url} → upstream ${timedOut ? 'timed out' : 'unreachable'}: ${reason}`,
    );

    return timedOut
      ? new UpstreamUnavailableException(
          'Ingestion API did not answer in time',
          HttpStatus.GATEWAY_TIMEOUT,
          { cause: error },
        )
      : new UpstreamUnavailableException(
          'Ingestion API unreachable',
          HttpStatus.BAD_GATEWAY,
          { cause: error },
        );
  }
}

export function outboundHeaders(inbound: IncomingHttpHeaders): HeaderMap {
  const headers: HeaderMap = {};
  for (const [name, value] of Object.entries(inbound)) {
    const key = name.toLowerCase();
    if (value === undefined || DROPPED_REQUEST_HEADERS.has(key)) continue;
    headers[key] = value;
  }
  return headers;
}

/** Header values from axios, stringified; hop-by-hop headers dropped. */
export function relayedHeaders(source: object): HeaderMap {
  const headers: HeaderMap = {};
  for (const [name, value] of Object.entries(source)) {
    const key = name.toLowerCase();
    if (DROPPED_RESPONSE_HEADERS.has(key)) continue;
    const normalized = headerValue(value);
    if (normalized !== null) headers[key] = normalized;
  }
  return headers;
}

function headerValue(value: unknown): string | string[] | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) return value.map(String);
  return null;
}
