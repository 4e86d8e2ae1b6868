import { ConfigService } from '../config/config.service';
import { expiryOf, IdTokenService, IdTokenSource } from './id-token.service';

const START = Date.parse('2024-05-01T12:00:00.000Z');

function jwt(claims: object): string {
  const encode = (value: object) =>
    Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
  return `${encode({ alg: 'RS256' })}.${encode(claims)}.signature`;
}

class CountingSource implements IdTokenSource {
  readonly audiences: string[] = [];
  expSeconds = START / 1000 + 3600;

  async fetchIdToken(audience: string): Promise<string> {
    this.audiences.push(audience);
    return jwt({ aud: audience, exp: this.expSeconds, n: this.audiences.length });
  }
}

describe('IdTokenService', () => {
  const config = new ConfigService({
    TARGET_URL: 'https://ingest.example.test',
    API_KEY: 'test-secret',
  });
  let source: CountingSource;
  let now: number;
  let service: IdTokenService;

  beforeEach(() => {
    source = new CountingSource();
    now = START;
    service = new IdTokenService(source, () => new Date(now), config);
  });

  it('reuses a token for the same audience while it is valid', async () => {
    const first = await service.tokenFor('https://a.example.test');
    now = START + 30 * 60 * 1000;
    const second = await service.tokenFor('https://a.example.test');

    expect(second).toBe(first);
    expect(source.audiences).toEqual(['https://a.example.test']);
  });

  it('mints separately per audience', async () => {
    const a = await service.tokenFor('https://a.example.test');
    const b = await service.tokenFor('https://b.example.test');

    expect(a).not.toBe(b);
    expect(source.audiences).toEqual(['https://a.example.test', 'https://b.example.test']);
  });

  it('refreshes a token shortly before it expires', async () => {
    await service.tokenFor('https://a.example.test');
    now = START + 3600 * 1000 - 30 * 1000;
    await service.tokenFor('https://a.example.test');

    expect(source.audiences).toHaveLength(2);
  });

  it('shares one mint between concurrent callers', async () => {
    const [a, b] = await Promise.all([
      service.tokenFor('https://a.example.test'),
      service.tokenFor('https://a.example.test'),
    ]);

    expect(a).toBe(b);
    expect(source.audiences).toHaveLength(1);
  });

  it('does not cache a token without a readable expiry', async () => {
    const opaque: IdTokenSource = { fetchIdToken: async () => 'opaque-token' };
    const uncached = new IdTokenService(opaque, () => new Date(now), config);
    const fetch = jest.spyOn(opaque, 'fetchIdToken');

    await uncached.tokenFor('https://a.example.test');
    await uncached.tokenFor('https://a.example.test');

    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('propagates a minting failure and retries on the next call', async () => {
    const failing: IdTokenSource = {
      fetchIdToken: jest
        .fn<Promise<string>, [string]>()
        .mockRejectedValueOnce(new Error('metadata server unavailable'))
        .mockResolvedValueOnce(jwt({ exp: START / 1000 + 3600 })),
    };
    const retrying = new IdTokenService(failing, () => new Date(now), config);

    await expect(retrying.tokenFor('https://a.example.test')).rejects.toThrow(
      'metadata server unavailable',
    );
    await expect(retrying.tokenFor('https://a.example.test')).resolves.toContain('.');
  });
});

describe('expiryOf', () => {
  it('reads exp as epoch milliseconds', () => {
    expect(expiryOf(jwt({ exp: 1700000000 }))).toBe(1700000000000);
  });

  it.each(['opaque', 'a.!!!.c', jwt({ sub: 'x' }), jwt({ exp: 'soon' })])(
    'returns null for %p',
    (token) => {
      expect(expiryOf(token)).toBeNull();
    },
  );
});
