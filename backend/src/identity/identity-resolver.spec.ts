import { createHash } from 'crypto';
import { IdentityResolver, normalize } from './identity-resolver';

describe('IdentityResolver', () => {
  const resolver = new IdentityResolver();

  describe('resolvePerson', () => {
    it('keeps a supplied id and trims fields', () => {
      const upsert = resolver.resolvePerson({
        id: '  p1 ',
        name: ' Ada ',
        email: '',
        contact_number: undefined,
      });

      expect(upsert).toEqual({
        id: 'p1',
        fields: { name: 'Ada', email: null, contact_number: null },
      });
    });

    it('derives the same id for the same fields', () => {
      const a = resolver.resolvePerson({ name: 'Ada Lovelace', email: 'ada@example.com' });
      const b = resolver.resolvePerson({ id: '   ', name: 'Ada Lovelace', email: 'ada@example.com' });

      expect(a.id).toBe(b.id);
      expect(a.id).toMatch(/^per_[0-9a-f]{32}$/);
    });

    it('ignores case and whitespace differences when deriving', () => {
      const a = resolver.resolvePerson({ name: 'Ada   Lovelace', email: 'ADA@example.com' });
      const b = resolver.resolvePerson({ name: 'ada lovelace', email: 'ada@example.com ' });

      expect(a.id).toBe(b.id);
    });

    it('derives different ids for different fields', () => {
      const a = resolver.resolvePerson({ name: 'Ada', email: 'ada@example.com' });
      const b = resolver.resolvePerson({ name: 'Ada', email: 'grace@example.com' });

      expect(a.id).not.toBe(b.id);
    });

    it('does not let field values shift between positions', () => {
      const a = resolver.resolvePerson({ name: 'x', email: null });
      const b = resolver.resolvePerson({ name: null, email: 'x' });

      expect(a.id).not.toBe(b.id);
    });

    it('falls back to a random id when nothing is supplied', () => {
      const a = resolver.resolvePerson({});
      const b = resolver.resolvePerson({ id: '', name: ' ' });

      expect(a.id).toMatch(/^per_[0-9a-f]{32}$/);
      expect(b.id).toMatch(/^per_[0-9a-f]{32}$/);
      expect(a.id).not.toBe(b.id);
    });
  });

  describe('resolveCampaign', () => {
    it('derives from the campaign name with the cmp prefix', () => {
      const expected = createHash('sha256')
        .update('campaign\u001fspring sale', 'utf8')
        .digest('hex')
        .slice(0, 32);

      expect(resolver.resolveCampaign({ campaign: ' Spring  Sale ' })).toEqual({
        id: `cmp_${expected}`,
        fields: { campaign: 'Spring  Sale' },
      });
    });

    it('never collides with a person derived from the same text', () => {
      const campaign = resolver.resolveCampaign({ campaign: 'Ada' });
      const person = resolver.resolvePerson({ name: 'Ada' });

      expect(campaign.id.slice(4)).not.toBe(person.id.slice(4));
    });
  });

  describe('resolveReference', () => {
    it('returns a supplied reference unchanged apart from trimming', () => {
      expect(resolver.resolveReference('campaign', ' c1 ')).toBe('c1');
    });

    it('generates a fresh id for a blank reference', () => {
      expect(resolver.resolveReference('person', '')).toMatch(/^per_[0-9a-f]{32}$/);
      expect(resolver.resolveReference('campaign', null)).toMatch(/^cmp_[0-9a-f]{32}$/);
    });
  });
});

describe('normalize', () => {
  it.each([
    [undefined, null],
    [null, null],
    ['', null],
    ['   ', null],
    [' a b ', 'a b'],
  ])('normalize(%p) → %p', (input, expected) => {
    expect(normalize(input)).toBe(expected);
  });
});
