import { BadRequestException } from '@nestjs/common';
import { IdentityResolver } from '../identity/identity-resolver';
import { InMemoryAttributionGraph } from '../../test/in-memory-attribution-graph';
import { ClicksService, tagFor } from './clicks.service';

describe('ClicksService', () => {
  let graph: InMemoryAttributionGraph;
  let service: ClicksService;
  let now: Date;

  beforeEach(() => {
    graph = new InMemoryAttributionGraph();
    now = new Date('2024-05-01T12:00:00.000Z');
    service = new ClicksService(graph, new IdentityResolver(), () => now);
  });

  describe('record', () => {
    it('creates a placeholder person for a blank person_id', async () => {
      const event = await service.record({
        person_id: '',
        campaign_id: 'c1',
        source: 'ig',
        content: 'Instagram story ad',
      });

      expect(event.person_id).toMatch(/^per_[0-9a-f]{32}$/);
      expect(event.campaign_id).toBe('c1');
      expect(event.source).toBe('ig');
      expect(event.tag).toBe('instagram');
      expect(event.clicked_at).toBe('2024-05-01T12:00:00.000Z');

      expect(graph.persons.get(event.person_id)).toMatchObject({
        name: 'Unknown',
        email: 'Unknown',
        contact_number: 'Unknown',
      });
      expect(graph.campaigns.get('c1')).toEqual({ id: 'c1', campaign: 'Unknown' });
      expect(graph.clicks).toHaveLength(1);
    });

    it('keeps existing endpoint fields intact', async () => {
      await graph.mergePerson(
        { id: 'p1', fields: { name: 'Ada', email: null, contact_number: null } },
        now.toISOString(),
      );

      await service.record({ person_id: 'p1', campaign_id: 'c1' });

      expect(graph.persons.get('p1')?.name).toBe('Ada');
    });

    it('appends one edge per submission', async () => {
      const dto = { id: 'k1', person_id: 'p1', campaign_id: 'c1' };
      await service.record(dto);
      await service.record(dto);

      expect(graph.clicks.map((c) => c.id)).toEqual(['k1', 'k1']);
      expect(graph.persons.size).toBe(1);
      expect(graph.campaigns.size).toBe(1);
    });

    it('generates a click id when none is given', async () => {
      const event = await service.record({ person_id: 'p1', campaign_id: 'c1' });

      expect(event.id).toMatch(/^clk_[0-9a-f]{32}$/);
    });

    it('stores absent attribution fields as null', async () => {
      const event = await service.record({ person_id: 'p1', campaign_id: 'c1', medium: ' ' });

      expect(event).toEqual({
        id: event.id,
        person_id: 'p1',
        campaign_id: 'c1',
        clicked_at: '2024-05-01T12:00:00.000Z',
        source: null,
        medium: null,
        term: null,
        content: null,
        device: null,
        date: null,
        tag: null,
        extra: {},
      });
    });

    it('carries extra attribution fields onto the edge', async () => {
      const event = await service.record(
        { person_id: 'p1', campaign_id: 'c1', source: 'ig' },
        { gclid: 'abc123', campaign_name: 'spring', position: 2 },
      );

      expect(event.extra).toEqual({ gclid: 'abc123', campaign_name: 'spring', position: 2 });
      expect(graph.clicks[0]?.extra).toEqual({
        gclid: 'abc123',
        campaign_name: 'spring',
        position: 2,
      });
    });

    it('accepts a payload that carries only extra fields', async () => {
      const event = await service.record({}, { gclid: 'abc123' });

      expect(event.person_id).toMatch(/^per_[0-9a-f]{32}$/);
      expect(event.extra).toEqual({ gclid: 'abc123' });
    });

    it('rejects an entirely empty payload', async () => {
      await expect(service.record({ person_id: ' ', source: '' })).rejects.toBeInstanceOf(
        BadRequestException,
      );
      expect(graph.clicks).toHaveLength(0);
    });
  });

  describe('sample', () => {
    it('returns the most recent clicks first with endpoint summaries', async () => {
      await graph.mergePerson(
        { id: 'p1', fields: { name: 'Ada', email: null, contact_number: null } },
        now.toISOString(),
      );

      now = new Date('2024-05-01T10:00:00.000Z');
      await service.record({ id: 'k-old', person_id: 'p1', campaign_id: 'c1' });
      now = new Date('2024-05-01T11:00:00.000Z');
      await service.record({ id: 'k-new', person_id: 'p1', campaign_id: 'c1' });

      const sample = await service.sample(5);

      expect(sample.map((s) => s.id)).toEqual(['k-new', 'k-old']);
      expect(sample[0]?.person).toEqual({ id: 'p1', name: 'Ada' });
      expect(sample[0]?.campaign).toEqual({ id: 'c1', campaign: 'Unknown' });
    });

    it('defaults to ten rows', async () => {
      for (let i = 0; i < 12; i++) {
        now = new Date(Date.UTC(2024, 4, 1, 0, i));
        await service.record({ person_id: 'p1', campaign_id: 'c1' });
      }

      await expect(service.sample()).resolves.toHaveLength(10);
    });
  });
});

describe('tagFor', () => {
  it.each([
    ['Instagram story ad', 'instagram'],
    ['facebook feed', 'facebook'],
    ['instagram and facebook', 'instagram'],
    ['newsletter', null],
    [null, null],
  ])('tagFor(%p) → %p', (content, expected) => {
    expect(tagFor(content)).toBe(expected);
  });
});
