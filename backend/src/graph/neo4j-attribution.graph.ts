import { Injectable } from '@nestjs/common';
import neo4j from 'neo4j-driver';
import { Neo4jService } from './neo4j.service';
import { CYPHER } from './cypher';
import { UNKNOWN } from '../identity/identity-resolver';
import type { CampaignUpsert, PersonUpsert } from '../identity/identity-resolver';
import { ATTRIBUTION_KEYS, CLICK_SYSTEM_KEYS } from './attribution-graph';
import type {
  AttributionGraph,
  CampaignRecord,
  ClickEvent,
  ClickSample,
  ExtraAttribution,
  NewClick,
  PageRequest,
  PersonIdMapping,
  PersonRecord,
  WriteStats,
} from './attribution-graph';

type Nullable = string | null;

// Row shapes are type literals: the driver's RecordShape needs an
// index signature, which interfaces do not carry.
type PersonRow = {
  id: string;
  name: string;
  email: string;
  contact_number: string;
};

type CampaignRow = { id: string; campaign: string };

type ClickRow = {
  id: string;
  person_id: string;
  campaign_id: string;
  clicked_at: string;
  source: Nullable;
  medium: Nullable;
  term: Nullable;
  content: Nullable;
  device: Nullable;
  date: Nullable;
  tag: Nullable;
  props: Record<string, unknown>;
};

type SampleRow = {
  id: string;
  clicked_at: string;
  person_id: string;
  person_name: string;
  campaign_id: string;
  campaign: string;
  source: Nullable;
  medium: Nullable;
  term: Nullable;
  content: Nullable;
  device: Nullable;
  date: Nullable;
  tag: Nullable;
  props: Record<string, unknown>;
};

type ElementIdRow = { neo4j_id: string };
type IdMapRow = { external_id: Nullable; neo4j_id: string };

@Injectable()
export class Neo4jAttributionGraph implements AttributionGraph {
  constructor(private readonly neo4jService: Neo4jService) {}

  async mergePerson(upsert: PersonUpsert, at: string): Promise<PersonRecord> {
    const { rows } = await this.neo4jService.write<PersonRow>(
      CYPHER.MERGE_PERSON,
      { id: upsert.id, ...upsert.fields, at, unknown: UNKNOWN },
    );
    return single(rows, 'MERGE_PERSON');
  }

  async mergeCampaign(
    upsert: CampaignUpsert,
    at: string,
  ): Promise<CampaignRecord> {
    const { rows } = await this.neo4jService.write<CampaignRow>(
      CYPHER.MERGE_CAMPAIGN,
      { id: upsert.id, ...upsert.fields, at, unknown: UNKNOWN },
    );
    return single(rows, 'MERGE_CAMPAIGN');
  }

  async createClick(
    click: NewClick,
  ): Promise<{ event: ClickEvent; stats: WriteStats }> {
    const { rows, stats } = await this.neo4jService.write<ClickRow>(
      CYPHER.CREATE_CLICK,
      {
        id: click.id,
        person_id: click.personId,
        campaign_id: click.campaignId,
        clicked_at: click.clickedAt,
        tag: click.tag,
        attribution: { ...click.attribution, ...click.extra },
        unknown: UNKNOWN,
      },
    );
    const { props, ...event } = single(rows, 'CREATE_CLICK');
    return { event: { ...event, extra: extraOf(props) }, stats };
  }

  async sampleClicks(limit: number): Promise<ClickSample[]> {
    const { rows } = await this.neo4jService.read<SampleRow>(
      CYPHER.SAMPLE_CLICKS,
      { limit: neo4j.int(limit) },
    );

    return rows.map((r) => ({
      id: r.id,
      clicked_at: r.clicked_at,
      person: { id: r.person_id, name: r.person_name },
      campaign: { id: r.campaign_id, campaign: r.campaign },
      source: r.source,
      medium: r.medium,
      term: r.term,
      content: r.content,
      device: r.device,
      date: r.date,
      tag: r.tag,
      extra: extraOf(r.props),
    }));
  }

  async listPersonElementIds(
    page: PageRequest,
    onlyConnected: boolean,
  ): Promise<string[]> {
    const { rows } = await this.neo4jService.read<ElementIdRow>(
      CYPHER.PERSON_ELEMENT_IDS,
      {
        only_connected: onlyConnected,
        skip: neo4j.int(page.skip),
        limit: neo4j.int(page.limit),
      },
    );
    return rows.map((r) => r.neo4j_id);
  }

  async listPersonIdMap(page: PageRequest): Promise<PersonIdMapping[]> {
    const { rows } = await this.neo4jService.read<IdMapRow>(
      CYPHER.PERSON_ID_MAP,
      { skip: neo4j.int(page.skip), limit: neo4j.int(page.limit) },
    );
    return rows.map((r) => ({
      external_id: r.external_id,
      neo4j_id: r.neo4j_id,
    }));
  }

  async ping(): Promise<void> {
    await this.neo4jService.read(CYPHER.PING);
  }
}

const NAMED_KEYS = new Set<string>([...CLICK_SYSTEM_KEYS, ...ATTRIBUTION_KEYS]);

/** Edge properties that are neither server-set nor named attribution. */
function extraOf(props: Record<string, unknown>): ExtraAttribution {
  const extra: ExtraAttribution = {};
  for (const [key, value] of Object.entries(props)) {
    if (NAMED_KEYS.has(key)) continue;
    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      extra[key] = value;
    }
  }
  return extra;
}

function single<T>(rows: T[], statement: string): T {
  const [row] = rows;
  if (row === undefined) {
    throw new Error(`${statement} returned no rows`);
  }
  return row;
}
