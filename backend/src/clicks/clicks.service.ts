// ============================================================
// Clickgraph — Clicks Service
// Click attribution ingestion and sampling
//
// RecordClick never drops attribution data for want of a name:
// missing endpoints become "Unknown" placeholder nodes, created
// in the same transaction as the edge. Edges are append-only;
// two identical submissions produce two edges.
// ============================================================

import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import { IdentityResolver, normalize } from '../identity/identity-resolver';
import {
  ATTRIBUTION_GRAPH,
  ATTRIBUTION_KEYS,
  AttributionFields,
  AttributionGraph,
  ClickEvent,
  ClickSample,
  ExtraAttribution,
} from '../graph/attribution-graph';
import { CLOCK, Clock } from '../common/clock';
import { RecordClickDto } from './dto/record-click.dto';
import { SAMPLE_DEFAULT_LIMIT } from './dto/sample-query.dto';

/** Platforms recognised in ad content, checked in order. */
const CONTENT_TAGS = ['instagram', 'facebook'] as const;

@Injectable()
export class ClicksService {
  private readonly logger = new Logger(ClicksService.name);

  constructor(
    @Inject(ATTRIBUTION_GRAPH) private readonly graph: AttributionGraph,
    private readonly resolver: IdentityResolver,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async record(
    dto: RecordClickDto,
    extra: ExtraAttribution = {},
  ): Promise<ClickEvent> {
    const attribution = this.attributionOf(dto);
    const personRef = normalize(dto.person_id);
    const campaignRef = normalize(dto.campaign_id);
    const clickRef = normalize(dto.id);

    if (
      personRef === null &&
      campaignRef === null &&
      clickRef === null &&
      ATTRIBUTION_KEYS.every((key) => attribution[key] === null) &&
      Object.keys(extra).length === 0
    ) {
      throw new BadRequestException(
        'Click payload is empty: provide person_id, campaign_id or attribution fields',
      );
    }

    const { event, stats } = await this.graph.createClick({
      id: clickRef ?? `clk_${randomUUID().replace(/-/g, '')}`,
      personId: this.resolver.resolveReference('person', personRef),
      campaignId: this.resolver.resolveReference('campaign', campaignRef),
      clickedAt: this.clock().toISOString(),
      tag: tagFor(attribution.content),
      attribution,
      extra,
    });

    this.logger.log(
      `Click recorded: ${event.person_id} → ${event.campaign_id} (${event.id})`,
    );
    this.logger.debug(
      `Click write stats: nodes_created=${stats.nodesCreated} rels_created=${stats.relationshipsCreated}`,
    );

    return event;
  }

  async sample(limit: number = SAMPLE_DEFAULT_LIMIT): Promise<ClickSample[]> {
    return this.graph.sampleClicks(limit);
  }

  private attributionOf(dto: RecordClickDto): AttributionFields {
    return {
      source: normalize(dto.source),
      medium: normalize(dto.medium),
      term: normalize(dto.term),
      content: normalize(dto.content),
      device: normalize(dto.device),
      date: normalize(dto.date),
    };
  }
}

/** Derive the platform tag from ad content (case-insensitive). */
export function tagFor(content: string | null): string | null {
  if (content === null) return null;
  const lowered = content.toLowerCase();
  return CONTENT_TAGS.find((tag) => lowered.includes(tag)) ?? null;
}
