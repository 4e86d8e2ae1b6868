// ============================================================
// Clickgraph — Ids Service
//
// Exposes Neo4j-assigned element ids for :Person nodes, either
// alone or mapped from the external Person.id. Used by
// downstream jobs that address nodes by elementId().
// ============================================================

import { Inject, Injectable } from '@nestjs/common';
import {
  ATTRIBUTION_GRAPH,
  AttributionGraph,
  Page,
  PageRequest,
  PersonIdMapping,
} from '../graph/attribution-graph';
import { IDS_DEFAULT_LIMIT } from './dto/person-ids-query.dto';

@Injectable()
export class IdsService {
  constructor(
    @Inject(ATTRIBUTION_GRAPH) private readonly graph: AttributionGraph,
  ) {}

  async internalIds(
    skip: number | undefined,
    limit: number | undefined,
    onlyConnected: boolean,
  ): Promise<Page<string>> {
    const page = pageOf(skip, limit);
    const items = await this.graph.listPersonElementIds(page, onlyConnected);
    return { items, next_skip: page.skip + page.limit };
  }

  async idMap(
    skip: number | undefined,
    limit: number | undefined,
  ): Promise<Page<PersonIdMapping>> {
    const page = pageOf(skip, limit);
    const items = await this.graph.listPersonIdMap(page);
    return { items, next_skip: page.skip + page.limit };
  }
}

function pageOf(skip: number | undefined, limit: number | undefined): PageRequest {
  return { skip: skip ?? 0, limit: limit ?? IDS_DEFAULT_LIMIT };
}
