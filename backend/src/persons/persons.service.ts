// ============================================================
// Clickgraph — Persons Service
// ============================================================

import { Inject, Injectable, Logger } from '@nestjs/common';
import { IdentityResolver } from '../identity/identity-resolver';
import {
  ATTRIBUTION_GRAPH,
  AttributionGraph,
  PersonRecord,
} from '../graph/attribution-graph';
import { CLOCK, Clock } from '../common/clock';
import { UpsertPersonDto } from './dto/upsert-person.dto';

@Injectable()
export class PersonsService {
  private readonly logger = new Logger(PersonsService.name);

  constructor(
    @Inject(ATTRIBUTION_GRAPH) private readonly graph: AttributionGraph,
    private readonly resolver: IdentityResolver,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Create or update the :Person keyed on the resolved id.
   * Returns the node as stored after the merge.
   */
  async upsert(dto: UpsertPersonDto): Promise<PersonRecord> {
    const upsert = this.resolver.resolvePerson(dto);
    const person = await this.graph.mergePerson(
      upsert,
      this.clock().toISOString(),
    );

    this.logger.log(
      `Person upserted: ${person.id}` + (dto.id?.trim() ? '' : ' (generated id)'),
    );
    return person;
  }
}
