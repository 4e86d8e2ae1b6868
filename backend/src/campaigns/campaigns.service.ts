import { Inject, Injectable, Logger } from '@nestjs/common';
import { IdentityResolver } from '../identity/identity-resolver';
import {
  ATTRIBUTION_GRAPH,
  AttributionGraph,
  CampaignRecord,
} from '../graph/attribution-graph';
import { CLOCK, Clock } from '../common/clock';
import { UpsertCampaignDto } from './dto/upsert-campaign.dto';

@Injectable()
export class CampaignsService {
  private readonly logger = new Logger(CampaignsService.name);

  constructor(
    @Inject(ATTRIBUTION_GRAPH) private readonly graph: AttributionGraph,
    private readonly resolver: IdentityResolver,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async upsert(dto: UpsertCampaignDto): Promise<CampaignRecord> {
    const upsert = this.resolver.resolveCampaign(dto);
    const campaign = await this.graph.mergeCampaign(
      upsert,
      this.clock().toISOString(),
    );

    this.logger.log(`Campaign upserted: ${campaign.id} (${campaign.campaign})`);
    return campaign;
  }
}
