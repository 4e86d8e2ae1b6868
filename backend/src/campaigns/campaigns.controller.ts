import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { CampaignsService } from './campaigns.service';
import { UpsertCampaignDto } from './dto/upsert-campaign.dto';
import { SharedSecretGuard } from '../auth/guards/shared-secret.guard';

@Controller('campaign')
@UseGuards(SharedSecretGuard)
export class CampaignsController {
  constructor(private readonly campaignsService: CampaignsService) {}

  /**
   * POST /campaign
   *
   *   Request:  { id?, campaign? }
   *   Response: { id, campaign }
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async upsert(@Body() dto: UpsertCampaignDto) {
    return this.campaignsService.upsert(dto);
  }
}
