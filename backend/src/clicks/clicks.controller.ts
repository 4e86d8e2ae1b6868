// ============================================================
// Clickgraph — Clicks Controller
// Routes: POST /clicked_on, GET /sample
// ============================================================

import { Body, Controller, Get, Post, Query, UseGuards } from '@nestjs/common';
import { ClicksService } from './clicks.service';
import { RecordClickDto } from './dto/record-click.dto';
import { SampleQueryDto } from './dto/sample-query.dto';
import { extraAttributionOf } from './extra-attribution';
import { SharedSecretGuard } from '../auth/guards/shared-secret.guard';

@Controller()
@UseGuards(SharedSecretGuard)
export class ClicksController {
  constructor(private readonly clicksService: ClicksService) {}

  /**
   * POST /clicked_on
   *
   *   Request:  { person_id?, campaign_id?, id?, source?, medium?,
   *               term?, content?, device?, date?, ...extra }
   *   Response: the created ClickEvent (201), extra keys under `extra`
   *
   * `body` is the unvalidated payload (ValidationPipe skips plain
   * object params); only its undeclared keys are read.
   */
  @Post('clicked_on')
  async record(@Body() dto: RecordClickDto, @Body() body: object) {
    return this.clicksService.record(dto, extraAttributionOf(body));
  }

  /**
   * GET /sample?limit=10
   *
   * Most recent clicks first, with person and campaign summaries.
   */
  @Get('sample')
  async sample(@Query() query: SampleQueryDto) {
    return this.clicksService.sample(query.limit);
  }
}
