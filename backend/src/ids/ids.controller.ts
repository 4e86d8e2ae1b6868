import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { IdsService } from './ids.service';
import {
  PersonIdsQueryDto,
  PersonInternalIdsQueryDto,
} from './dto/person-ids-query.dto';
import { SharedSecretGuard } from '../auth/guards/shared-secret.guard';

@Controller('ids/person')
@UseGuards(SharedSecretGuard)
export class IdsController {
  constructor(private readonly idsService: IdsService) {}

  /**
   * GET /ids/person/internal?only_connected=&skip=&limit=
   *   Response: { items: ["<elementId>", ...], next_skip }
   */
  @Get('internal')
  async internal(@Query() query: PersonInternalIdsQueryDto) {
    return this.idsService.internalIds(
      query.skip,
      query.limit,
      query.only_connected === 'true',
    );
  }

  /**
   * GET /ids/person/map?skip=&limit=
   *   Response: { items: [{ external_id, neo4j_id }], next_skip }
   */
  @Get('map')
  async map(@Query() query: PersonIdsQueryDto) {
    return this.idsService.idMap(query.skip, query.limit);
  }
}
