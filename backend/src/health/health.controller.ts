// ============================================================
// Clickgraph — Health Controller
// Routes: GET /healthz, GET /readyz
//
// /healthz is a liveness probe and never touches the store.
// /readyz answers 503 while Neo4j is unreachable.
// ============================================================

import { Controller, Get, Inject, Logger } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { ATTRIBUTION_GRAPH, AttributionGraph } from '../graph/attribution-graph';
import { UpstreamUnavailableException } from '../common/errors';

@Controller()
@SkipThrottle()
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    @Inject(ATTRIBUTION_GRAPH) private readonly graph: AttributionGraph,
  ) {}

  @Get('healthz')
  health() {
    return { ok: true };
  }

  @Get('readyz')
  async ready() {
    try {
      await this.graph.ping();
    } catch (error) {
      this.logger.warn(
        `Readiness check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new UpstreamUnavailableException('Graph store unreachable', undefined, {
        cause: error,
      });
    }
    return { ok: true, graph: true };
  }
}
