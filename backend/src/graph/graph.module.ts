// ============================================================
// Clickgraph — Graph Module
//
// Global: every feature module injects ATTRIBUTION_GRAPH.
// Tests swap the Neo4j implementation for an in-memory one via
// overrideProvider(ATTRIBUTION_GRAPH).
// ============================================================

import { Global, Module } from '@nestjs/common';
import { Neo4jService } from './neo4j.service';
import { Neo4jAttributionGraph } from './neo4j-attribution.graph';
import { ATTRIBUTION_GRAPH } from './attribution-graph';

@Global()
@Module({
  providers: [
    Neo4jService,
    { provide: ATTRIBUTION_GRAPH, useClass: Neo4jAttributionGraph },
  ],
  exports: [ATTRIBUTION_GRAPH],
})
export class GraphModule {}
