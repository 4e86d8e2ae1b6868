// ============================================================
// Clickgraph — Neo4jService
//
// Owns the neo4j-driver instance for the ingestion API.
// Connects with retries on startup (cold-started databases
// often refuse the first attempt), creates the uniqueness
// constraints MERGE relies on, and closes the pool on shutdown.
//
// Every query runs in one managed transaction bounded by the
// configured transaction timeout. Connectivity failures and
// timeouts surface as UpstreamUnavailableException; nothing is
// retried here.
// ============================================================

import {
  HttpStatus,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import neo4j, { Driver, Neo4jError, RecordShape } from 'neo4j-driver';
import { ConfigService, Neo4jSettings } from '../config/config.service';
import { UpstreamUnavailableException } from '../common/errors';
import { SCHEMA_QUERIES } from './cypher';
import type { WriteStats } from './attribution-graph';

const CONNECT_ATTEMPTS = 3;

export type QueryParams = Record<string, unknown>;

export interface GraphResult<T> {
  rows: T[];
  stats: WriteStats;
}

@Injectable()
export class Neo4jService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(Neo4jService.name);
  private driver: Driver | null = null;
  private settings: Neo4jSettings | null = null;

  constructor(private readonly config: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const settings = this.config.neo4j();
    this.settings = settings;
    this.driver = neo4j.driver(
      settings.uri,
      neo4j.auth.basic(settings.username, settings.password),
      {
        disableLosslessIntegers: true,
        connectionAcquisitionTimeout: settings.txTimeoutMs,
        // Managed transactions otherwise retry transient failures for
        // up to 30 s before surfacing them.
        maxTransactionRetryTime: 0,
      },
    );

    let lastError: Error | undefined;
    for (let attempt = 1; attempt <= CONNECT_ATTEMPTS; attempt++) {
      try {
        await this.driver.verifyConnectivity({ database: settings.database });
        this.logger.log(`Connected to Neo4j (${settings.database})`);
        lastError = undefined;
        break;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(
          `Connection attempt ${attempt}/${CONNECT_ATTEMPTS} failed: ${lastError.message}`,
        );
        if (attempt < CONNECT_ATTEMPTS) {
          await new Promise((r) => setTimeout(r, 2000 * attempt));
        }
      }
    }
    if (lastError) {
      this.logger.error(
        `Failed to connect to Neo4j after ${CONNECT_ATTEMPTS} attempts`,
      );
      throw lastError;
    }

    if (settings.ensureSchema) {
      await this.ensureSchema();
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
      this.logger.log('Disconnected from Neo4j');
    }
  }

  read<T extends RecordShape>(
    cypher: string,
    params: QueryParams = {},
  ): Promise<GraphResult<T>> {
    return this.run<T>('READ', cypher, params);
  }

  write<T extends RecordShape>(
    cypher: string,
    params: QueryParams = {},
  ): Promise<GraphResult<T>> {
    return this.run<T>('WRITE', cypher, params);
  }

  private async ensureSchema(): Promise<void> {
    const { driver, settings } = this.connection();
    const session = driver.session({ database: settings.database });
    try {
      for (const statement of SCHEMA_QUERIES) {
        await session.run(statement);
      }
      this.logger.log(`Schema ensured (${SCHEMA_QUERIES.length} statements)`);
    } finally {
      await session.close();
    }
  }

  private async run<T extends RecordShape>(
    mode: 'READ' | 'WRITE',
    cypher: string,
    params: QueryParams,
  ): Promise<GraphResult<T>> {
    const { driver, settings } = this.connection();
    const session = driver.session({
      database: settings.database,
      defaultAccessMode: mode === 'READ' ? neo4j.session.READ : neo4j.session.WRITE,
    });
    const txConfig = { timeout: settings.txTimeoutMs };

    try {
      const result =
        mode === 'READ'
          ? await session.executeRead(
              async (tx) => await tx.run<T>(cypher, params),
              txConfig,
            )
          : await session.executeWrite(
              async (tx) => await tx.run<T>(cypher, params),
              txConfig,
            );

      const updates = result.summary.counters.updates();
      return {
        rows: result.records.map((record) => record.toObject()),
        stats: {
          nodesCreated: updates.nodesCreated,
          relationshipsCreated: updates.relationshipsCreated,
        },
      };
    } catch (error) {
      throw translateError(error);
    } finally {
      await session.close();
    }
  }

  private connection(): { driver: Driver; settings: Neo4jSettings } {
    if (!this.driver || !this.settings) {
      throw new UpstreamUnavailableException('Graph store is not connected');
    }
    return { driver: this.driver, settings: this.settings };
  }
}

/**
 * Map driver failures onto the service's error taxonomy. Errors that
 * are not about reachability (syntax, constraint) pass through and
 * become 500s.
 */
export function translateError(error: unknown): unknown {
  if (!(error instanceof Neo4jError)) {
    return error;
  }
  if (
    error.code === neo4j.error.SERVICE_UNAVAILABLE ||
    error.code === neo4j.error.SESSION_EXPIRED
  ) {
    return new UpstreamUnavailableException('Graph store unavailable', undefined, {
      cause: error,
    });
  }
  if (error.code.startsWith('Neo.ClientError.Transaction.TransactionTimedOut')) {
    return new UpstreamUnavailableException(
      'Graph store did not answer in time',
      HttpStatus.GATEWAY_TIMEOUT,
      { cause: error },
    );
  }
  return error;
}
