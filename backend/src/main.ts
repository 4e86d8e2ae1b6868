// ============================================================
// Clickgraph — Ingestion API Bootstrap
// ============================================================
import 'dotenv/config';
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { ConfigService } from './config/config.service';
import { createValidationPipe } from './common/pipes/validation.pipe';

async function bootstrap() {
  const logger = new Logger('Ingestion');
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);

  // ── Security Headers ────────────────────────────────────
  app.use(helmet());

  // ── Validation ──────────────────────────────────────────
  // Malformed payloads are rejected here, before any resolver
  // or graph code runs.
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  const port = config.port;
  await app.listen(port);

  logger.log(`Ingestion API listening on :${port}`);
  logger.log(`Environment       ${config.environment}`);
  logger.log(`Request deadline  ${config.requestDeadlineMs} ms`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Ingestion').error(
    'Startup failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
