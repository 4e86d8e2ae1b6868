// ============================================================
// Clickgraph — Forwarding Proxy Bootstrap
// ============================================================
import 'dotenv/config';
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { raw } from 'express';
import { ProxyModule } from './proxy/proxy.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { ConfigService } from './config/config.service';

async function bootstrap() {
  const logger = new Logger('Proxy');
  // Body parsing off: every payload is relayed as raw bytes.
  const app = await NestFactory.create(ProxyModule, { bodyParser: false });
  const config = app.get(ConfigService);
  const settings = config.proxy();

  app.use(raw({ type: () => true, limit: settings.bodyLimit }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  const port = config.port;
  await app.listen(port);

  logger.log(`Forwarding proxy listening on :${port}`);
  logger.log(`Target            ${settings.targetUrl}`);
  logger.log(`Audience          ${settings.audience}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Proxy').error(
    'Startup failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
