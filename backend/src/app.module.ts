// ============================================================
// Clickgraph — Ingestion API Root Module
//
// Global providers: CLOCK (server timestamps), the throttler
// guard and the per-request deadline interceptor.
// ============================================================
import { Module, Global } from '@nestjs/common';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule } from './config/config.module';
import { ConfigService } from './config/config.service';
import { GraphModule } from './graph/graph.module';
import { HealthModule } from './health/health.module';
import { PersonsModule } from './persons/persons.module';
import { CampaignsModule } from './campaigns/campaigns.module';
import { ClicksModule } from './clicks/clicks.module';
import { IdsModule } from './ids/ids.module';
import { DeadlineInterceptor } from './common/interceptors/deadline.interceptor';
import { CLOCK, systemClock } from './common/clock';

@Global()
@Module({
  imports: [
    ConfigModule,

    // ── Rate Limiting ───────────────────────────────────
    // Per-IP window; sized for batch senders, not browsers.
    // Health probes skip it with @SkipThrottle().
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const { ttlMs, limit } = config.throttle;
        return [{ name: 'default', ttl: ttlMs, limit }];
      },
    }),

    GraphModule,

    // Feature modules
    HealthModule,
    PersonsModule,
    CampaignsModule,
    ClicksModule,
    IdsModule,
  ],
  providers: [
    { provide: CLOCK, useValue: systemClock },
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    { provide: APP_INTERCEPTOR, useClass: DeadlineInterceptor },
  ],
  exports: [CLOCK],
})
export class AppModule {}
