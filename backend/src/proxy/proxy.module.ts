// ============================================================
// Clickgraph — Forwarding Proxy Root Module
//
// A separate deployment from AppModule: no graph store, no
// throttler. Only the shared-secret guard and the relay.
// ============================================================

import { Module } from '@nestjs/common';
import axios from 'axios';
import { ConfigModule } from '../config/config.module';
import { AuthModule } from '../auth/auth.module';
import { CLOCK, systemClock } from '../common/clock';
import { ProxyController } from './proxy.controller';
import { ProxyService, UPSTREAM_HTTP } from './proxy.service';
import {
  GoogleIdTokenSource,
  ID_TOKEN_SOURCE,
  IdTokenService,
} from './id-token.service';

@Module({
  imports: [ConfigModule, AuthModule],
  controllers: [ProxyController],
  providers: [
    ProxyService,
    IdTokenService,
    { provide: ID_TOKEN_SOURCE, useClass: GoogleIdTokenSource },
    { provide: UPSTREAM_HTTP, useFactory: () => axios.create() },
    { provide: CLOCK, useValue: systemClock },
  ],
})
export class ProxyModule {}
