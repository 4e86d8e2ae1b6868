// ============================================================
// Clickgraph — Auth Module
//
// Exports SharedSecretGuard for the ingestion routes and the
// proxy's catch-all route.
// ============================================================

import { Module } from '@nestjs/common';
import { SharedSecretGuard } from './guards/shared-secret.guard';

@Module({
  providers: [SharedSecretGuard],
  exports: [SharedSecretGuard],
})
export class AuthModule {}
