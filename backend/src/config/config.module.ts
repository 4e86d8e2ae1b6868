// ============================================================
// Clickgraph — Config Module
//
// Global so guards and infrastructure services in any feature
// module can inject ConfigService.
// ============================================================
import { Global, Module } from '@nestjs/common';
import { ConfigService } from './config.service';

@Global()
@Module({
  providers: [ConfigService],
  exports: [ConfigService],
})
export class ConfigModule {}
