import { Module } from '@nestjs/common';
import { ClicksController } from './clicks.controller';
import { ClicksService } from './clicks.service';
import { IdentityModule } from '../identity/identity.module';
import { AuthModule } from '../auth/auth.module';

@Module({
  imports: [IdentityModule, AuthModule],
  controllers: [ClicksController],
  providers: [ClicksService],
})
export class ClicksModule {}
