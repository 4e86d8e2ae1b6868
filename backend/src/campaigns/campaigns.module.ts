import { Module } from '@nestjs/common';
import { CampaignsController } from './campaigns.controller';
import { CampaignsService } from './campaigns.service';
import { IdentityModule } from '../identity/identity.module';
import { AuthModule } from '../auth/auth.module';

@Module({
  imports: [IdentityModule, AuthModule],
  controllers: [CampaignsController],
  providers: [CampaignsService],
})
export class CampaignsModule {}
