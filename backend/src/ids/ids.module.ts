import { Module } from '@nestjs/common';
import { IdsController } from './ids.controller';
import { IdsService } from './ids.service';
import { AuthModule } from '../auth/auth.module';

@Module({
  imports: [AuthModule],
  controllers: [IdsController],
  providers: [IdsService],
})
export class IdsModule {}
