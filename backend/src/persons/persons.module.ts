import { Module } from '@nestjs/common';
import { PersonsController } from './persons.controller';
import { PersonsService } from './persons.service';
import { IdentityModule } from '../identity/identity.module';
import { AuthModule } from '../auth/auth.module';

@Module({
  imports: [IdentityModule, AuthModule],
  controllers: [PersonsController],
  providers: [PersonsService],
})
export class PersonsModule {}
