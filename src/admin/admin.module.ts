import { Module } from '@nestjs/common';
import { ScopesModule } from '../auth/scopes/scopes.module';
import { AdminController } from './admin.controller';

@Module({
  imports: [ScopesModule],
  controllers: [AdminController],
})
export class AdminModule {}
