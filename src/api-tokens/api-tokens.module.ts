import { Module } from '@nestjs/common';
import { RelationalApiTokenPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { ApiTokensService } from './api-tokens.service';
import { VerificationCacheService } from './verification-cache.service';
import { ApiTokensController } from './api-tokens.controller';
import { ScopesModule } from '../auth/scopes/scopes.module';

@Module({
  imports: [RelationalApiTokenPersistenceModule, ScopesModule],
  providers: [ApiTokensService, VerificationCacheService],
  controllers: [ApiTokensController],
  exports: [ApiTokensService],
})
export class ApiTokensModule {}
