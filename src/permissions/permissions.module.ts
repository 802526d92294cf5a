import { Module } from '@nestjs/common';
import { RelationalPermissionsPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { PermissionDomainService } from './domain/services/permission.domain.service';
import { ResourceAccessService } from './resource-access.service';

@Module({
  imports: [RelationalPermissionsPersistenceModule],
  providers: [PermissionDomainService, ResourceAccessService],
  exports: [PermissionDomainService, ResourceAccessService],
})
export class PermissionsModule {}
