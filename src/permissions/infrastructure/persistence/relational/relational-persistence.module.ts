import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PermissionStore } from '../../../domain/repositories/permission-store.port';
import { PermissionStoreRelationalRepository } from './repositories/permission-store.repository';
import { GroupEntity } from './entities/group.entity';
import { QueueEntity } from './entities/queue.entity';
import { GroupUserEntity } from './entities/group-user.entity';
import { GroupCustomerEntity } from './entities/group-customer.entity';
import { GroupCustomerUserEntity } from './entities/group-customer-user.entity';
import { TicketEntity } from '../../../../tickets/infrastructure/persistence/relational/entities/ticket.entity';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      GroupEntity,
      QueueEntity,
      GroupUserEntity,
      GroupCustomerEntity,
      GroupCustomerUserEntity,
      TicketEntity,
    ]),
  ],
  providers: [
    {
      provide: PermissionStore,
      useClass: PermissionStoreRelationalRepository,
    },
  ],
  exports: [PermissionStore],
})
export class RelationalPermissionsPersistenceModule {}
