import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ApiTokenEntity } from './entities/api-token.entity';
import { AgentUserEntity } from './entities/agent-user.entity';
import { CustomerUserEntity } from './entities/customer-user.entity';
import { GroupUserEntity } from '../../../../permissions/infrastructure/persistence/relational/entities/group-user.entity';
import { ApiTokenRepository } from '../../../domain/repositories/api-token.repository.port';
import { ApiTokenRelationalRepository } from './repositories/api-token.repository';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      ApiTokenEntity,
      AgentUserEntity,
      CustomerUserEntity,
      GroupUserEntity,
    ]),
  ],
  providers: [
    {
      provide: ApiTokenRepository,
      useClass: ApiTokenRelationalRepository,
    },
  ],
  exports: [ApiTokenRepository],
})
export class RelationalApiTokenPersistenceModule {}
