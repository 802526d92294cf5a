import { Module } from '@nestjs/common';
import { RelationalTicketPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { TicketsDomainService } from './domain/services/tickets.domain.service';
import { TicketsController } from './tickets.controller';

@Module({
  imports: [RelationalTicketPersistenceModule],
  controllers: [TicketsController],
  providers: [TicketsDomainService],
  exports: [TicketsDomainService],
})
export class TicketsModule {}
