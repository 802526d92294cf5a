import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TicketEntity } from './entities/ticket.entity';
import { TicketRepository } from '../../../domain/repositories/ticket.repository.port';
import { TicketRelationalRepository } from './repositories/ticket.repository';

@Module({
  imports: [TypeOrmModule.forFeature([TicketEntity])],
  providers: [
    {
      provide: TicketRepository,
      useClass: TicketRelationalRepository,
    },
  ],
  exports: [TicketRepository],
})
export class RelationalTicketPersistenceModule {}
