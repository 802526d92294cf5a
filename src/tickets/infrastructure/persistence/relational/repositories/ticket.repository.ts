import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TicketEntity } from '../entities/ticket.entity';
import {
  TicketChanges,
  TicketRepository,
} from '../../../../domain/repositories/ticket.repository.port';
import { NewTicket, Ticket } from '../../../../domain/entities/ticket.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class TicketRelationalRepository implements TicketRepository {
  constructor(
    @InjectRepository(TicketEntity)
    private readonly repository: Repository<TicketEntity>,
  ) {}

  async findById(id: number): Promise<NullableType<Ticket>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  async create(data: NewTicket): Promise<Ticket> {
    const entity = this.repository.create({
      tn: data.ticketNumber,
      title: data.title,
      queueId: data.queueId,
      priorityId: data.priorityId,
      customerId: data.customerCompanyId,
      customerUserId: data.customerLogin,
      archiveFlag: 0,
    });

    const saved = await this.repository.save(entity);
    return this.toDomain(saved);
  }

  async update(
    id: number,
    changes: TicketChanges,
  ): Promise<NullableType<Ticket>> {
    const entity = await this.repository.findOne({ where: { id } });
    if (!entity) {
      return null;
    }

    if (changes.title !== undefined) {
      entity.title = changes.title;
    }
    if (changes.priorityId !== undefined) {
      entity.priorityId = changes.priorityId;
    }
    if (changes.queueId !== undefined) {
      entity.queueId = changes.queueId;
    }
    if (changes.archived !== undefined) {
      entity.archiveFlag = changes.archived ? 1 : 0;
    }

    const saved = await this.repository.save(entity);
    return this.toDomain(saved);
  }

  private toDomain(entity: TicketEntity): Ticket {
    return new Ticket({
      id: entity.id,
      ticketNumber: entity.tn,
      title: entity.title,
      queueId: entity.queueId,
      priorityId: entity.priorityId,
      customerCompanyId: entity.customerId,
      customerLogin: entity.customerUserId,
      archived: entity.archiveFlag === 1,
      createdAt: entity.createTime,
      updatedAt: entity.changeTime,
    });
  }
}
