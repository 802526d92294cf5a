import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PermissionStore } from '../../../../domain/repositories/permission-store.port';
import { TicketAccess } from '../../../../domain/entities/ticket-access.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { QueueEntity } from '../entities/queue.entity';
import { GroupUserEntity } from '../entities/group-user.entity';
import { GroupCustomerEntity } from '../entities/group-customer.entity';
import { GroupCustomerUserEntity } from '../entities/group-customer-user.entity';
import { TicketEntity } from '../../../../../tickets/infrastructure/persistence/relational/entities/ticket.entity';

interface TicketAccessRow {
  ticketId: number;
  queueId: number;
  groupId: number;
  customerCompanyId: string | null;
}

/** Customer grant rows only count with a set permission value */
const GRANTED = 1;

@Injectable()
export class PermissionStoreRelationalRepository implements PermissionStore {
  constructor(
    @InjectRepository(TicketEntity)
    private readonly tickets: Repository<TicketEntity>,
    @InjectRepository(QueueEntity)
    private readonly queues: Repository<QueueEntity>,
    @InjectRepository(GroupUserEntity)
    private readonly groupUsers: Repository<GroupUserEntity>,
    @InjectRepository(GroupCustomerEntity)
    private readonly groupCustomers: Repository<GroupCustomerEntity>,
    @InjectRepository(GroupCustomerUserEntity)
    private readonly groupCustomerUsers: Repository<GroupCustomerUserEntity>,
  ) {}

  async findTicketAccess(
    ticketId: number,
  ): Promise<NullableType<TicketAccess>> {
    const row = await this.tickets
      .createQueryBuilder('ticket')
      .innerJoin(QueueEntity, 'queue', 'queue.id = ticket.queue_id')
      .select('ticket.id', 'ticketId')
      .addSelect('ticket.queue_id', 'queueId')
      .addSelect('queue.group_id', 'groupId')
      .addSelect('ticket.customer_id', 'customerCompanyId')
      .where('ticket.id = :ticketId', { ticketId })
      .getRawOne<TicketAccessRow>();

    if (!row) {
      return null;
    }

    return new TicketAccess({
      ticketId: Number(row.ticketId),
      queueId: Number(row.queueId),
      groupId: Number(row.groupId),
      customerCompanyId: row.customerCompanyId || null,
    });
  }

  async findQueueGroupId(queueId: number): Promise<NullableType<number>> {
    const queue = await this.queues.findOne({
      where: { id: queueId },
      select: { id: true, groupId: true },
    });
    return queue ? queue.groupId : null;
  }

  async findAgentGrants(agentId: number, groupId: number): Promise<string[]> {
    const rows = await this.groupUsers.find({
      where: { userId: agentId, groupId },
      select: { permissionKey: true },
    });
    return rows.map((row) => row.permissionKey);
  }

  async findCompanyGrants(
    customerCompanyId: string,
    groupId: number,
  ): Promise<string[]> {
    const rows = await this.groupCustomers.find({
      where: {
        customerId: customerCompanyId,
        groupId,
        permissionValue: GRANTED,
      },
      select: { permissionKey: true },
    });
    return rows.map((row) => row.permissionKey);
  }

  async findCustomerUserGrants(
    customerLogin: string,
    groupId: number,
  ): Promise<string[]> {
    const rows = await this.groupCustomerUsers.find({
      where: { customerLogin, groupId, permissionValue: GRANTED },
      select: { permissionKey: true },
    });
    return rows.map((row) => row.permissionKey);
  }
}
