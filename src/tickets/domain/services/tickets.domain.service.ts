import { Injectable, Logger } from '@nestjs/common';
import { randomInt } from 'crypto';
import {
  TicketChanges,
  TicketRepository,
} from '../repositories/ticket.repository.port';
import { DEFAULT_TICKET_PRIORITY, Ticket } from '../entities/ticket.entity';
import { ApiException } from '../../../api-errors/api.exception';
import { ApiErrorCode } from '../../../api-errors/api-error-codes';

export interface OpenTicketData {
  title: string;
  queueId: number;
  priorityId?: number;
  customerCompanyId?: string;
  customerLogin?: string;
}

/**
 * Ticket operations behind the guarded routes. Access was decided by the
 * gateway before any of these run; archived tickets read as missing.
 */
@Injectable()
export class TicketsDomainService {
  private readonly logger = new Logger(TicketsDomainService.name);

  constructor(private readonly ticketRepository: TicketRepository) {}

  async findById(id: number): Promise<Ticket> {
    const ticket = await this.ticketRepository.findById(id);
    if (!ticket || ticket.archived) {
      throw new ApiException(ApiErrorCode.NotFound);
    }
    return ticket;
  }

  async open(data: OpenTicketData, now: Date = new Date()): Promise<Ticket> {
    const ticket = await this.ticketRepository.create({
      ticketNumber: generateTicketNumber(now),
      title: data.title,
      queueId: data.queueId,
      priorityId: data.priorityId ?? DEFAULT_TICKET_PRIORITY,
      customerCompanyId: data.customerCompanyId ?? null,
      customerLogin: data.customerLogin ?? null,
    });
    this.logger.log(`Ticket ${ticket.id} opened in queue ${ticket.queueId}`);
    return ticket;
  }

  rename(id: number, title: string): Promise<Ticket> {
    return this.change(id, { title });
  }

  changePriority(id: number, priorityId: number): Promise<Ticket> {
    return this.change(id, { priorityId });
  }

  moveToQueue(id: number, queueId: number): Promise<Ticket> {
    return this.change(id, { queueId });
  }

  async archive(id: number): Promise<void> {
    await this.change(id, { archived: true });
    this.logger.log(`Ticket ${id} archived`);
  }

  private async change(id: number, changes: TicketChanges): Promise<Ticket> {
    await this.findById(id);
    const updated = await this.ticketRepository.update(id, changes);
    if (!updated) {
      throw new ApiException(ApiErrorCode.NotFound);
    }
    return updated;
  }
}

/** `YYYYMMDD` followed by eight random digits */
export function generateTicketNumber(now: Date): string {
  const date = [
    now.getUTCFullYear(),
    String(now.getUTCMonth() + 1).padStart(2, '0'),
    String(now.getUTCDate()).padStart(2, '0'),
  ].join('');
  return `${date}${String(randomInt(0, 100_000_000)).padStart(8, '0')}`;
}
