import { ApiProperty } from '@nestjs/swagger';
import { Ticket } from '../domain/entities/ticket.entity';

export class TicketResponseDto {
  @ApiProperty({ example: 100 })
  id: number;

  @ApiProperty({ example: '2026101912345678' })
  ticketNumber: string;

  @ApiProperty()
  title: string;

  @ApiProperty({ example: 1 })
  queueId: number;

  @ApiProperty({ example: 3 })
  priorityId: number;

  @ApiProperty({ type: String, nullable: true, example: 'acme' })
  customerCompanyId: string | null;

  @ApiProperty({ type: String, nullable: true, example: 'jdoe' })
  customerLogin: string | null;

  @ApiProperty()
  createdAt: Date;

  @ApiProperty()
  updatedAt: Date;

  constructor(ticket: Ticket) {
    this.id = ticket.id;
    this.ticketNumber = ticket.ticketNumber;
    this.title = ticket.title;
    this.queueId = ticket.queueId;
    this.priorityId = ticket.priorityId;
    this.customerCompanyId = ticket.customerCompanyId;
    this.customerLogin = ticket.customerLogin;
    this.createdAt = ticket.createdAt;
    this.updatedAt = ticket.updatedAt;
  }
}
