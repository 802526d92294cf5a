import { NullableType } from '../../../utils/types/nullable.type';
import { NewTicket, Ticket } from '../entities/ticket.entity';

export type TicketChanges = Partial<
  Pick<Ticket, 'title' | 'priorityId' | 'queueId' | 'archived'>
>;

export abstract class TicketRepository {
  abstract findById(id: number): Promise<NullableType<Ticket>>;

  abstract create(data: NewTicket): Promise<Ticket>;

  /** Returns null when the ticket does not exist */
  abstract update(
    id: number,
    changes: TicketChanges,
  ): Promise<NullableType<Ticket>>;
}
