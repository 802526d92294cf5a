export const DEFAULT_TICKET_PRIORITY = 3;

/**
 * Ticket as exposed by the API. Deleting a ticket archives it.
 */
export class Ticket {
  id: number;
  ticketNumber: string;
  title: string;
  queueId: number;
  priorityId: number;
  customerCompanyId: string | null;
  customerLogin: string | null;
  archived: boolean;
  createdAt: Date;
  updatedAt: Date;

  constructor(data: {
    id: number;
    ticketNumber: string;
    title: string;
    queueId: number;
    priorityId: number;
    customerCompanyId: string | null;
    customerLogin: string | null;
    archived: boolean;
    createdAt: Date;
    updatedAt: Date;
  }) {
    this.id = data.id;
    this.ticketNumber = data.ticketNumber;
    this.title = data.title;
    this.queueId = data.queueId;
    this.priorityId = data.priorityId;
    this.customerCompanyId = data.customerCompanyId;
    this.customerLogin = data.customerLogin;
    this.archived = data.archived;
    this.createdAt = data.createdAt;
    this.updatedAt = data.updatedAt;
  }
}

export type NewTicket = Pick<
  Ticket,
  | 'ticketNumber'
  | 'title'
  | 'queueId'
  | 'priorityId'
  | 'customerCompanyId'
  | 'customerLogin'
>;
