/**
 * What the permission checks need to know about a ticket.
 */
export class TicketAccess {
  ticketId: number;
  queueId: number;
  groupId: number;
  /** Customer company owning the ticket, if any */
  customerCompanyId: string | null;

  constructor(data: {
    ticketId: number;
    queueId: number;
    groupId: number;
    customerCompanyId: string | null;
  }) {
    this.ticketId = data.ticketId;
    this.queueId = data.queueId;
    this.groupId = data.groupId;
    this.customerCompanyId = data.customerCompanyId;
  }
}
