export type TicketAction = 'read' | 'update' | 'delete' | 'note' | 'priority';
export type QueueAction = 'create' | 'move_into';

export type ResourceRule =
  | { kind: 'ticket'; action: TicketAction }
  | { kind: 'queue'; action: QueueAction };

/**
 * A resource rule bound to the ids taken from the request.
 * `ticketId` is the route ticket; `queueId` the target queue.
 */
export type ResourceTarget =
  | { kind: 'ticket'; action: TicketAction; ticketId: number }
  | { kind: 'queue'; action: 'create'; queueId: number }
  | { kind: 'queue'; action: 'move_into'; ticketId: number; queueId: number };

/**
 * The caller as seen by resource checks.
 */
export interface AccessSubject {
  kind: 'agent' | 'customer';
  principalId: number;
  customerLogin?: string;
  customerCompanyId?: string;
}

/** hide = 404, forbid = 403 */
export type AccessDecision = 'allow' | 'hide' | 'forbid';
