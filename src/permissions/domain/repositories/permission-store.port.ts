import { NullableType } from '../../../utils/types/nullable.type';
import { TicketAccess } from '../entities/ticket-access.entity';

/**
 * Read-only access to groups, queues, tickets and their permission grants.
 * Grant lookups return raw permission keys as stored.
 */
export abstract class PermissionStore {
  abstract findTicketAccess(
    ticketId: number,
  ): Promise<NullableType<TicketAccess>>;

  /** Group owning the queue, or null when the queue does not exist */
  abstract findQueueGroupId(queueId: number): Promise<NullableType<number>>;

  abstract findAgentGrants(agentId: number, groupId: number): Promise<string[]>;

  abstract findCompanyGrants(
    customerCompanyId: string,
    groupId: number,
  ): Promise<string[]>;

  abstract findCustomerUserGrants(
    customerLogin: string,
    groupId: number,
  ): Promise<string[]>;
}
