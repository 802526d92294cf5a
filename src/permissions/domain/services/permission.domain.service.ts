import { Injectable } from '@nestjs/common';
import { PermissionStore } from '../repositories/permission-store.port';
import { TicketAccess } from '../entities/ticket-access.entity';
import { NullableType } from '../../../utils/types/nullable.type';
import {
  PermissionLookupError,
  RequestAbortedError,
  throwIfAborted,
} from '../errors';
import { PermissionKind, effectivePermissions } from '../permission-kind';

/** Customer grants count when they give read or full access */
const CUSTOMER_ACCESS_KINDS: readonly PermissionKind[] = [
  PermissionKind.RO,
  PermissionKind.RW,
];

/**
 * PermissionDomainService
 *
 * Resource-level permission queries over queue groups.
 *
 * Agents: a queue's effective permission is the union of the agent's grants
 * on the queue's group, with `rw` implying every other kind.
 *
 * Customers: ticket access is company ownership OR a company grant on the
 * ticket's group OR an individual grant on it. Ownership is checked first
 * since it needs no grant lookup.
 *
 * Every query re-reads grants. A failed lookup raises PermissionLookupError;
 * a missing ticket or queue yields false.
 */
@Injectable()
export class PermissionDomainService {
  constructor(private readonly store: PermissionStore) {}

  async canReadTicket(
    agentId: number,
    ticketId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    return this.ticketPermission(agentId, ticketId, PermissionKind.RO, signal);
  }

  async canWriteTicket(
    agentId: number,
    ticketId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    return this.ticketPermission(agentId, ticketId, PermissionKind.RW, signal);
  }

  async canAddNote(
    agentId: number,
    ticketId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    return this.ticketPermission(
      agentId,
      ticketId,
      PermissionKind.NOTE,
      signal,
    );
  }

  async canChangePriority(
    agentId: number,
    ticketId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    return this.ticketPermission(
      agentId,
      ticketId,
      PermissionKind.PRIORITY,
      signal,
    );
  }

  async canWriteQueue(
    agentId: number,
    queueId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    return this.queuePermission(agentId, queueId, PermissionKind.RW, signal);
  }

  async canCreate(
    agentId: number,
    queueId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    return this.queuePermission(
      agentId,
      queueId,
      PermissionKind.CREATE,
      signal,
    );
  }

  async canMoveInto(
    agentId: number,
    queueId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    return this.queuePermission(
      agentId,
      queueId,
      PermissionKind.MOVE_INTO,
      signal,
    );
  }

  async canBeOwner(
    agentId: number,
    queueId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    return this.queuePermission(
      agentId,
      queueId,
      PermissionKind.OWNER,
      signal,
    );
  }

  /**
   * Effective permission kinds of an agent on a queue (empty when the queue
   * does not exist).
   */
  async agentPermissions(
    agentId: number,
    queueId: number,
    signal?: AbortSignal,
  ): Promise<Set<PermissionKind>> {
    const groupId = await this.lookup(
      'findQueueGroupId',
      () => this.store.findQueueGroupId(queueId),
      signal,
    );
    if (groupId === null) {
      return new Set();
    }
    return this.agentGroupPermissions(agentId, groupId, signal);
  }

  async customerCompanyCanAccessQueue(
    customerCompanyId: string,
    queueId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const groupId = await this.lookup(
      'findQueueGroupId',
      () => this.store.findQueueGroupId(queueId),
      signal,
    );
    if (groupId === null) {
      return false;
    }
    return this.companyHasGroupAccess(customerCompanyId, groupId, signal);
  }

  async customerCanAccessQueue(
    customerLogin: string,
    queueId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const groupId = await this.lookup(
      'findQueueGroupId',
      () => this.store.findQueueGroupId(queueId),
      signal,
    );
    if (groupId === null) {
      return false;
    }
    return this.customerUserHasGroupAccess(customerLogin, groupId, signal);
  }

  async customerCanAccessTicket(
    customerLogin: string | undefined,
    customerCompanyId: string | undefined,
    ticketId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const ticket = await this.findTicket(ticketId, signal);
    if (!ticket) {
      return false;
    }

    if (
      customerCompanyId &&
      ticket.customerCompanyId !== null &&
      ticket.customerCompanyId === customerCompanyId
    ) {
      return true;
    }

    if (
      customerCompanyId &&
      (await this.companyHasGroupAccess(
        customerCompanyId,
        ticket.groupId,
        signal,
      ))
    ) {
      return true;
    }

    if (customerLogin) {
      return this.customerUserHasGroupAccess(
        customerLogin,
        ticket.groupId,
        signal,
      );
    }
    return false;
  }

  private async ticketPermission(
    agentId: number,
    ticketId: number,
    required: PermissionKind,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const ticket = await this.findTicket(ticketId, signal);
    if (!ticket) {
      return false;
    }
    const kinds = await this.agentGroupPermissions(
      agentId,
      ticket.groupId,
      signal,
    );
    return kinds.has(required);
  }

  private async queuePermission(
    agentId: number,
    queueId: number,
    required: PermissionKind,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const kinds = await this.agentPermissions(agentId, queueId, signal);
    return kinds.has(required);
  }

  private async agentGroupPermissions(
    agentId: number,
    groupId: number,
    signal?: AbortSignal,
  ): Promise<Set<PermissionKind>> {
    const grants = await this.lookup(
      'findAgentGrants',
      () => this.store.findAgentGrants(agentId, groupId),
      signal,
    );
    return effectivePermissions(grants);
  }

  private async companyHasGroupAccess(
    customerCompanyId: string,
    groupId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const grants = await this.lookup(
      'findCompanyGrants',
      () => this.store.findCompanyGrants(customerCompanyId, groupId),
      signal,
    );
    return this.grantsCustomerAccess(grants);
  }

  private async customerUserHasGroupAccess(
    customerLogin: string,
    groupId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const grants = await this.lookup(
      'findCustomerUserGrants',
      () => this.store.findCustomerUserGrants(customerLogin, groupId),
      signal,
    );
    return this.grantsCustomerAccess(grants);
  }

  private grantsCustomerAccess(grants: readonly string[]): boolean {
    const kinds = effectivePermissions(grants);
    return CUSTOMER_ACCESS_KINDS.some((kind) => kinds.has(kind));
  }

  private findTicket(
    ticketId: number,
    signal?: AbortSignal,
  ): Promise<NullableType<TicketAccess>> {
    return this.lookup(
      'findTicketAccess',
      () => this.store.findTicketAccess(ticketId),
      signal,
    );
  }

  private async lookup<T>(
    operation: string,
    query: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    throwIfAborted(signal);
    let result: T;
    try {
      result = await query();
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        throw error;
      }
      throw new PermissionLookupError(operation, error);
    }
    throwIfAborted(signal);
    return result;
  }
}
