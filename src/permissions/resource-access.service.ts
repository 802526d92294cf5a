import { Injectable } from '@nestjs/common';
import { PermissionDomainService } from './domain/services/permission.domain.service';
import {
  AccessDecision,
  AccessSubject,
  ResourceTarget,
  TicketAction,
} from './domain/resource-target';

/** Ticket actions open to any customer who can see the ticket */
const CUSTOMER_TICKET_ACTIONS: readonly TicketAction[] = ['read', 'note'];

/**
 * Maps a resource-scoped route onto permission queries and decides between
 * hiding the resource (404) and refusing the action (403).
 *
 * A resource the caller cannot see is always hidden. Ticket deletion by an
 * agent without write access is hidden even when the ticket is readable.
 */
@Injectable()
export class ResourceAccessService {
  constructor(private readonly permissions: PermissionDomainService) {}

  async check(
    subject: AccessSubject,
    target: ResourceTarget,
    signal?: AbortSignal,
  ): Promise<AccessDecision> {
    if (subject.kind === 'customer') {
      return this.checkCustomer(subject, target, signal);
    }
    return this.checkAgent(subject.principalId, target, signal);
  }

  private async checkAgent(
    agentId: number,
    target: ResourceTarget,
    signal?: AbortSignal,
  ): Promise<AccessDecision> {
    if (target.kind === 'queue') {
      if (target.action === 'create') {
        return (await this.permissions.canCreate(
          agentId,
          target.queueId,
          signal,
        ))
          ? 'allow'
          : 'forbid';
      }
      if (
        !(await this.permissions.canReadTicket(
          agentId,
          target.ticketId,
          signal,
        ))
      ) {
        return 'hide';
      }
      return (await this.permissions.canMoveInto(
        agentId,
        target.queueId,
        signal,
      ))
        ? 'allow'
        : 'forbid';
    }

    const { ticketId } = target;
    switch (target.action) {
      case 'read':
        return (await this.permissions.canReadTicket(agentId, ticketId, signal))
          ? 'allow'
          : 'hide';
      case 'delete':
        return (await this.permissions.canWriteTicket(
          agentId,
          ticketId,
          signal,
        ))
          ? 'allow'
          : 'hide';
      case 'update':
        return this.allowOrReveal(
          agentId,
          ticketId,
          () => this.permissions.canWriteTicket(agentId, ticketId, signal),
          signal,
        );
      case 'note':
        return this.allowOrReveal(
          agentId,
          ticketId,
          () => this.permissions.canAddNote(agentId, ticketId, signal),
          signal,
        );
      case 'priority':
        return this.allowOrReveal(
          agentId,
          ticketId,
          () => this.permissions.canChangePriority(agentId, ticketId, signal),
          signal,
        );
    }
  }

  /**
   * Allowed when `granted` resolves true; otherwise 403 for a readable
   * ticket and 404 for one the agent cannot see.
   */
  private async allowOrReveal(
    agentId: number,
    ticketId: number,
    granted: () => Promise<boolean>,
    signal?: AbortSignal,
  ): Promise<AccessDecision> {
    if (await granted()) {
      return 'allow';
    }
    return (await this.permissions.canReadTicket(agentId, ticketId, signal))
      ? 'forbid'
      : 'hide';
  }

  private async checkCustomer(
    subject: AccessSubject,
    target: ResourceTarget,
    signal?: AbortSignal,
  ): Promise<AccessDecision> {
    if (target.kind === 'queue' && target.action === 'create') {
      return (await this.customerCanCreateIn(subject, target.queueId, signal))
        ? 'allow'
        : 'forbid';
    }

    const accessible = await this.permissions.customerCanAccessTicket(
      subject.customerLogin,
      subject.customerCompanyId,
      target.ticketId,
      signal,
    );
    if (!accessible) {
      return 'hide';
    }
    if (target.kind === 'queue') {
      return 'forbid';
    }
    return CUSTOMER_TICKET_ACTIONS.includes(target.action) ? 'allow' : 'forbid';
  }

  private async customerCanCreateIn(
    subject: AccessSubject,
    queueId: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    if (
      subject.customerCompanyId &&
      (await this.permissions.customerCompanyCanAccessQueue(
        subject.customerCompanyId,
        queueId,
        signal,
      ))
    ) {
      return true;
    }
    if (subject.customerLogin) {
      return this.permissions.customerCanAccessQueue(
        subject.customerLogin,
        queueId,
        signal,
      );
    }
    return false;
  }
}
