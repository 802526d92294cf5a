import { SetMetadata } from '@nestjs/common';
import {
  QueueAction,
  ResourceRule,
  TicketAction,
} from '../../permissions/domain/resource-target';

export const RESOURCE_SCOPE_KEY = 'authz:resourceScope';

export interface ResourceIdSources {
  /** Route parameter holding the ticket id */
  ticketParam: string;
  /** Body field holding the target queue id */
  queueBodyField: string;
}

export type ResourceScopeMetadata = ResourceRule & ResourceIdSources;

const DEFAULT_SOURCES: ResourceIdSources = {
  ticketParam: 'id',
  queueBodyField: 'queueId',
};

/**
 * Check queue-group permissions on the resource the route addresses.
 *
 * @example
 * @ResourceScoped('ticket', 'update')
 * @ResourceScoped('queue', 'move_into', { queueBodyField: 'targetQueueId' })
 */
export function ResourceScoped(
  kind: 'ticket',
  action: TicketAction,
  sources?: Partial<ResourceIdSources>,
): MethodDecorator & ClassDecorator;
export function ResourceScoped(
  kind: 'queue',
  action: QueueAction,
  sources?: Partial<ResourceIdSources>,
): MethodDecorator & ClassDecorator;
export function ResourceScoped(
  kind: 'ticket' | 'queue',
  action: TicketAction | QueueAction,
  sources: Partial<ResourceIdSources> = {},
): MethodDecorator & ClassDecorator {
  const rule = toRule(kind, action);
  const metadata: ResourceScopeMetadata = {
    ...rule,
    ...DEFAULT_SOURCES,
    ...sources,
  };
  return SetMetadata(RESOURCE_SCOPE_KEY, metadata);
}

function toRule(
  kind: 'ticket' | 'queue',
  action: TicketAction | QueueAction,
): ResourceRule {
  if (kind === 'queue' && (action === 'create' || action === 'move_into')) {
    return { kind, action };
  }
  if (
    kind === 'ticket' &&
    action !== 'create' &&
    action !== 'move_into'
  ) {
    return { kind, action };
  }
  throw new Error(`Unsupported resource rule ${kind}:${action}`);
}
