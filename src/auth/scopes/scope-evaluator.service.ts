import { Injectable } from '@nestjs/common';
import { ScopeRegistry, scopeCovers } from './scope-registry';

export type ScopeDecision = 'allowed' | 'missing_scope' | 'role_restricted';

/** The parts of an identity scope checks read */
export interface ScopeHolder {
  kind: 'agent' | 'customer';
  role: string;
  scopes: readonly string[];
}

@Injectable()
export class ScopeEvaluatorService {
  constructor(private readonly registry: ScopeRegistry) {}

  /** Whether the held scopes cover `required`. An empty requirement passes. */
  allowed(holder: ScopeHolder, required?: string): boolean {
    if (!required) {
      return true;
    }
    return holder.scopes.some((held) => scopeCovers(held, required));
  }

  roleAllowed(required: string, role: string, isCustomer: boolean): boolean {
    return this.registry.roleAllowed(required, role, isCustomer);
  }

  /**
   * Held scopes are checked first, then the capability's kind and role
   * restrictions.
   */
  evaluate(holder: ScopeHolder, required?: string): ScopeDecision {
    if (!required) {
      return 'allowed';
    }
    if (!this.allowed(holder, required)) {
      return 'missing_scope';
    }
    return this.roleAllowed(required, holder.role, holder.kind === 'customer')
      ? 'allowed'
      : 'role_restricted';
  }

  /** Message for a refused capability */
  denialMessage(
    holder: ScopeHolder,
    required: string,
    decision: Exclude<ScopeDecision, 'allowed'>,
  ): string {
    if (decision === 'missing_scope') {
      return `Token missing required scope: ${required}`;
    }
    return holder.kind === 'customer'
      ? 'This endpoint is not available to customers'
      : `Insufficient role for scope: ${required}`;
  }
}
