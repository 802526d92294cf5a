import { Injectable } from '@nestjs/common';
import {
  CORE_SCOPES,
  PrincipalRole,
  ScopeDefinition,
} from './scope-definition';

/**
 * `admin` satisfies every required role; other roles compare
 * case-insensitively.
 */
export function hasRole(role: string, requiredRole: string): boolean {
  if (role === 'admin') {
    return true;
  }
  return role.toLowerCase() === requiredRole.toLowerCase();
}

/** `a:*`, `a:b:*` */
export function isWildcardPattern(scope: string): boolean {
  const parts = scope.split(':');
  return parts.length >= 2 && parts[parts.length - 1] === '*';
}

/**
 * Whether a held scope covers a required one. `*` covers everything and
 * `<prefix>:*` covers anything under `<prefix>:`.
 */
export function scopeCovers(held: string, required: string): boolean {
  if (held === '*' || held === required) {
    return true;
  }
  if (held.length > 2 && held.endsWith(':*')) {
    const prefix = held.slice(0, -1);
    return required.length > prefix.length && required.startsWith(prefix);
  }
  return false;
}

/**
 * ScopeRegistry
 *
 * Known capabilities with their kind and role restrictions. Seeded with the
 * core scopes; plugins register their own at runtime.
 */
@Injectable()
export class ScopeRegistry {
  private readonly scopes = new Map<string, ScopeDefinition>();

  constructor() {
    for (const definition of CORE_SCOPES) {
      this.register(definition);
    }
  }

  register(definition: ScopeDefinition): void {
    this.scopes.set(definition.scope, { ...definition });
  }

  unregister(scope: string): void {
    this.scopes.delete(scope);
  }

  get(scope: string): ScopeDefinition | undefined {
    return this.scopes.get(scope);
  }

  isRegistered(scope: string): boolean {
    return this.scopes.has(scope);
  }

  /**
   * Whether a principal of this role and kind may hold the scope.
   * Unregistered scopes pass only as wildcard patterns.
   */
  roleAllowed(scope: string, role: string, isCustomer: boolean): boolean {
    const definition = this.scopes.get(scope);
    if (!definition) {
      return isWildcardPattern(scope);
    }
    if (isCustomer && definition.agentOnly) {
      return false;
    }
    if (definition.requireRole && !hasRole(role, definition.requireRole)) {
      return false;
    }
    return true;
  }

  /** Scopes a principal may hold, sorted by category then name */
  availableFor(role: PrincipalRole, isCustomer: boolean): ScopeDefinition[] {
    return [...this.scopes.values()]
      .filter((definition) => !(isCustomer && definition.agentOnly))
      .filter(
        (definition) =>
          !definition.requireRole || hasRole(role, definition.requireRole),
      )
      .sort(
        (a, b) =>
          compare(a.category, b.category) || compare(a.scope, b.scope),
      );
  }

  all(): ScopeDefinition[] {
    return [...this.scopes.values()].sort((a, b) => compare(a.scope, b.scope));
  }
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
