import { SetMetadata } from '@nestjs/common';

export const REQUIRED_SCOPE_KEY = 'authz:requiredScope';

/**
 * Capability the credential must carry, e.g. `tickets:read`.
 * A route-level scope overrides the controller's.
 */
export const RequireScope = (scope: string) =>
  SetMetadata(REQUIRED_SCOPE_KEY, scope);
