export type PrincipalRole = 'admin' | 'agent' | 'customer';

export interface ScopeDefinition {
  scope: string;
  description: string;
  /** e.g. `core`, `plugin:calendar` */
  category: string;
  /** Role the principal must hold; admin satisfies any role */
  requireRole?: PrincipalRole;
  /** Not grantable to customers */
  agentOnly?: boolean;
}

export const CORE_SCOPES: readonly ScopeDefinition[] = [
  {
    scope: '*',
    description: 'Full access (inherits all user permissions)',
    category: 'core',
  },
  { scope: 'tickets:read', description: 'View tickets', category: 'core' },
  {
    scope: 'tickets:write',
    description: 'Create and update tickets',
    category: 'core',
  },
  {
    scope: 'tickets:delete',
    description: 'Delete tickets',
    category: 'core',
    agentOnly: true,
  },
  {
    scope: 'articles:read',
    description: 'Read ticket articles',
    category: 'core',
  },
  {
    scope: 'articles:write',
    description: 'Add articles and replies',
    category: 'core',
  },
  {
    scope: 'users:read',
    description: 'View user information',
    category: 'core',
    agentOnly: true,
  },
  {
    scope: 'queues:read',
    description: 'View queue information',
    category: 'core',
    agentOnly: true,
  },
  {
    scope: 'admin:*',
    description: 'Admin operations',
    category: 'core',
    agentOnly: true,
    requireRole: 'admin',
  },
];
