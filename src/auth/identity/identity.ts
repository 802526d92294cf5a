import { PrincipalRole } from '../scopes/scope-definition';

export type PrincipalKind = 'agent' | 'customer';
export type CredentialSource = 'api_token' | 'jwt';

/**
 * The authenticated caller of one request. Built by the credential verifier
 * and frozen before it is attached to the request.
 */
export interface Identity {
  readonly kind: PrincipalKind;
  readonly principalId: number;
  readonly customerLogin?: string;
  readonly customerCompanyId?: string;
  readonly role: PrincipalRole;
  readonly isAdmin: boolean;
  readonly scopes: readonly string[];
  /** Rate-limit key component: the token prefix, or `jwt:<id>` */
  readonly credentialPrefix: string;
  /** Per-credential request ceiling, when the credential sets one */
  readonly rateLimit?: number;
  readonly source: CredentialSource;
  readonly tokenId?: number;
}

export type IdentityInput = Omit<Identity, 'scopes' | 'role'> & {
  scopes?: readonly string[];
  role?: PrincipalRole;
};

/**
 * An empty scope list means the credential inherits every permission of its
 * principal, which is stored as `*`. The role defaults from the kind and the
 * admin flag.
 */
export function createIdentity(input: IdentityInput): Identity {
  const scopes =
    input.scopes && input.scopes.length > 0 ? [...input.scopes] : ['*'];
  const role: PrincipalRole =
    input.role ??
    (input.kind === 'customer' ? 'customer' : input.isAdmin ? 'admin' : 'agent');

  return Object.freeze({
    ...input,
    role,
    isAdmin: input.kind === 'agent' && input.isAdmin,
    scopes: Object.freeze(scopes),
  });
}
