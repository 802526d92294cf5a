import { isOpaqueToken } from '../../api-tokens/api-token.format';

export const CREDENTIAL_COOKIES = ['auth_token', 'access_token'] as const;

export interface CredentialSources {
  authorization?: string;
  cookies?: Record<string, unknown>;
}

/**
 * Raw credential of a request, in order: `Authorization: Bearer <t>`
 * (scheme case-insensitive), a bare `gf_` token in the Authorization header,
 * then the `auth_token` and `access_token` cookies.
 */
export function extractCredential(sources: CredentialSources): string | null {
  const header = sources.authorization?.trim();
  if (header) {
    const parts = header.split(' ');
    if (parts.length === 2 && parts[0].toLowerCase() === 'bearer' && parts[1]) {
      return parts[1];
    }
    if (parts.length === 1 && isOpaqueToken(parts[0])) {
      return parts[0];
    }
  }

  for (const name of CREDENTIAL_COOKIES) {
    const value = sources.cookies?.[name];
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }

  return null;
}
