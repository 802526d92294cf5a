import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService, JwtVerifyOptions, TokenExpiredError } from '@nestjs/jwt';
import { AllConfigType } from '../../config/config.type';
import { PrincipalKind } from '../identity/identity';

type Algorithm = NonNullable<JwtVerifyOptions['algorithms']>[number];

const SUPPORTED_ALGORITHMS: readonly Algorithm[] = ['HS256', 'HS384', 'HS512'];

export interface JwtClaims {
  principalId: number;
  kind: PrincipalKind;
  isAdmin: boolean;
  customerLogin?: string;
  customerCompanyId?: string;
  /** Absent means full access */
  scopes?: string[];
}

export type JwtFailureReason = 'expired' | 'invalid' | 'unconfigured';

export type JwtValidation =
  | { ok: true; claims: JwtClaims }
  | { ok: false; reason: JwtFailureReason };

/**
 * Verifies session JWTs with the configured HMAC secret, issuer, audience and
 * algorithms, and reads the principal out of the payload.
 *
 * Payload: `sub` (principal id), `kind` or `role` (`customer` marks a
 * customer), `isAdmin`, `customerLogin`, `customerCompanyId`, `scopes`.
 */
@Injectable()
export class JwtValidatorService {
  private readonly secret?: string;
  private readonly issuer?: string;
  private readonly audience?: string;
  private readonly algorithms: Algorithm[];

  constructor(
    private readonly jwtService: JwtService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.secret = configService.get('auth.jwtSecret', { infer: true });
    this.issuer = configService.get('auth.jwtIssuer', { infer: true });
    this.audience = configService.get('auth.jwtAudience', { infer: true });
    const allowed =
      configService.get('auth.jwtAllowedAlgorithms', { infer: true }) ?? [];
    this.algorithms = SUPPORTED_ALGORITHMS.filter((algorithm) =>
      allowed.includes(algorithm),
    );
  }

  get configured(): boolean {
    return Boolean(this.secret) && this.algorithms.length > 0;
  }

  async validate(raw: string): Promise<JwtValidation> {
    if (!this.secret || this.algorithms.length === 0) {
      return { ok: false, reason: 'unconfigured' };
    }

    let payload: Record<string, unknown>;
    try {
      payload = await this.jwtService.verifyAsync<Record<string, unknown>>(
        raw,
        {
          secret: this.secret,
          issuer: this.issuer,
          audience: this.audience,
          algorithms: this.algorithms,
        },
      );
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        return { ok: false, reason: 'expired' };
      }
      return { ok: false, reason: 'invalid' };
    }

    const claims = parseClaims(payload);
    return claims ? { ok: true, claims } : { ok: false, reason: 'invalid' };
  }
}

export function parseClaims(payload: Record<string, unknown>): JwtClaims | null {
  const principalId = toPrincipalId(payload.sub);
  if (principalId === null) {
    return null;
  }

  const role = typeof payload.role === 'string' ? payload.role.toLowerCase() : '';
  const kind: PrincipalKind =
    payload.kind === 'customer' || role === 'customer' ? 'customer' : 'agent';

  let scopes: string[] | undefined;
  if (payload.scopes !== undefined) {
    if (!isStringArray(payload.scopes)) {
      return null;
    }
    scopes = payload.scopes;
  }

  return {
    principalId,
    kind,
    isAdmin: kind === 'agent' && (payload.isAdmin === true || role === 'admin'),
    customerLogin: optionalString(payload.customerLogin),
    customerCompanyId: optionalString(payload.customerCompanyId),
    scopes,
  };
}

function toPrincipalId(value: unknown): number | null {
  const id =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && /^\d+$/.test(value)
        ? parseInt(value, 10)
        : NaN;
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === 'string')
  );
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}
