import { Injectable, Logger, Optional } from '@nestjs/common';
import {
  ApiTokensService,
  TokenVerification,
} from '../../api-tokens/api-tokens.service';
import { isOpaqueToken } from '../../api-tokens/api-token.format';
import {
  JwtFailureReason,
  JwtValidatorService,
} from '../jwt/jwt-validator.service';
import { Identity, createIdentity } from '../identity/identity';
import { CredentialFailure } from './credential-failure';
import { throwIfAborted } from '../../permissions/domain/errors';

export interface VerifyOptions {
  /** Client address, recorded as the token's last-used address */
  sourceAddress?: string;
  signal?: AbortSignal;
}

export type VerificationResult =
  | { ok: true; identity: Identity }
  | { ok: false; failure: CredentialFailure };

const JWT_FAILURES: Record<JwtFailureReason, CredentialFailure> = {
  expired: 'expired',
  invalid: 'invalid_signature',
  unconfigured: 'backend_unavailable',
};

const failed = (failure: CredentialFailure): VerificationResult => ({
  ok: false,
  failure,
});

/**
 * CredentialVerifierService
 *
 * Turns a raw credential into an identity. `gf_` tokens go to the API token
 * store, anything else is verified as a JWT. Failures are a closed set of
 * kinds; a missing or failing backend is `backend_unavailable`.
 *
 * Raw credentials are never logged.
 */
@Injectable()
export class CredentialVerifierService {
  private readonly logger = new Logger(CredentialVerifierService.name);

  constructor(
    private readonly jwtValidator: JwtValidatorService,
    @Optional() private readonly apiTokens?: ApiTokensService,
  ) {}

  async verify(
    raw: string,
    options: VerifyOptions = {},
  ): Promise<VerificationResult> {
    throwIfAborted(options.signal);
    const result = isOpaqueToken(raw)
      ? await this.verifyApiToken(raw, options)
      : await this.verifyJwt(raw);
    throwIfAborted(options.signal);
    return result;
  }

  private async verifyApiToken(
    raw: string,
    { sourceAddress }: VerifyOptions,
  ): Promise<VerificationResult> {
    const apiTokens = this.apiTokens;
    if (!apiTokens) {
      return failed('backend_unavailable');
    }

    let verification: TokenVerification;
    try {
      verification = await apiTokens.verifyToken(raw);
    } catch (error) {
      this.logger.error(
        `API token lookup failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return failed('backend_unavailable');
    }

    if (verification.status !== 'valid') {
      return failed(verification.status);
    }

    const { token, owner } = verification;
    const identity = createIdentity({
      kind: owner.kind,
      principalId: token.userId,
      customerLogin: owner.kind === 'customer' ? owner.customerLogin : undefined,
      customerCompanyId:
        owner.kind === 'customer' ? owner.customerCompanyId : undefined,
      isAdmin: owner.kind === 'agent' && owner.isAdmin,
      scopes: token.scopes,
      credentialPrefix: token.prefix,
      rateLimit: token.rateLimit,
      source: 'api_token',
      tokenId: token.id,
    });

    if (sourceAddress) {
      apiTokens.updateLastUsed(token.id, sourceAddress).catch((error) => {
        this.logger.warn(
          `Failed to record last use of API token ${token.id}: ${error instanceof Error ? error.message : String(error)}`,
        );
      });
    }

    return { ok: true, identity };
  }

  private async verifyJwt(raw: string): Promise<VerificationResult> {
    const validation = await this.jwtValidator.validate(raw);
    if (!validation.ok) {
      return failed(JWT_FAILURES[validation.reason]);
    }

    const { claims } = validation;
    return {
      ok: true,
      identity: createIdentity({
        kind: claims.kind,
        principalId: claims.principalId,
        customerLogin: claims.customerLogin,
        customerCompanyId: claims.customerCompanyId,
        isAdmin: claims.isAdmin,
        scopes: claims.scopes,
        credentialPrefix: `jwt:${claims.principalId}`,
        source: 'jwt',
      }),
    };
  }
}
