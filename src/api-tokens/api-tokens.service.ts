import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcryptjs';
import { AllConfigType } from '../config/config.type';
import { ApiTokenRepository } from './domain/repositories/api-token.repository.port';
import {
  ApiToken,
  ApiTokenUserType,
} from './domain/entities/api-token.entity';
import { TokenOwner } from './domain/entities/token-owner';
import {
  extractTokenPrefix,
  generateRawToken,
  parseExpiresIn,
} from './api-token.format';
import {
  CachedVerification,
  VerificationCacheService,
  hashRawToken,
} from './verification-cache.service';
import { ScopeRegistry, isWildcardPattern } from '../auth/scopes/scope-registry';
import { ApiException } from '../api-errors/api.exception';
import { ApiErrorCode } from '../api-errors/api-error-codes';

export const DEFAULT_TOKEN_RATE_LIMIT = 1000;
export const MAX_TOKEN_RATE_LIMIT = 100000;

export type TokenVerification =
  | { status: 'valid'; token: ApiToken; owner: TokenOwner }
  | { status: 'malformed' | 'unknown' | 'revoked' | 'expired' };

export interface GenerateTokenInput {
  userId: number;
  userType: ApiTokenUserType;
  name: string;
  scopes?: string[];
  /** `30d`, `3m`, `1y` or `never` */
  expiresIn?: string;
  rateLimit?: number;
  createdBy: number;
}

export interface GeneratedToken {
  token: ApiToken;
  /** Shown once; only its hash is stored */
  plaintext: string;
}

/**
 * ApiTokensService
 *
 * Personal API tokens of agents and customers: `gf_<prefix>_<secret>`.
 * Tokens are looked up by their clear prefix, then the bcrypt hash of the
 * whole token is compared against every candidate under that prefix.
 */
@Injectable()
export class ApiTokensService {
  private readonly logger = new Logger(ApiTokensService.name);
  private readonly hashRounds: number;

  constructor(
    private readonly repository: ApiTokenRepository,
    private readonly cache: VerificationCacheService,
    private readonly scopeRegistry: ScopeRegistry,
    configService: ConfigService<AllConfigType>,
  ) {
    this.hashRounds =
      configService.get('auth.apiTokenHashRounds', { infer: true }) ?? 10;
  }

  /**
   * Resolve a raw opaque token. Revocation is reported before expiry.
   * Store failures propagate to the caller.
   */
  async verifyToken(raw: string): Promise<TokenVerification> {
    const prefix = extractTokenPrefix(raw);
    if (!prefix) {
      return { status: 'malformed' };
    }

    const tokenHash = hashRawToken(raw);
    const cached = this.cache.enabled ? this.cache.get(tokenHash) : null;
    if (cached) {
      return this.verifyCached(tokenHash, cached);
    }

    const candidates = await this.repository.findByPrefix(prefix);
    const token = await this.findMatch(raw, candidates);
    if (!token) {
      return { status: 'unknown' };
    }
    const inactive = inactiveStatus(token);
    if (inactive) {
      return { status: inactive };
    }

    const owner = await this.repository.findOwner(token.userId, token.userType);
    if (!owner) {
      this.logger.warn(`API token ${token.id} belongs to a missing or invalid user`);
      return { status: 'unknown' };
    }

    this.cache.set(tokenHash, token, owner);
    return { status: 'valid', token, owner };
  }

  updateLastUsed(tokenId: number, ip: string): Promise<void> {
    return this.repository.updateLastUsed(tokenId, ip, new Date());
  }

  async generateToken(input: GenerateTokenInput): Promise<GeneratedToken> {
    const scopes = input.scopes ?? [];
    this.validateScopes(scopes, input.userType);

    const expiresAt = parseExpiresIn(input.expiresIn, new Date());
    if (expiresAt === undefined) {
      throw new ApiException(
        ApiErrorCode.ValidationFailed,
        `Invalid expiration format: ${input.expiresIn} (use 30d, 3m, 1y up to 100y, or never)`,
      );
    }

    const { raw, prefix } = generateRawToken();
    const tokenHash = await bcrypt.hash(raw, this.hashRounds);

    const token = await this.repository.create({
      userId: input.userId,
      userType: input.userType,
      name: input.name,
      prefix,
      tokenHash,
      scopes,
      expiresAt,
      rateLimit: input.rateLimit ?? DEFAULT_TOKEN_RATE_LIMIT,
      createdBy: input.createdBy,
    });

    return { token, plaintext: raw };
  }

  listTokens(userId: number, userType: ApiTokenUserType): Promise<ApiToken[]> {
    return this.repository.findByUser(userId, userType);
  }

  /**
   * Revoke one of the caller's own tokens. Tokens of other users are
   * reported as not found.
   */
  async revokeToken(
    tokenId: number,
    userId: number,
    userType: ApiTokenUserType,
    revokedBy: number,
  ): Promise<void> {
    const token = await this.repository.findById(tokenId);
    if (!token || token.userId !== userId || token.userType !== userType) {
      throw new ApiException(ApiErrorCode.NotFound, 'Token not found');
    }

    const revoked = await this.repository.revoke(tokenId, revokedBy, new Date());
    this.cache.invalidateByTokenId(tokenId);
    if (!revoked) {
      throw new ApiException(ApiErrorCode.Conflict, 'Token already revoked');
    }
  }

  /**
   * A cached match skips the bcrypt comparison and owner lookup, but the
   * token row is re-read so revocation and expiry apply at once.
   */
  private async verifyCached(
    tokenHash: string,
    cached: CachedVerification,
  ): Promise<TokenVerification> {
    const token = await this.repository.findById(cached.tokenId);
    if (!token) {
      this.cache.invalidate(tokenHash);
      return { status: 'unknown' };
    }
    const inactive = inactiveStatus(token);
    if (inactive) {
      this.cache.invalidate(tokenHash);
      return { status: inactive };
    }
    return { status: 'valid', token, owner: cached.owner };
  }

  private async findMatch(
    raw: string,
    candidates: ApiToken[],
  ): Promise<ApiToken | null> {
    for (const candidate of candidates) {
      if (await bcrypt.compare(raw, candidate.tokenHash)) {
        return candidate;
      }
    }
    return null;
  }

  private validateScopes(scopes: string[], userType: ApiTokenUserType): void {
    for (const scope of scopes) {
      const definition = this.scopeRegistry.get(scope);
      if (!definition && !isWildcardPattern(scope)) {
        throw new ApiException(
          ApiErrorCode.InvalidScope,
          `Invalid scope: ${scope}`,
        );
      }
      if (userType === 'customer' && definition?.agentOnly) {
        throw new ApiException(
          ApiErrorCode.InvalidScope,
          `Scope not available to customers: ${scope}`,
        );
      }
    }
  }
}

function inactiveStatus(token: ApiToken): 'revoked' | 'expired' | null {
  if (token.isRevoked()) {
    return 'revoked';
  }
  return token.isExpired() ? 'expired' : null;
}
