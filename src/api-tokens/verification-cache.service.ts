import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import { AllConfigType } from '../config/config.type';
import { ApiToken } from './domain/entities/api-token.entity';
import { TokenOwner } from './domain/entities/token-owner';

/** A matched token id and its resolved owner; token state is re-read */
export interface CachedVerification {
  tokenId: number;
  owner: TokenOwner;
}

interface CacheEntry extends CachedVerification {
  expiresAt: number;
}

const MAX_ENTRIES = 10000;

export function hashRawToken(raw: string): string {
  return createHash('sha256').update(raw).digest('hex');
}

/**
 * Verification Cache Service
 *
 * Short-lived cache of successful API token verifications, so a busy token is
 * not bcrypt-compared on every request. Only the match and the owner are
 * kept: revocation and expiry are read from the store on every hit.
 *
 * - Keyed by the SHA-256 of the raw token; raw tokens are never stored
 * - Only active tokens are cached
 * - TTL 0 disables the cache
 */
@Injectable()
export class VerificationCacheService {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;

  constructor(configService: ConfigService<AllConfigType>) {
    this.ttlMs =
      (configService.get('auth.verificationCacheTtlSeconds', {
        infer: true,
      }) ?? 0) * 1000;
  }

  get enabled(): boolean {
    return this.ttlMs > 0;
  }

  get(tokenHash: string, now: number = Date.now()): CachedVerification | null {
    const cached = this.cache.get(tokenHash);

    if (!cached) {
      return null;
    }

    if (now > cached.expiresAt) {
      this.cache.delete(tokenHash);
      return null;
    }

    return { tokenId: cached.tokenId, owner: cached.owner };
  }

  set(
    tokenHash: string,
    token: ApiToken,
    owner: TokenOwner,
    now: number = Date.now(),
  ): void {
    if (!this.enabled || !token.isActive(new Date(now))) {
      return;
    }

    if (this.cache.size >= MAX_ENTRIES) {
      this.cleanup(now);
    }
    if (this.cache.size >= MAX_ENTRIES) {
      return;
    }

    this.cache.set(tokenHash, {
      tokenId: token.id,
      owner,
      expiresAt: now + this.ttlMs,
    });
  }

  invalidate(tokenHash: string): void {
    this.cache.delete(tokenHash);
  }

  /**
   * Drop every entry of a token. Called when the token is revoked.
   */
  invalidateByTokenId(tokenId: number): void {
    for (const [tokenHash, cached] of this.cache.entries()) {
      if (cached.tokenId === tokenId) {
        this.cache.delete(tokenHash);
      }
    }
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  private cleanup(now: number): void {
    for (const [tokenHash, cached] of this.cache.entries()) {
      if (now > cached.expiresAt) {
        this.cache.delete(tokenHash);
      }
    }
  }
}
