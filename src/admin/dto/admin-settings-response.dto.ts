import { ApiProperty } from '@nestjs/swagger';

export class RateLimitSettingsDto {
  @ApiProperty({ example: 1000 })
  defaultLimit!: number;

  @ApiProperty({ example: 3600 })
  windowSeconds!: number;
}

export class AuthSettingsDto {
  @ApiProperty({ description: 'Whether a JWT secret is configured' })
  jwtEnabled!: boolean;

  @ApiProperty({ type: [String], example: ['HS256'] })
  jwtAllowedAlgorithms!: string[];

  @ApiProperty({ example: 0 })
  verificationCacheTtlSeconds!: number;
}

/**
 * Effective authorization settings. Secrets are reported only as present
 * or absent.
 */
export class AdminSettingsResponseDto {
  @ApiProperty({ type: RateLimitSettingsDto })
  rateLimit!: RateLimitSettingsDto;

  @ApiProperty({ type: AuthSettingsDto })
  auth!: AuthSettingsDto;

  @ApiProperty({ type: [String], example: ['*', 'tickets:read'] })
  scopes!: string[];
}
