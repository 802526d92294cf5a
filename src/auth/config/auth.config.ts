import { registerAs } from '@nestjs/config';

import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { AuthConfig } from './auth-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  @IsOptional()
  AUTH_JWT_SECRET?: string;

  // JWT standards
  @IsString()
  @IsOptional()
  AUTH_JWT_ISSUER?: string;

  @IsString()
  @IsOptional()
  AUTH_JWT_AUDIENCE?: string;

  @IsString()
  @IsOptional()
  AUTH_JWT_ALLOWED_ALGORITHMS?: string;

  // API tokens
  @IsInt()
  @Min(4)
  @Max(15)
  @IsOptional()
  AUTH_API_TOKEN_HASH_ROUNDS?: number;

  @IsInt()
  @Min(0)
  @Max(30)
  @IsOptional()
  AUTH_VERIFICATION_CACHE_TTL_SECONDS?: number;
}

export default registerAs<AuthConfig>('auth', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    jwtSecret: process.env.AUTH_JWT_SECRET || undefined,
    jwtIssuer: process.env.AUTH_JWT_ISSUER || undefined,
    jwtAudience: process.env.AUTH_JWT_AUDIENCE || undefined,
    jwtAllowedAlgorithms: process.env.AUTH_JWT_ALLOWED_ALGORITHMS
      ? process.env.AUTH_JWT_ALLOWED_ALGORITHMS.split(',').map((a) => a.trim())
      : ['HS256'],
    apiTokenHashRounds: process.env.AUTH_API_TOKEN_HASH_ROUNDS
      ? parseInt(process.env.AUTH_API_TOKEN_HASH_ROUNDS, 10)
      : 10,
    verificationCacheTtlSeconds: process.env
      .AUTH_VERIFICATION_CACHE_TTL_SECONDS
      ? parseInt(process.env.AUTH_VERIFICATION_CACHE_TTL_SECONDS, 10)
      : 0,
  };
});
