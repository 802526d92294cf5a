import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { RateLimitConfig } from './rate-limit-config.type';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @Max(100000)
  @IsOptional()
  RATE_LIMIT_DEFAULT?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  RATE_LIMIT_WINDOW_SECONDS?: number;

  @IsInt()
  @Min(1000)
  @IsOptional()
  RATE_LIMIT_SWEEP_INTERVAL_MS?: number;

  @IsInt()
  @Min(1000)
  @IsOptional()
  RATE_LIMIT_RETENTION_MS?: number;
}

export default registerAs<RateLimitConfig>('rateLimit', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    defaultLimit: parseInt(process.env.RATE_LIMIT_DEFAULT ?? '1000', 10), // requests per window
    windowSeconds: parseInt(process.env.RATE_LIMIT_WINDOW_SECONDS ?? '3600', 10),
    sweepIntervalMs: parseInt(
      process.env.RATE_LIMIT_SWEEP_INTERVAL_MS ?? '600000',
      10,
    ), // 10 minutes
    retentionMs: parseInt(process.env.RATE_LIMIT_RETENTION_MS ?? '600000', 10),
  };
});
