import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AllConfigType } from '../config/config.type';
import { RateLimiter } from './rate-limiter';

const SWEEP_INTERVAL_NAME = 'rate-limit-sweep';

/**
 * Periodically drops idle rate-limit buckets so the bucket map stays bounded.
 * Interval and retention come from the `rateLimit` config namespace.
 */
@Injectable()
export class RateLimitSweepService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RateLimitSweepService.name);
  private readonly retentionMs: number;
  private readonly intervalMs: number;

  constructor(
    private readonly rateLimiter: RateLimiter,
    private readonly schedulerRegistry: SchedulerRegistry,
    configService: ConfigService<AllConfigType>,
  ) {
    this.retentionMs = configService.getOrThrow('rateLimit.retentionMs', {
      infer: true,
    });
    this.intervalMs = configService.getOrThrow('rateLimit.sweepIntervalMs', {
      infer: true,
    });
  }

  onModuleInit(): void {
    const interval = setInterval(() => this.sweep(), this.intervalMs);
    interval.unref();
    this.schedulerRegistry.addInterval(SWEEP_INTERVAL_NAME, interval);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', SWEEP_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(SWEEP_INTERVAL_NAME);
    }
  }

  sweep(): number {
    const startTime = Date.now();
    const removed = this.rateLimiter.sweep(this.retentionMs);
    if (removed > 0) {
      this.logger.debug(
        `Removed ${removed} idle rate-limit buckets in ${Date.now() - startTime}ms (${this.rateLimiter.size} remaining)`,
      );
    }
    return removed;
  }
}
