import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { RateLimiter } from './rate-limiter';
import { RateLimitSweepService } from './rate-limit-sweep.service';

@Module({
  providers: [
    {
      provide: RateLimiter,
      useFactory: (configService: ConfigService<AllConfigType>) =>
        new RateLimiter({
          windowSeconds: configService.getOrThrow('rateLimit.windowSeconds', {
            infer: true,
          }),
        }),
      inject: [ConfigService],
    },
    RateLimitSweepService,
  ],
  exports: [RateLimiter],
})
export class RateLimitModule {}
