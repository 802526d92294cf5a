import { Module } from '@nestjs/common';
import { HomeService } from './home.service';
import { HomeController } from './home.controller';
import { HealthService } from './health.service';

@Module({
  controllers: [HomeController],
  providers: [HomeService, HealthService],
})
export class HomeModule {}
