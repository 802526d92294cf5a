import { Injectable, Logger, Optional } from '@nestjs/common';
import { DataSource } from 'typeorm';

export type ComponentStatus = 'up' | 'down' | 'unavailable';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  database: ComponentStatus;
}

/**
 * Health Check Service
 *
 * Used by load balancers. A failing database degrades the service: the
 * gateway answers 503 for every credential it cannot verify.
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(@Optional() private readonly dataSource?: DataSource) {}

  async check(): Promise<HealthReport> {
    const database = await this.checkDatabase();
    return {
      status: database === 'down' ? 'degraded' : 'healthy',
      database,
    };
  }

  private async checkDatabase(): Promise<ComponentStatus> {
    if (!this.dataSource) {
      return 'unavailable';
    }
    try {
      await this.dataSource.query('SELECT 1');
      return 'up';
    } catch (error) {
      this.logger.warn(
        `Database health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return 'down';
    }
  }
}
