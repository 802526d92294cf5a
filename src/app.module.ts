import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, DataSourceOptions } from 'typeorm';
import appConfig from './config/app.config';
import authConfig from './auth/config/auth.config';
import databaseConfig from './database/config/database.config';
import rateLimitConfig from './rate-limit/config/rate-limit.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { HomeModule } from './home/home.module';
import { AuthModule } from './auth/auth.module';
import { ApiTokensModule } from './api-tokens/api-tokens.module';
import { TicketsModule } from './tickets/tickets.module';
import { AdminModule } from './admin/admin.module';

export const CONFIG_LOADERS = [
  appConfig,
  authConfig,
  databaseConfig,
  rateLimitConfig,
];

/** Everything except the database connection */
export const FEATURE_MODULES = [
  HomeModule,
  AuthModule,
  ApiTokensModule,
  TicketsModule,
  AdminModule,
];

const infrastructureDatabaseModule = TypeOrmModule.forRootAsync({
  useClass: TypeOrmConfigService,
  dataSourceFactory: async (options?: DataSourceOptions) => {
    if (!options) {
      throw new Error('TypeORM options are missing');
    }
    return new DataSource(options).initialize();
  },
});

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: CONFIG_LOADERS,
      envFilePath: ['.env'],
    }),
    infrastructureDatabaseModule,
    ScheduleModule.forRoot(),
    ...FEATURE_MODULES,
  ],
})
export class AppModule {}
