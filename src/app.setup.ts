import {
  ClassSerializerInterceptor,
  ValidationPipe,
  VersioningType,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import cookieParser from 'cookie-parser';
import { AllConfigType } from './config/config.type';
import validationOptions from './utils/validation-options';
import { ApiExceptionFilter } from './api-errors/api-exception.filter';

/**
 * HTTP pipeline shared by `main.ts` and the end-to-end tests.
 */
export function configureApp(app: NestExpressApplication): void {
  const configService = app.get(ConfigService<AllConfigType>);

  if (configService.get('app.trustProxy', { infer: true })) {
    app.set('trust proxy', true);
  }

  // Credentials may arrive in the auth_token / access_token cookies
  app.use(cookieParser());

  app.setGlobalPrefix(
    configService.getOrThrow('app.apiPrefix', { infer: true }),
    {
      exclude: ['/'],
    },
  );
  app.enableVersioning({
    type: VersioningType.URI,
  });
  app.useGlobalPipes(new ValidationPipe(validationOptions));
  app.useGlobalInterceptors(new ClassSerializerInterceptor(app.get(Reflector)));
  app.useGlobalFilters(new ApiExceptionFilter());
}
