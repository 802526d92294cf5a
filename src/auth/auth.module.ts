import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { ApiTokensModule } from '../api-tokens/api-tokens.module';
import { PermissionsModule } from '../permissions/permissions.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { AuditModule } from '../audit/audit.module';
import { ScopesModule } from './scopes/scopes.module';
import { AuthController } from './auth.controller';
import { AuthorizationGuard } from './guards/authorization.guard';
import { CredentialVerifierService } from './credentials/credential-verifier.service';
import { JwtValidatorService } from './jwt/jwt-validator.service';

@Module({
  imports: [
    // Secret and options come from auth config at verification time
    JwtModule.register({}),
    ApiTokensModule,
    ScopesModule,
    PermissionsModule,
    RateLimitModule,
    AuditModule,
  ],
  controllers: [AuthController],
  providers: [
    JwtValidatorService,
    CredentialVerifierService,
    {
      provide: APP_GUARD,
      useClass: AuthorizationGuard,
    },
  ],
  exports: [CredentialVerifierService, ScopesModule],
})
export class AuthModule {}
