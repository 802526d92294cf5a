import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { AllConfigType } from '../config/config.type';
import { RequireScope } from '../auth/decorators';
import { ScopeRegistry } from '../auth/scopes/scope-registry';
import { AdminSettingsResponseDto } from './dto/admin-settings-response.dto';

@ApiTags('Admin')
@Controller({ path: 'admin', version: '1' })
@ApiBearerAuth()
@RequireScope('admin:*')
@ApiForbiddenResponse({
  description: 'Customers, non-admin agents, and tokens without admin scope',
})
export class AdminController {
  constructor(
    private readonly configService: ConfigService<AllConfigType>,
    private readonly scopeRegistry: ScopeRegistry,
  ) {}

  @Get('settings')
  @ApiOperation({ summary: 'Effective authorization settings' })
  @ApiOkResponse({ type: AdminSettingsResponseDto })
  settings(): AdminSettingsResponseDto {
    const rateLimit = this.configService.getOrThrow('rateLimit', {
      infer: true,
    });
    const auth = this.configService.getOrThrow('auth', { infer: true });

    return {
      rateLimit: {
        defaultLimit: rateLimit.defaultLimit,
        windowSeconds: rateLimit.windowSeconds,
      },
      auth: {
        jwtEnabled: Boolean(auth.jwtSecret),
        jwtAllowedAlgorithms: [...auth.jwtAllowedAlgorithms],
        verificationCacheTtlSeconds: auth.verificationCacheTtlSeconds,
      },
      scopes: this.scopeRegistry.all().map((definition) => definition.scope),
    };
  }
}
