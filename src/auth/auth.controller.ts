import { Controller, Get } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { CurrentIdentity } from './decorators';
import { Identity } from './identity/identity';
import { ScopeRegistry } from './scopes/scope-registry';
import { IdentityResponseDto } from './dto/identity-response.dto';
import { ScopeResponseDto } from './dto/scope-response.dto';

@ApiTags('Auth')
@Controller({
  path: 'auth',
  version: '1',
})
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Missing or invalid credential' })
export class AuthController {
  constructor(private readonly scopeRegistry: ScopeRegistry) {}

  @Get('me')
  @ApiOperation({
    summary: 'Resolved caller',
    description:
      'Returns the identity the gateway resolved for the presented credential.',
  })
  @ApiOkResponse({ type: IdentityResponseDto })
  me(@CurrentIdentity() identity: Identity): IdentityResponseDto {
    return new IdentityResponseDto(identity);
  }

  @Get('scopes')
  @ApiOperation({
    summary: 'Grantable scopes',
    description:
      'Scopes the caller may put on a new API token. Customers never see agent-only scopes.',
  })
  @ApiOkResponse({ type: [ScopeResponseDto] })
  scopes(@CurrentIdentity() identity: Identity): ScopeResponseDto[] {
    return this.scopeRegistry
      .availableFor(identity.role, identity.kind === 'customer')
      .map((definition) => new ScopeResponseDto(definition));
  }
}
