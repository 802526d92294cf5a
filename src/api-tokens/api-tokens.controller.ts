import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { ApiTokensService } from './api-tokens.service';
import { CreateApiTokenDto } from './dto/create-api-token.dto';
import {
  ApiTokenResponseDto,
  CreatedApiTokenResponseDto,
} from './dto/api-token-response.dto';
import { CurrentIdentity } from '../auth/decorators';
import { Identity } from '../auth/identity/identity';
import { ScopeEvaluatorService } from '../auth/scopes/scope-evaluator.service';
import { ApiException } from '../api-errors/api.exception';
import { ApiErrorCode } from '../api-errors/api-error-codes';
import { ParseIdPipe } from '../utils/pipes/parse-id.pipe';

/**
 * API Tokens Controller
 *
 * Personal API tokens of the calling agent or customer. A new token can
 * never carry more than the credential that creates it.
 */
@ApiTags('API Tokens')
@Controller({ path: 'api-tokens', version: '1' })
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Missing or invalid credential' })
export class ApiTokensController {
  constructor(
    private readonly apiTokensService: ApiTokensService,
    private readonly scopeEvaluator: ScopeEvaluatorService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create an API token for the caller' })
  @ApiCreatedResponse({ type: CreatedApiTokenResponseDto })
  @ApiForbiddenResponse({
    description: 'Requested scopes exceed the calling credential',
  })
  async create(
    @CurrentIdentity() identity: Identity,
    @Body() dto: CreateApiTokenDto,
  ): Promise<CreatedApiTokenResponseDto> {
    const requested = dto.scopes && dto.scopes.length > 0 ? dto.scopes : ['*'];
    const exceeding = requested.find(
      (scope) => !this.scopeEvaluator.allowed(identity, scope),
    );
    if (exceeding) {
      throw new ApiException(
        ApiErrorCode.Forbidden,
        `Token missing required scope: ${exceeding}`,
      );
    }

    const { token, plaintext } = await this.apiTokensService.generateToken({
      userId: identity.principalId,
      userType: identity.kind,
      name: dto.name,
      scopes: dto.scopes,
      expiresIn: dto.expiresIn,
      rateLimit: dto.rateLimit,
      createdBy: identity.principalId,
    });

    return new CreatedApiTokenResponseDto(token, plaintext);
  }

  @Get()
  @ApiOperation({ summary: "List the caller's API tokens" })
  @ApiOkResponse({ type: [ApiTokenResponseDto] })
  async list(
    @CurrentIdentity() identity: Identity,
  ): Promise<ApiTokenResponseDto[]> {
    const tokens = await this.apiTokensService.listTokens(
      identity.principalId,
      identity.kind,
    );
    return tokens.map((token) => new ApiTokenResponseDto(token));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: "Revoke one of the caller's API tokens" })
  @ApiNoContentResponse({ description: 'Token revoked' })
  @ApiNotFoundResponse({ description: 'No such token for this caller' })
  async revoke(
    @CurrentIdentity() identity: Identity,
    @Param('id', ParseIdPipe) id: number,
  ): Promise<void> {
    await this.apiTokensService.revokeToken(
      id,
      identity.principalId,
      identity.kind,
      identity.principalId,
    );
  }
}
