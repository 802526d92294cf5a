import { ExecutionContext, createParamDecorator } from '@nestjs/common';
import { AuthenticatedRequest } from '../types/authenticated-request.type';
import { Identity } from '../identity/identity';
import { ApiException } from '../../api-errors/api.exception';
import { ApiErrorCode } from '../../api-errors/api-error-codes';

/**
 * The verified caller. There is no default principal: a handler reached
 * without an identity answers `core:unauthorized`.
 */
export const CurrentIdentity = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Identity => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.identity) {
      throw new ApiException(ApiErrorCode.Unauthorized);
    }
    return request.identity;
  },
);
