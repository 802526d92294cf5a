import { HttpStatus } from '@nestjs/common';

export interface ApiErrorDefinition {
  /** Namespaced code, e.g. `core:not_found` */
  code: string;
  message: string;
  httpStatus: HttpStatus;
}

export const ApiErrorCode = {
  Unauthorized: 'core:unauthorized',
  Forbidden: 'core:forbidden',
  InvalidToken: 'core:invalid_token',
  TokenExpired: 'core:token_expired',
  TokenRevoked: 'core:token_revoked',

  InvalidRequest: 'core:invalid_request',
  ValidationFailed: 'core:validation_failed',
  InvalidScope: 'core:invalid_scope',
  InvalidId: 'core:invalid_id',

  NotFound: 'core:not_found',
  Conflict: 'core:conflict',

  RateLimited: 'core:rate_limited',

  InternalError: 'core:internal_error',
  ServiceUnavailable: 'core:service_unavailable',
} as const;

export type CoreApiErrorCode = (typeof ApiErrorCode)[keyof typeof ApiErrorCode];

export const CORE_API_ERRORS: readonly ApiErrorDefinition[] = [
  {
    code: ApiErrorCode.Unauthorized,
    message: 'Authentication required',
    httpStatus: HttpStatus.UNAUTHORIZED,
  },
  {
    code: ApiErrorCode.Forbidden,
    message: 'Permission denied',
    httpStatus: HttpStatus.FORBIDDEN,
  },
  {
    code: ApiErrorCode.InvalidToken,
    message: 'Invalid or malformed token',
    httpStatus: HttpStatus.UNAUTHORIZED,
  },
  {
    code: ApiErrorCode.TokenExpired,
    message: 'Token has expired',
    httpStatus: HttpStatus.UNAUTHORIZED,
  },
  {
    code: ApiErrorCode.TokenRevoked,
    message: 'Token has been revoked',
    httpStatus: HttpStatus.UNAUTHORIZED,
  },
  {
    code: ApiErrorCode.InvalidRequest,
    message: 'Invalid request body',
    httpStatus: HttpStatus.BAD_REQUEST,
  },
  {
    code: ApiErrorCode.ValidationFailed,
    message: 'Request validation failed',
    httpStatus: HttpStatus.BAD_REQUEST,
  },
  {
    code: ApiErrorCode.InvalidScope,
    message: 'Invalid scope value',
    httpStatus: HttpStatus.BAD_REQUEST,
  },
  {
    code: ApiErrorCode.InvalidId,
    message: 'Invalid ID format',
    httpStatus: HttpStatus.BAD_REQUEST,
  },
  {
    code: ApiErrorCode.NotFound,
    message: 'Resource not found',
    httpStatus: HttpStatus.NOT_FOUND,
  },
  {
    code: ApiErrorCode.Conflict,
    message: 'Resource conflict',
    httpStatus: HttpStatus.CONFLICT,
  },
  {
    code: ApiErrorCode.RateLimited,
    message: 'Too many requests',
    httpStatus: HttpStatus.TOO_MANY_REQUESTS,
  },
  {
    code: ApiErrorCode.InternalError,
    message: 'Internal server error',
    httpStatus: HttpStatus.INTERNAL_SERVER_ERROR,
  },
  {
    code: ApiErrorCode.ServiceUnavailable,
    message: 'Service temporarily unavailable',
    httpStatus: HttpStatus.SERVICE_UNAVAILABLE,
  },
];
