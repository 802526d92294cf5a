import { HttpException } from '@nestjs/common';
import { ApiErrorRegistry, apiErrorRegistry } from './api-error.registry';

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
  };
}

/**
 * HTTP exception carrying a registered API error code.
 * Status and default message come from the registry.
 */
export class ApiException extends HttpException {
  readonly code: string;

  constructor(
    code: string,
    message?: string,
    registry: ApiErrorRegistry = apiErrorRegistry,
  ) {
    const body: ApiErrorBody = {
      error: { code, message: message ?? registry.message(code) },
    };
    super(body, registry.httpStatus(code));
    this.code = code;
  }

  getBody(): ApiErrorBody {
    const response = this.getResponse();
    if (isApiErrorBody(response)) {
      return response;
    }
    return { error: { code: this.code, message: this.message } };
  }
}

export function isApiErrorBody(value: unknown): value is ApiErrorBody {
  if (typeof value !== 'object' || value === null || !('error' in value)) {
    return false;
  }
  const error: unknown = value.error;
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}
