import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { ApiErrorCode } from './api-error-codes';
import { apiErrorRegistry } from './api-error.registry';
import { ApiErrorBody, ApiException } from './api.exception';

/**
 * Renders every error as `{ error: { code, message } }`.
 *
 * Framework HttpExceptions are mapped onto the registry by status; anything
 * else is logged and reported as `core:internal_error` without detail.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.toErrorResponse(exception);

    if (!response.headersSent) {
      response.status(status).json(body);
    }
  }

  toErrorResponse(exception: unknown): { status: number; body: ApiErrorBody } {
    if (exception instanceof ApiException) {
      return { status: exception.getStatus(), body: exception.getBody() };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const code =
        apiErrorRegistry.codeForStatus(status) ?? ApiErrorCode.InternalError;
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(
          `Unhandled HTTP ${status}: ${exception.message}`,
          exception.stack,
        );
        return {
          status,
          body: { error: { code, message: apiErrorRegistry.message(code) } },
        };
      }
      return {
        status,
        body: { error: { code, message: this.clientMessage(exception, code) } },
      };
    }

    this.logger.error(
      `Unhandled error: ${exception instanceof Error ? exception.message : String(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        error: {
          code: ApiErrorCode.InternalError,
          message: apiErrorRegistry.message(ApiErrorCode.InternalError),
        },
      },
    };
  }

  private clientMessage(exception: HttpException, code: string): string {
    const response = exception.getResponse();
    if (typeof response === 'string') {
      return response;
    }
    if (typeof response === 'object' && 'message' in response) {
      const message: unknown = response.message;
      if (typeof message === 'string') {
        return message;
      }
      if (Array.isArray(message)) {
        return message.filter((m) => typeof m === 'string').join(', ');
      }
    }
    return apiErrorRegistry.message(code);
  }
}
