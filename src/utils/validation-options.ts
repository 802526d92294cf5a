import {
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';
import { ApiErrorCode } from '../api-errors/api-error-codes';
import { ApiException } from '../api-errors/api.exception';

function collectMessages(errors: ValidationError[], path = ''): string[] {
  return errors.flatMap((error) => {
    const property = path ? `${path}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((constraint) =>
      path ? `${path}.${constraint}` : constraint,
    );
    return [...own, ...collectMessages(error.children ?? [], property)];
  });
}

const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) => {
    return new ApiException(
      ApiErrorCode.ValidationFailed,
      collectMessages(errors).join('; '),
    );
  },
};

export default validationOptions;
