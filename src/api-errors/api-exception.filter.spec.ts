import { NotFoundException, PayloadTooLargeException } from '@nestjs/common';
import { ApiExceptionFilter } from './api-exception.filter';
import { ApiException } from './api.exception';
import { ApiErrorCode } from './api-error-codes';

describe('ApiExceptionFilter', () => {
  const filter = new ApiExceptionFilter();

  it('renders an ApiException as its body', () => {
    expect(
      filter.toErrorResponse(
        new ApiException(ApiErrorCode.Forbidden, 'Token missing required scope: x'),
      ),
    ).toEqual({
      status: 403,
      body: {
        error: {
          code: 'core:forbidden',
          message: 'Token missing required scope: x',
        },
      },
    });
  });

  it('maps framework exceptions onto the registry by status', () => {
    expect(
      filter.toErrorResponse(new NotFoundException('Cannot GET /nowhere')),
    ).toEqual({
      status: 404,
      body: {
        error: { code: 'core:not_found', message: 'Cannot GET /nowhere' },
      },
    });
  });

  it('uses the internal error code for statuses without one', () => {
    expect(filter.toErrorResponse(new PayloadTooLargeException())).toEqual({
      status: 413,
      body: {
        error: { code: 'core:internal_error', message: 'Payload Too Large' },
      },
    });
  });

  it('hides the detail of unexpected errors', () => {
    jest.spyOn(filter['logger'], 'error').mockImplementation(() => undefined);

    expect(
      filter.toErrorResponse(new Error('relation "ticket" does not exist')),
    ).toEqual({
      status: 500,
      body: {
        error: {
          code: 'core:internal_error',
          message: 'Internal server error',
        },
      },
    });
  });
});
