import { HttpStatus } from '@nestjs/common';
import { ApiErrorRegistry } from './api-error.registry';
import { ApiErrorCode } from './api-error-codes';

describe('ApiErrorRegistry', () => {
  let registry: ApiErrorRegistry;

  beforeEach(() => {
    registry = new ApiErrorRegistry();
  });

  it('resolves core codes to status and message', () => {
    expect(registry.httpStatus(ApiErrorCode.TokenRevoked)).toBe(
      HttpStatus.UNAUTHORIZED,
    );
    expect(registry.message(ApiErrorCode.RateLimited)).toBe(
      'Too many requests',
    );
  });

  it('treats unknown codes as internal errors', () => {
    expect(registry.httpStatus('calendar:missing')).toBe(
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
    expect(registry.message('calendar:missing')).toBe('calendar:missing');
  });

  it('prefixes plugin codes with their namespace', () => {
    registry.registerNamespace('calendar', [
      {
        code: 'event_full',
        message: 'Event is full',
        httpStatus: HttpStatus.CONFLICT,
      },
    ]);

    expect(registry.get('calendar:event_full')).toEqual({
      code: 'calendar:event_full',
      message: 'Event is full',
      httpStatus: HttpStatus.CONFLICT,
    });
    expect(registry.listNamespace('calendar').map((d) => d.code)).toEqual([
      'calendar:event_full',
    ]);
    expect(registry.namespaces()).toEqual(['core', 'calendar']);
  });

  it('maps a status to the first code registered for it', () => {
    expect(registry.codeForStatus(HttpStatus.UNAUTHORIZED)).toBe(
      ApiErrorCode.Unauthorized,
    );
    expect(registry.codeForStatus(HttpStatus.I_AM_A_TEAPOT)).toBeUndefined();
  });
});
