import { Injectable, PipeTransform } from '@nestjs/common';
import { ApiException } from '../../api-errors/api.exception';
import { ApiErrorCode } from '../../api-errors/api-error-codes';

/** Positive integer id from a route parameter or body field, else null */
export function parseId(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value > 0 ? value : null;
  }
  if (typeof value === 'string' && /^[1-9]\d*$/.test(value)) {
    const id = Number(value);
    return Number.isSafeInteger(id) ? id : null;
  }
  return null;
}

/**
 * Route id parameter as a positive integer; anything else is
 * `core:invalid_id`.
 */
@Injectable()
export class ParseIdPipe implements PipeTransform<unknown, number> {
  transform(value: unknown): number {
    const id = parseId(value);
    if (id === null) {
      throw new ApiException(ApiErrorCode.InvalidId);
    }
    return id;
  }
}
