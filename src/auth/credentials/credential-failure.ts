import { ApiErrorCode } from '../../api-errors/api-error-codes';

export type CredentialFailure =
  | 'malformed'
  | 'unknown'
  | 'expired'
  | 'revoked'
  | 'invalid_signature'
  | 'backend_unavailable';

export const CREDENTIAL_FAILURE_CODES: Record<CredentialFailure, string> = {
  malformed: ApiErrorCode.InvalidToken,
  unknown: ApiErrorCode.InvalidToken,
  invalid_signature: ApiErrorCode.InvalidToken,
  expired: ApiErrorCode.TokenExpired,
  revoked: ApiErrorCode.TokenRevoked,
  backend_unavailable: ApiErrorCode.ServiceUnavailable,
};
