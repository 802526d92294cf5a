import { NullableType } from '../../../utils/types/nullable.type';
import {
  ApiToken,
  ApiTokenUserType,
  NewApiToken,
} from '../entities/api-token.entity';
import { TokenOwner } from '../entities/token-owner';

export abstract class ApiTokenRepository {
  /** Every token, active or not, stored under the prefix */
  abstract findByPrefix(prefix: string): Promise<ApiToken[]>;

  abstract findById(id: number): Promise<NullableType<ApiToken>>;

  abstract findByUser(
    userId: number,
    userType: ApiTokenUserType,
  ): Promise<ApiToken[]>;

  abstract create(data: NewApiToken): Promise<ApiToken>;

  abstract updateLastUsed(id: number, ip: string, at: Date): Promise<void>;

  /** Returns false when the token does not exist or is already revoked */
  abstract revoke(id: number, revokedBy: number, at: Date): Promise<boolean>;

  /** Null when the token's user no longer exists */
  abstract findOwner(
    userId: number,
    userType: ApiTokenUserType,
  ): Promise<NullableType<TokenOwner>>;
}
