import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Identity } from '../identity/identity';

/**
 * The caller as the gateway resolved it. Credential material is not echoed.
 */
export class IdentityResponseDto {
  @ApiProperty({ enum: ['agent', 'customer'] })
  kind: string;

  @ApiProperty({ example: 42 })
  principalId: number;

  @ApiProperty({ enum: ['admin', 'agent', 'customer'] })
  role: string;

  @ApiProperty()
  isAdmin: boolean;

  @ApiProperty({ type: [String], example: ['tickets:read'] })
  scopes: string[];

  @ApiProperty({ enum: ['api_token', 'jwt'] })
  source: string;

  @ApiPropertyOptional({ example: 'jdoe' })
  customerLogin?: string;

  @ApiPropertyOptional({ example: 'acme' })
  customerCompanyId?: string;

  constructor(identity: Identity) {
    this.kind = identity.kind;
    this.principalId = identity.principalId;
    this.role = identity.role;
    this.isAdmin = identity.isAdmin;
    this.scopes = [...identity.scopes];
    this.source = identity.source;
    this.customerLogin = identity.customerLogin;
    this.customerCompanyId = identity.customerCompanyId;
  }
}
