import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ApiToken } from '../domain/entities/api-token.entity';

export class ApiTokenResponseDto {
  @ApiProperty()
  id: number;

  @ApiProperty()
  name: string;

  @ApiProperty({ example: 'a1b2c3d4' })
  prefix: string;

  @ApiProperty({ type: [String] })
  scopes: string[];

  @ApiPropertyOptional({ type: String, nullable: true })
  expiresAt: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  lastUsedAt: string | null;

  @ApiProperty()
  rateLimit: number;

  @ApiProperty()
  createdAt: string;

  @ApiProperty()
  isActive: boolean;

  constructor(token: ApiToken) {
    this.id = token.id;
    this.name = token.name;
    this.prefix = token.prefix;
    this.scopes = token.scopes;
    this.expiresAt = token.expiresAt ? token.expiresAt.toISOString() : null;
    this.lastUsedAt = token.lastUsedAt ? token.lastUsedAt.toISOString() : null;
    this.rateLimit = token.rateLimit;
    this.createdAt = token.createdAt.toISOString();
    this.isActive = token.isActive();
  }
}

export class CreatedApiTokenResponseDto extends ApiTokenResponseDto {
  @ApiProperty({ description: 'Full token, shown only once' })
  token: string;

  @ApiProperty()
  warning: string;

  constructor(token: ApiToken, plaintext: string) {
    super(token);
    this.token = plaintext;
    this.warning =
      'Store this token securely. It will not be shown again.';
  }
}
