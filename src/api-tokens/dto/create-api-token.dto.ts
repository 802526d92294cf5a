import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { MAX_TOKEN_RATE_LIMIT } from '../api-tokens.service';

export class CreateApiTokenDto {
  @ApiProperty({ example: 'CI pipeline' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @ApiPropertyOptional({
    example: ['tickets:read'],
    description: 'Empty or omitted inherits every permission of the user',
  })
  @IsArray()
  @ArrayMaxSize(50)
  @IsString({ each: true })
  @IsOptional()
  scopes?: string[];

  @ApiPropertyOptional({ example: '90d', description: '30d, 3m, 1y or never' })
  @IsString()
  @Matches(/^(never|\d+[dmy])$/i)
  @IsOptional()
  expiresIn?: string;

  @ApiPropertyOptional({ example: 1000 })
  @IsInt()
  @Min(1)
  @Max(MAX_TOKEN_RATE_LIMIT)
  @IsOptional()
  rateLimit?: number;
}
