import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ScopeDefinition } from '../scopes/scope-definition';

export class ScopeResponseDto {
  @ApiProperty({ example: 'tickets:read' })
  scope: string;

  @ApiProperty({ example: 'View tickets' })
  description: string;

  @ApiProperty({ example: 'core' })
  category: string;

  @ApiPropertyOptional({ enum: ['admin', 'agent', 'customer'] })
  requireRole?: string;

  @ApiPropertyOptional()
  agentOnly?: boolean;

  constructor(definition: ScopeDefinition) {
    this.scope = definition.scope;
    this.description = definition.description;
    this.category = definition.category;
    this.requireRole = definition.requireRole;
    this.agentOnly = definition.agentOnly;
  }
}
