import { ApiProperty } from '@nestjs/swagger';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class CreateTicketDto {
  @ApiProperty({ example: 'Printer on floor 2 is offline' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  title!: string;

  @ApiProperty({ example: 1, description: 'Queue the ticket is created in' })
  @IsInt()
  @IsPositive()
  queueId!: number;

  @ApiProperty({ example: 3, required: false, minimum: 1, maximum: 5 })
  @IsInt()
  @Min(1)
  @Max(5)
  @IsOptional()
  priorityId?: number;
}
