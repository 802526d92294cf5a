import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsPositive } from 'class-validator';

export class MoveTicketDto {
  @ApiProperty({ example: 2, description: 'Target queue' })
  @IsInt()
  @IsPositive()
  queueId!: number;
}
