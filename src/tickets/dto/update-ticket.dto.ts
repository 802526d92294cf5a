import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class UpdateTicketDto {
  @ApiProperty({ example: 'Printer on floor 2 jams on A3' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  title!: string;
}
