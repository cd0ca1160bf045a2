import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class RequestLoginDto {
  @ApiProperty({
    example: '+994501234567',
    description: 'Phone number in international or national format',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  phone!: string;
}
