import { IsNotEmpty, IsNumberString, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class CompleteLoginDto {
  @ApiProperty({ example: '+994501234567' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  phone!: string;

  @ApiProperty({ example: '123456', description: 'Numeric code received by SMS' })
  @IsNumberString({ no_symbols: true })
  @MaxLength(10)
  code!: string;
}
