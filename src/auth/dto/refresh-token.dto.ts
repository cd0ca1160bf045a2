import { IsNotEmpty, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class RefreshTokenDto {
  @ApiProperty({
    example: 'eyJhbGciOiJIUzI1NiIsImtpZCI6ImRlZmF1bHQifQ...',
    description: 'Refresh token issued at login or by a previous refresh',
  })
  @IsString()
  @IsNotEmpty()
  refreshToken!: string;
}
