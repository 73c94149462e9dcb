import { ApiProperty } from '@nestjs/swagger';
import { IsString } from 'class-validator';

export class LoginRequestDto {
  @ApiProperty({ example: 'dana.reyes@example.com' })
  @IsString()
  email!: string;

  @ApiProperty({ example: 'test-password-1' })
  @IsString()
  password!: string;
}

export class ChangePasswordRequestDto {
  @ApiProperty()
  @IsString()
  currentPassword!: string;

  @ApiProperty({ minLength: 8 })
  @IsString()
  newPassword!: string;
}

export class ConfirmEmailRequestDto {
  @ApiProperty({ description: 'Token sent in the confirmation notification' })
  @IsString()
  token!: string;
}

export class PasswordResetRequestDto {
  @ApiProperty({ example: 'dana.reyes@example.com' })
  @IsString()
  email!: string;
}

export class ResetPasswordRequestDto {
  @ApiProperty()
  @IsString()
  token!: string;

  @ApiProperty({ minLength: 8 })
  @IsString()
  newPassword!: string;
}
