import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional, IsString } from 'class-validator';
import { USER_ROLES, UserRole } from '@domain/value-objects';

export class CreateUserRequestDto {
  @ApiProperty({ example: 'Dana Reyes' })
  @IsString()
  name!: string;

  @ApiProperty({ example: 'dana.reyes@example.com' })
  @IsString()
  email!: string;

  @ApiProperty({ example: 'test-password-1', minLength: 8 })
  @IsString()
  password!: string;

  @ApiPropertyOptional({ enum: USER_ROLES, default: 'student' })
  @IsOptional()
  @IsIn(USER_ROLES)
  role?: UserRole;

  @ApiPropertyOptional({ example: 'UTC', default: 'UTC' })
  @IsOptional()
  @IsString()
  timezone?: string;

  @ApiPropertyOptional({ example: '+15551234567', nullable: true })
  @IsOptional()
  @IsString()
  phoneNumber?: string | null;
}
