import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsISO8601, IsInt, IsNumber, IsOptional, IsString } from 'class-validator';

export class CreateAvailabilitySlotRequestDto {
  @ApiProperty()
  @IsString()
  instructorId!: string;

  @ApiProperty()
  @IsString()
  courseId!: string;

  @ApiProperty({ format: 'date-time', example: '2026-11-02T09:00:00.000Z' })
  @IsISO8601()
  startTime!: string;

  @ApiProperty({ format: 'date-time', example: '2026-11-02T10:30:00.000Z' })
  @IsISO8601()
  endTime!: string;

  @ApiProperty({ example: 80 })
  @IsNumber()
  price!: number;

  @ApiPropertyOptional({ example: 'USD', default: 'USD' })
  @IsOptional()
  @IsString()
  currency?: string;

  @ApiPropertyOptional({ default: 1 })
  @IsOptional()
  @IsInt()
  maxParticipants?: number;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  notes?: string | null;

  @ApiPropertyOptional({ nullable: true, example: 'weekly' })
  @IsOptional()
  @IsString()
  recurringPattern?: string | null;
}

export class UpdateAvailabilitySlotRequestDto {
  @ApiPropertyOptional({ format: 'date-time' })
  @IsOptional()
  @IsISO8601()
  startTime?: string;

  @ApiPropertyOptional({ format: 'date-time' })
  @IsOptional()
  @IsISO8601()
  endTime?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsNumber()
  price?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  maxParticipants?: number;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  notes?: string | null;

  @ApiPropertyOptional({ nullable: true, description: 'Empty or null stops the recurrence' })
  @IsOptional()
  @IsString()
  recurringPattern?: string | null;
}

export class AvailableSlotsQueryDto {
  @ApiProperty({ format: 'date-time' })
  @IsISO8601()
  startDate!: string;

  @ApiProperty({ format: 'date-time' })
  @IsISO8601()
  endDate!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  instructorId?: string;
}
