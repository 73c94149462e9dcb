import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

export class CreateBookingRequestDto {
  @ApiProperty()
  @IsString()
  studentId!: string;

  @ApiProperty()
  @IsString()
  availabilitySlotId!: string;

  @ApiPropertyOptional({ nullable: true, example: 'WELCOME10' })
  @IsOptional()
  @IsString()
  promoCode?: string | null;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  studentNotes?: string | null;
}

export class CancelBookingRequestDto {
  @ApiProperty({ example: 'Schedule conflict' })
  @IsString()
  reason!: string;
}

export class RescheduleBookingRequestDto {
  @ApiProperty()
  @IsString()
  newSlotId!: string;
}

export class UpdateBookingNotesRequestDto {
  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  studentNotes?: string | null;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  instructorNotes?: string | null;
}
