import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsInt, IsOptional, IsString } from 'class-validator';

class RatingRequestDto {
  @ApiProperty()
  @IsString()
  studentId!: string;

  @ApiProperty({ minimum: 1, maximum: 5, example: 5 })
  @IsInt()
  rating!: number;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  review?: string | null;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  isPublic?: boolean;
}

export class RateCourseRequestDto extends RatingRequestDto {}

export class RateInstructorRequestDto extends RatingRequestDto {
  @ApiProperty({ description: 'Completed booking the rating is for' })
  @IsString()
  bookingId!: string;
}
