import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { DIFFICULTY_LEVELS, DifficultyLevel } from '@domain/value-objects';
import { CourseMaterialRequestDto } from './course-material.dto';

/**
 * Request DTO for creating a course.
 * Field rules (lengths, ranges, URLs) are enforced by the command itself.
 */
export class CreateCourseRequestDto {
  @ApiProperty({ description: 'Instructor user ID' })
  @IsString()
  instructorId!: string;

  @ApiProperty({ example: 'Advanced Cardiac Life Support' })
  @IsString()
  title!: string;

  @ApiProperty({ example: 'Hands-on ACLS preparation with case simulations.' })
  @IsString()
  description!: string;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  shortDescription?: string | null;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  content?: string | null;

  @ApiProperty({ example: 'Cardiology' })
  @IsString()
  category!: string;

  @ApiPropertyOptional({ enum: DIFFICULTY_LEVELS, nullable: true })
  @IsOptional()
  @IsIn(DIFFICULTY_LEVELS)
  difficultyLevel?: DifficultyLevel | null;

  @ApiPropertyOptional({ type: [String], example: ['acls', 'emergency'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];

  @ApiProperty({ example: 149.99 })
  @IsNumber()
  price!: number;

  @ApiPropertyOptional({ example: 'USD', default: 'USD' })
  @IsOptional()
  @IsString()
  currency?: string;

  @ApiPropertyOptional({ nullable: true, example: 240 })
  @IsOptional()
  @IsInt()
  durationMinutes?: number | null;

  @ApiPropertyOptional({ nullable: true, example: 30 })
  @IsOptional()
  @IsInt()
  maxStudents?: number | null;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  thumbnailUrl?: string | null;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  videoIntroUrl?: string | null;

  @ApiPropertyOptional({ type: [CourseMaterialRequestDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CourseMaterialRequestDto)
  materials?: CourseMaterialRequestDto[];
}
