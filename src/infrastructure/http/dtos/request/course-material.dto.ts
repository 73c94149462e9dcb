import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  Min,
} from 'class-validator';

export class CourseMaterialRequestDto {
  @ApiPropertyOptional({ description: 'Existing material ID, kept when replacing materials' })
  @IsOptional()
  @IsUUID()
  id?: string;

  @ApiProperty({ example: 'Suturing basics' })
  @IsString()
  @IsNotEmpty()
  title!: string;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  description?: string | null;

  @ApiProperty({ example: 'https://cdn.example.com/materials/suturing.pdf' })
  @IsString()
  fileUrl!: string;

  @ApiProperty({ example: 'pdf' })
  @IsString()
  fileType!: string;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  fileName?: string | null;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsInt()
  @Min(0)
  fileSizeBytes?: number | null;

  @ApiProperty({ example: 1 })
  @IsInt()
  orderIndex!: number;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  isFree?: boolean;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  isRequired?: boolean;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsInt()
  durationMinutes?: number | null;
}
