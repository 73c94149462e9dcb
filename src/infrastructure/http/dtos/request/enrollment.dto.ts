import { ApiProperty } from '@nestjs/swagger';
import { IsNumber, IsString } from 'class-validator';

export class EnrollStudentRequestDto {
  @ApiProperty()
  @IsString()
  studentId!: string;

  @ApiProperty()
  @IsString()
  courseId!: string;
}

export class UpdateProgressRequestDto {
  @ApiProperty({ minimum: 0, maximum: 100, example: 40 })
  @IsNumber()
  progressPercentage!: number;
}
