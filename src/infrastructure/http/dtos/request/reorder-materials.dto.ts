import { ApiProperty } from '@nestjs/swagger';
import { ArrayNotEmpty, IsArray, IsString } from 'class-validator';

export class ReorderMaterialsRequestDto {
  @ApiProperty({ type: [String], description: 'Material IDs in their new order' })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  materialIds!: string[];
}
