import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  MaxLength,
  Min,
} from 'class-validator';
import { CourseMaterial } from '@domain/entities';
import { EntityId, Url } from '@domain/value-objects';

export interface CourseMaterialInputProps {
  id?: string;
  title: string;
  description?: string | null;
  fileUrl: string;
  fileType: string;
  fileName?: string | null;
  fileSizeBytes?: number | null;
  orderIndex: number;
  isFree?: boolean;
  isRequired?: boolean;
  durationMinutes?: number | null;
}

/**
 * Material supplied with a create or update course command.
 */
export class CourseMaterialInput {
  @IsOptional()
  @IsString()
  readonly id?: string;

  @IsNotEmpty({ message: 'Material title is required.' })
  @MaxLength(200)
  readonly title!: string;

  @IsOptional()
  @IsString()
  readonly description?: string | null;

  @IsUrl({ require_tld: false }, { message: 'Material file URL must be a valid URL.' })
  readonly fileUrl!: string;

  @IsNotEmpty({ message: 'Material file type is required.' })
  @MaxLength(50)
  readonly fileType!: string;

  @IsOptional()
  @IsString()
  readonly fileName?: string | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly fileSizeBytes?: number | null;

  @IsInt()
  @Min(0, { message: 'Material order index cannot be negative.' })
  readonly orderIndex!: number;

  @IsOptional()
  @IsBoolean()
  readonly isFree?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly isRequired?: boolean;

  @IsOptional()
  @IsInt()
  @Min(1)
  readonly durationMinutes?: number | null;

  static from(props: CourseMaterialInputProps): CourseMaterialInput {
    return Object.assign(new CourseMaterialInput(), props);
  }

  toEntity(): CourseMaterial {
    return CourseMaterial.create(
      {
        title: this.title,
        description: this.description ?? null,
        fileUrl: Url.of(this.fileUrl),
        fileType: this.fileType,
        fileName: this.fileName ?? null,
        fileSizeBytes: this.fileSizeBytes ?? null,
        orderIndex: this.orderIndex,
        isFree: this.isFree,
        isRequired: this.isRequired,
        durationMinutes: this.durationMinutes ?? null,
      },
      this.id ? EntityId.fromString(this.id) : undefined,
    );
  }
}

// Materials in ascending order index, as entities
export const toMaterialEntities = (materials: readonly CourseMaterialInput[]): CourseMaterial[] =>
  [...materials].sort((a, b) => a.orderIndex - b.orderIndex).map((material) => material.toEntity());
