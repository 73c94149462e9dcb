import { Course, CourseMaterial } from '@domain/entities';
import { PagedResult } from '../common/paged-result';

/**
 * DTOs returned by course use cases. Dates are ISO-8601 strings so the
 * objects survive a round trip through the cache unchanged.
 */
export interface CourseMaterialOutputDto {
  readonly id: string;
  readonly title: string;
  readonly description: string | null;
  readonly fileUrl: string;
  readonly fileType: string;
  readonly fileName: string | null;
  readonly fileSizeBytes: number | null;
  readonly orderIndex: number;
  readonly isFree: boolean;
  readonly isRequired: boolean;
  readonly durationMinutes: number | null;
}

export interface CourseOutputDto {
  readonly id: string;
  readonly instructorId: string;
  readonly title: string;
  readonly description: string;
  readonly shortDescription: string | null;
  readonly content: string | null;
  readonly category: string;
  readonly difficultyLevel: string | null;
  readonly tags: string[];
  readonly price: number;
  readonly currency: string;
  /** Price formatted for display (e.g., "$49.99") */
  readonly formattedPrice: string;
  readonly durationMinutes: number | null;
  readonly maxStudents: number | null;
  readonly thumbnailUrl: string | null;
  readonly videoIntroUrl: string | null;
  readonly isPublished: boolean;
  readonly publishedAt: string | null;
  readonly isActive: boolean;
  readonly materials: CourseMaterialOutputDto[];
  readonly createdAt: string;
  readonly updatedAt: string;
}

export type CourseListOutputDto = PagedResult<CourseOutputDto>;

export function toCourseMaterialOutput(material: CourseMaterial): CourseMaterialOutputDto {
  return {
    id: material.id.toString(),
    title: material.title,
    description: material.description,
    fileUrl: material.fileUrl.toString(),
    fileType: material.fileType,
    fileName: material.fileName,
    fileSizeBytes: material.fileSizeBytes,
    orderIndex: material.orderIndex,
    isFree: material.isFree,
    isRequired: material.isRequired,
    durationMinutes: material.durationMinutes,
  };
}

export function toCourseOutput(course: Course): CourseOutputDto {
  return {
    id: course.id.toString(),
    instructorId: course.instructorId.toString(),
    title: course.title,
    description: course.description,
    shortDescription: course.shortDescription,
    content: course.content,
    category: course.category,
    difficultyLevel: course.difficultyLevel,
    tags: [...course.tags],
    price: course.price.amount,
    currency: course.price.currency,
    formattedPrice: course.price.format(),
    durationMinutes: course.durationMinutes,
    maxStudents: course.maxStudents,
    thumbnailUrl: course.thumbnailUrl?.toString() ?? null,
    videoIntroUrl: course.videoIntroUrl?.toString() ?? null,
    isPublished: course.isPublished,
    publishedAt: course.publishedAt?.toISOString() ?? null,
    isActive: course.isActive,
    materials: course.materials.map(toCourseMaterialOutput),
    createdAt: course.createdAt.toISOString(),
    updatedAt: course.updatedAt.toISOString(),
  };
}
