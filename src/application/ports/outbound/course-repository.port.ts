import { Course } from '@domain/entities';
import { DifficultyLevel, EntityId, SortDirection } from '@domain/value-objects';
import { PageRequest } from '../../common/paged-result';

export const COURSE_SORT_FIELDS = [
  'title',
  'price',
  'createdAt',
  'publishedAt',
  'updatedAt',
  'durationMinutes',
] as const;

export type CourseSortField = (typeof COURSE_SORT_FIELDS)[number];

export interface DateRange {
  from?: Date;
  to?: Date;
}

/**
 * Filters for course listings. Every field is optional; set fields are combined with AND.
 */
export interface CourseSearchCriteria {
  isPublished?: boolean;
  isActive?: boolean;
  instructorId?: string;
  titleContains?: string;
  descriptionContains?: string;
  category?: string;
  difficultyLevel?: DifficultyLevel;
  tagsContains?: string;
  minPrice?: number;
  maxPrice?: number;
  currency?: string;
  created?: DateRange;
  published?: DateRange;
  updated?: DateRange;
  minDurationMinutes?: number;
  maxDurationMinutes?: number;
  minMaxStudents?: number;
  maxMaxStudents?: number;
  sortBy?: CourseSortField;
  sortDirection?: SortDirection;
}

export interface ICourseRepositoryPort {
  /**
   * Persists a course together with its embedded materials.
   *
   * @param course - The course aggregate to save
   */
  save(course: Course): Promise<void>;

  /**
   * @returns the course if found (active or not), null otherwise
   */
  findById(id: EntityId): Promise<Course | null>;

  /**
   * Retrieves all courses of an instructor, newest first.
   */
  findByInstructor(instructorId: EntityId): Promise<Course[]>;

  /**
   * Retrieves one page of courses matching the criteria.
   * Defaults to newest first when no sort field is given.
   */
  search(
    criteria: CourseSearchCriteria,
    page: PageRequest,
  ): Promise<{ items: Course[]; totalCount: number }>;
}
