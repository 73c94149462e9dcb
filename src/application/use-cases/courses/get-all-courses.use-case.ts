import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsISO8601,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import {
  DIFFICULTY_LEVELS,
  DifficultyLevel,
  SORT_DIRECTIONS,
  SortDirection,
} from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, toPagedResult } from '../../common/paged-result';
import { Result, success } from '../../common/result';
import { CourseListOutputDto, toCourseOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import {
  COURSE_SORT_FIELDS,
  CourseSearchCriteria,
  CourseSortField,
  DateRange,
  ICourseRepositoryPort,
} from '../../ports';

export interface CourseFilters {
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
  createdFrom?: string;
  createdTo?: string;
  publishedFrom?: string;
  publishedTo?: string;
  updatedFrom?: string;
  updatedTo?: string;
  minDurationMinutes?: number;
  maxDurationMinutes?: number;
  minMaxStudents?: number;
  maxMaxStudents?: number;
  sortBy?: CourseSortField;
  sortDirection?: SortDirection;
  page?: number;
  pageSize?: number;
}

/**
 * Paged, filtered course catalogue. Pages are 0-based; dates are ISO-8601 strings.
 */
export class GetAllCoursesQuery
  extends ResultQuery<CourseListOutputDto>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 10 * 60;
  readonly cachePrefix = CachePrefixes.GetAllCourses;

  @IsOptional() @IsBoolean() readonly isPublished?: boolean;
  @IsOptional() @IsBoolean() readonly isActive?: boolean;
  @IsOptional() @IsString() readonly instructorId?: string;
  @IsOptional() @IsString() readonly titleContains?: string;
  @IsOptional() @IsString() readonly descriptionContains?: string;
  @IsOptional() @IsString() readonly category?: string;
  @IsOptional() @IsIn(DIFFICULTY_LEVELS) readonly difficultyLevel?: DifficultyLevel;
  @IsOptional() @IsString() readonly tagsContains?: string;

  @IsOptional()
  @IsNumber()
  @Min(0, { message: 'Minimum price cannot be negative.' })
  readonly minPrice?: number;

  @IsOptional()
  @IsNumber()
  @Min(0, { message: 'Maximum price cannot be negative.' })
  readonly maxPrice?: number;

  @IsOptional() @IsString() readonly currency?: string;
  @IsOptional() @IsISO8601() readonly createdFrom?: string;
  @IsOptional() @IsISO8601() readonly createdTo?: string;
  @IsOptional() @IsISO8601() readonly publishedFrom?: string;
  @IsOptional() @IsISO8601() readonly publishedTo?: string;
  @IsOptional() @IsISO8601() readonly updatedFrom?: string;
  @IsOptional() @IsISO8601() readonly updatedTo?: string;
  @IsOptional() @IsInt() @Min(0) readonly minDurationMinutes?: number;
  @IsOptional() @IsInt() @Min(0) readonly maxDurationMinutes?: number;
  @IsOptional() @IsInt() @Min(0) readonly minMaxStudents?: number;
  @IsOptional() @IsInt() @Min(0) readonly maxMaxStudents?: number;

  @IsOptional()
  @IsIn(COURSE_SORT_FIELDS, { message: `Sort field must be one of: ${COURSE_SORT_FIELDS.join(', ')}.` })
  readonly sortBy?: CourseSortField;

  @IsOptional()
  @IsIn(SORT_DIRECTIONS, { message: 'Sort direction must be asc or desc.' })
  readonly sortDirection?: SortDirection;

  @IsInt()
  @Min(0, { message: 'Page cannot be negative.' })
  readonly page: number;

  @IsInt()
  @Min(1, { message: `Page size must be between 1 and ${MAX_PAGE_SIZE}.` })
  @Max(MAX_PAGE_SIZE, { message: `Page size must be between 1 and ${MAX_PAGE_SIZE}.` })
  readonly pageSize: number;

  constructor(filters: CourseFilters = {}) {
    super();
    Object.assign(this, filters);
    this.page = filters.page ?? 0;
    this.pageSize = filters.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  toCriteria(): CourseSearchCriteria {
    return {
      isPublished: this.isPublished,
      isActive: this.isActive,
      instructorId: this.instructorId,
      titleContains: this.titleContains,
      descriptionContains: this.descriptionContains,
      category: this.category,
      difficultyLevel: this.difficultyLevel,
      tagsContains: this.tagsContains,
      minPrice: this.minPrice,
      maxPrice: this.maxPrice,
      currency: this.currency?.toUpperCase(),
      created: toDateRange(this.createdFrom, this.createdTo),
      published: toDateRange(this.publishedFrom, this.publishedTo),
      updated: toDateRange(this.updatedFrom, this.updatedTo),
      minDurationMinutes: this.minDurationMinutes,
      maxDurationMinutes: this.maxDurationMinutes,
      minMaxStudents: this.minMaxStudents,
      maxMaxStudents: this.maxMaxStudents,
      sortBy: this.sortBy,
      sortDirection: this.sortDirection,
    };
  }
}

const toDateRange = (from?: string, to?: string): DateRange | undefined => {
  if (from === undefined && to === undefined) {
    return undefined;
  }
  return {
    from: from !== undefined ? new Date(from) : undefined,
    to: to !== undefined ? new Date(to) : undefined,
  };
};

@Injectable()
export class GetAllCoursesHandler
  implements RequestHandler<GetAllCoursesQuery, Result<CourseListOutputDto>>
{
  private readonly logger = new Logger(GetAllCoursesHandler.name);

  constructor(
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
  ) {}

  async handle(query: GetAllCoursesQuery): Promise<Result<CourseListOutputDto>> {
    const page = { page: query.page, pageSize: query.pageSize };
    const { items, totalCount } = await this.courseRepository.search(query.toCriteria(), page);

    this.logger.debug(`Found ${totalCount} courses, returning page ${query.page}`);
    return success(toPagedResult(items.map(toCourseOutput), totalCount, page));
  }
}
