import { Inject, Injectable } from '@nestjs/common';
import { IsBoolean, IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { Result, success } from '../../common/result';
import {
  RatingSummaryOutputDto,
  summarizeRatings,
  toCourseRatingOutput,
  toInstructorRatingOutput,
} from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { IRatingRepositoryPort } from '../../ports';

export class GetCourseRatingsQuery
  extends ResultQuery<RatingSummaryOutputDto>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 10 * 60;
  readonly cachePrefix = CachePrefixes.GetCourseRatings;

  @IsNotEmpty({ message: 'Course ID is required.' })
  readonly courseId: string;

  @IsBoolean()
  readonly publicOnly: boolean;

  constructor(courseId: string, publicOnly = true) {
    super();
    this.courseId = courseId;
    this.publicOnly = publicOnly;
  }
}

@Injectable()
export class GetCourseRatingsHandler
  implements RequestHandler<GetCourseRatingsQuery, Result<RatingSummaryOutputDto>>
{
  constructor(
    @Inject('IRatingRepository')
    private readonly ratingRepository: IRatingRepositoryPort,
  ) {}

  async handle(query: GetCourseRatingsQuery): Promise<Result<RatingSummaryOutputDto>> {
    const ratings = await this.ratingRepository.findByCourse(
      EntityId.fromString(query.courseId),
      query.publicOnly,
    );
    return success(summarizeRatings(query.courseId, ratings.map(toCourseRatingOutput)));
  }
}

export class GetInstructorRatingsQuery
  extends ResultQuery<RatingSummaryOutputDto>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 10 * 60;
  readonly cachePrefix = CachePrefixes.GetInstructorRatings;

  @IsNotEmpty({ message: 'Instructor ID is required.' })
  readonly instructorId: string;

  @IsBoolean()
  readonly publicOnly: boolean;

  constructor(instructorId: string, publicOnly = true) {
    super();
    this.instructorId = instructorId;
    this.publicOnly = publicOnly;
  }
}

@Injectable()
export class GetInstructorRatingsHandler
  implements RequestHandler<GetInstructorRatingsQuery, Result<RatingSummaryOutputDto>>
{
  constructor(
    @Inject('IRatingRepository')
    private readonly ratingRepository: IRatingRepositoryPort,
  ) {}

  async handle(query: GetInstructorRatingsQuery): Promise<Result<RatingSummaryOutputDto>> {
    const ratings = await this.ratingRepository.findByInstructor(
      EntityId.fromString(query.instructorId),
      query.publicOnly,
    );
    return success(summarizeRatings(query.instructorId, ratings.map(toInstructorRatingOutput)));
  }
}
