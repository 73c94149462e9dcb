import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { Result, notFound, success } from '../../common/result';
import { CourseOutputDto, toCourseOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { ICourseRepositoryPort } from '../../ports';

export class GetCourseByIdQuery extends ResultQuery<CourseOutputDto> implements CacheableRequest {
  readonly cacheDurationSeconds = 30 * 60;
  readonly cachePrefix = CachePrefixes.GetCourseById;

  @IsNotEmpty({ message: 'Course ID is required.' })
  readonly courseId: string;

  constructor(courseId: string) {
    super();
    this.courseId = courseId;
  }
}

@Injectable()
export class GetCourseByIdHandler
  implements RequestHandler<GetCourseByIdQuery, Result<CourseOutputDto>>
{
  constructor(
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
  ) {}

  async handle(query: GetCourseByIdQuery): Promise<Result<CourseOutputDto>> {
    const course = await this.courseRepository.findById(EntityId.fromString(query.courseId));
    if (!course) {
      return notFound(`Course with ID ${query.courseId} not found`);
    }
    return success(toCourseOutput(course));
  }
}
