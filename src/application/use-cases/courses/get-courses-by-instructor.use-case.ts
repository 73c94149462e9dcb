import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { Result, success } from '../../common/result';
import { CourseOutputDto, toCourseOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { ICourseRepositoryPort } from '../../ports';

export class GetCoursesByInstructorQuery
  extends ResultQuery<CourseOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 10 * 60;
  readonly cachePrefix = CachePrefixes.GetCoursesByInstructor;

  @IsNotEmpty({ message: 'Instructor ID is required.' })
  readonly instructorId: string;

  constructor(instructorId: string) {
    super();
    this.instructorId = instructorId;
  }
}

@Injectable()
export class GetCoursesByInstructorHandler
  implements RequestHandler<GetCoursesByInstructorQuery, Result<CourseOutputDto[]>>
{
  constructor(
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
  ) {}

  async handle(query: GetCoursesByInstructorQuery): Promise<Result<CourseOutputDto[]>> {
    const courses = await this.courseRepository.findByInstructor(
      EntityId.fromString(query.instructorId),
    );
    return success(courses.map(toCourseOutput));
  }
}
