import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { Result, success } from '../../common/result';
import { EnrollmentOutputDto, toEnrollmentOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { IEnrollmentRepositoryPort } from '../../ports';

export class GetEnrollmentsByUserQuery
  extends ResultQuery<EnrollmentOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix = CachePrefixes.GetEnrollmentsByUser;

  @IsNotEmpty({ message: 'User ID is required.' })
  readonly userId: string;

  constructor(userId: string) {
    super();
    this.userId = userId;
  }
}

@Injectable()
export class GetEnrollmentsByUserHandler
  implements RequestHandler<GetEnrollmentsByUserQuery, Result<EnrollmentOutputDto[]>>
{
  constructor(
    @Inject('IEnrollmentRepository')
    private readonly enrollmentRepository: IEnrollmentRepositoryPort,
  ) {}

  async handle(query: GetEnrollmentsByUserQuery): Promise<Result<EnrollmentOutputDto[]>> {
    const enrollments = await this.enrollmentRepository.findByStudent(
      EntityId.fromString(query.userId),
    );
    return success(enrollments.map(toEnrollmentOutput));
  }
}

export class GetEnrollmentsByCourseQuery
  extends ResultQuery<EnrollmentOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix = CachePrefixes.GetEnrollmentsByCourse;

  @IsNotEmpty({ message: 'Course ID is required.' })
  readonly courseId: string;

  constructor(courseId: string) {
    super();
    this.courseId = courseId;
  }
}

@Injectable()
export class GetEnrollmentsByCourseHandler
  implements RequestHandler<GetEnrollmentsByCourseQuery, Result<EnrollmentOutputDto[]>>
{
  constructor(
    @Inject('IEnrollmentRepository')
    private readonly enrollmentRepository: IEnrollmentRepositoryPort,
  ) {}

  async handle(query: GetEnrollmentsByCourseQuery): Promise<Result<EnrollmentOutputDto[]>> {
    const enrollments = await this.enrollmentRepository.findByCourse(
      EntityId.fromString(query.courseId),
    );
    return success(enrollments.map(toEnrollmentOutput));
  }
}
