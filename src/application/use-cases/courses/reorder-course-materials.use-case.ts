import { Inject, Injectable } from '@nestjs/common';
import { ArrayNotEmpty, IsArray, IsNotEmpty, IsString } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { CourseOutputDto, toCourseOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { ICourseRepositoryPort } from '../../ports';
import { COURSE_QUERY_PREFIXES } from './course-cache';

@InvalidatesCache(COURSE_QUERY_PREFIXES, 'Material order changed')
export class ReorderCourseMaterialsCommand extends ResultCommand<CourseOutputDto> {
  @IsNotEmpty({ message: 'Course ID is required.' })
  readonly courseId: string;

  @IsArray()
  @ArrayNotEmpty({ message: 'Material IDs are required.' })
  @IsString({ each: true })
  readonly materialIds: string[];

  constructor(courseId: string, materialIds: string[]) {
    super();
    this.courseId = courseId;
    this.materialIds = materialIds;
  }
}

/**
 * Assigns order 1..n to the course materials following the given ID sequence.
 */
@Injectable()
export class ReorderCourseMaterialsHandler
  implements RequestHandler<ReorderCourseMaterialsCommand, Result<CourseOutputDto>>
{
  constructor(
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
  ) {}

  handle(command: ReorderCourseMaterialsCommand): Promise<Result<CourseOutputDto>> {
    return fromDomain(async () => {
      const course = await this.courseRepository.findById(EntityId.fromString(command.courseId));
      if (!course) {
        return notFound(`Course with ID ${command.courseId} not found`);
      }

      course.reorderMaterials(command.materialIds);
      await this.courseRepository.save(course);

      return success(toCourseOutput(course));
    });
  }
}
