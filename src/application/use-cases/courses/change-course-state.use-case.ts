import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { Course } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { CourseOutputDto, toCourseOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { ICourseRepositoryPort } from '../../ports';
import { COURSE_QUERY_PREFIXES } from './course-cache';

/**
 * A change of course visibility. Subclasses name the transition so each one
 * is logged and measured separately.
 */
export abstract class CourseStateCommand extends ResultCommand<CourseOutputDto> {
  @IsNotEmpty({ message: 'Course ID is required.' })
  readonly courseId: string;

  constructor(courseId: string) {
    super();
    this.courseId = courseId;
  }

  abstract apply(course: Course): void;
}

@InvalidatesCache(COURSE_QUERY_PREFIXES, 'Course published')
export class PublishCourseCommand extends CourseStateCommand {
  apply(course: Course): void {
    course.publish();
  }
}

@InvalidatesCache(COURSE_QUERY_PREFIXES, 'Course unpublished')
export class UnpublishCourseCommand extends CourseStateCommand {
  apply(course: Course): void {
    course.unpublish();
  }
}

@InvalidatesCache(COURSE_QUERY_PREFIXES, 'Course restored')
export class ActivateCourseCommand extends CourseStateCommand {
  apply(course: Course): void {
    course.activate();
  }
}

// Soft delete
@InvalidatesCache(COURSE_QUERY_PREFIXES, 'Course removed')
export class DeactivateCourseCommand extends CourseStateCommand {
  apply(course: Course): void {
    course.deactivate();
  }
}

@Injectable()
export class ChangeCourseStateHandler
  implements RequestHandler<CourseStateCommand, Result<CourseOutputDto>>
{
  private readonly logger = new Logger(ChangeCourseStateHandler.name);

  constructor(
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
  ) {}

  handle(command: CourseStateCommand): Promise<Result<CourseOutputDto>> {
    return fromDomain(async () => {
      const course = await this.courseRepository.findById(EntityId.fromString(command.courseId));
      if (!course) {
        return notFound(`Course with ID ${command.courseId} not found`);
      }

      command.apply(course);
      await this.courseRepository.save(course);
      this.logger.log(`${command.constructor.name} applied to course ${command.courseId}`);

      return success(toCourseOutput(course));
    });
  }
}
