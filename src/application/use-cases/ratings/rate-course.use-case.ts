import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, Max, MaxLength, Min } from 'class-validator';
import { CourseRating } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, conflict, failure, fromDomain, success } from '../../common/result';
import { RatingOutputDto, toCourseRatingOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IEnrollmentRepositoryPort, IRatingRepositoryPort } from '../../ports';

export interface RateCourseInput {
  studentId: string;
  courseId: string;
  rating: number;
  review?: string | null;
  isPublic?: boolean;
}

@InvalidatesCache(CachePrefixes.GetCourseRatings, 'Course rated')
export class RateCourseCommand extends ResultCommand<RatingOutputDto> {
  @IsNotEmpty({ message: 'Student ID is required.' })
  readonly studentId!: string;

  @IsNotEmpty({ message: 'Course ID is required.' })
  readonly courseId!: string;

  @IsInt({ message: 'Rating must be between 1 and 5.' })
  @Min(1, { message: 'Rating must be between 1 and 5.' })
  @Max(5, { message: 'Rating must be between 1 and 5.' })
  readonly rating!: number;

  @IsOptional()
  @MaxLength(2000, { message: 'Review cannot exceed 2000 characters.' })
  readonly review?: string | null;

  @IsOptional()
  @IsBoolean()
  readonly isPublic?: boolean;

  constructor(input: RateCourseInput) {
    super();
    Object.assign(this, input);
  }
}

/**
 * Only actively enrolled students rate a course, once each.
 */
@Injectable()
export class RateCourseHandler implements RequestHandler<RateCourseCommand, Result<RatingOutputDto>> {
  private readonly logger = new Logger(RateCourseHandler.name);

  constructor(
    @Inject('IRatingRepository')
    private readonly ratingRepository: IRatingRepositoryPort,
    @Inject('IEnrollmentRepository')
    private readonly enrollmentRepository: IEnrollmentRepositoryPort,
  ) {}

  handle(command: RateCourseCommand): Promise<Result<RatingOutputDto>> {
    return fromDomain(async () => {
      const studentId = EntityId.fromString(command.studentId);
      const courseId = EntityId.fromString(command.courseId);

      const enrollment = await this.enrollmentRepository.findByStudentAndCourse(studentId, courseId);
      if (!enrollment || !enrollment.isActive) {
        return failure('Only enrolled students can rate a course.');
      }

      const existing = await this.ratingRepository.findCourseRating(studentId, courseId);
      if (existing) {
        return conflict('Student has already rated this course.');
      }

      const rating = CourseRating.create({
        courseId,
        studentId,
        rating: command.rating,
        review: command.review ?? null,
        isPublic: command.isPublic,
      });
      await this.ratingRepository.saveCourseRating(rating);
      this.logger.log(`Course ${command.courseId} rated ${command.rating}`);

      return success(toCourseRatingOutput(rating));
    });
  }
}
