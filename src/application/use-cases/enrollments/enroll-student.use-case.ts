import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { Enrollment } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, conflict, failure, fromDomain, notFound, success } from '../../common/result';
import { EnrollmentOutputDto, toEnrollmentOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { ICourseRepositoryPort, IEnrollmentRepositoryPort, IUserRepositoryPort } from '../../ports';
import { ENROLLMENT_QUERY_PREFIXES } from './enrollment-cache';

@InvalidatesCache(ENROLLMENT_QUERY_PREFIXES, 'Student enrolled')
export class EnrollStudentCommand extends ResultCommand<EnrollmentOutputDto> {
  @IsNotEmpty({ message: 'Student ID is required.' })
  readonly studentId: string;

  @IsNotEmpty({ message: 'Course ID is required.' })
  readonly courseId: string;

  constructor(studentId: string, courseId: string) {
    super();
    this.studentId = studentId;
    this.courseId = courseId;
  }
}

/**
 * Enrolls a student in a published course while seats remain. A student has
 * at most one enrollment per course; an inactive one must be reactivated.
 */
@Injectable()
export class EnrollStudentHandler
  implements RequestHandler<EnrollStudentCommand, Result<EnrollmentOutputDto>>
{
  private readonly logger = new Logger(EnrollStudentHandler.name);

  constructor(
    @Inject('IEnrollmentRepository')
    private readonly enrollmentRepository: IEnrollmentRepositoryPort,
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
  ) {}

  handle(command: EnrollStudentCommand): Promise<Result<EnrollmentOutputDto>> {
    return fromDomain(async () => {
      const studentId = EntityId.fromString(command.studentId);
      const courseId = EntityId.fromString(command.courseId);

      const student = await this.userRepository.findById(studentId);
      if (!student || !student.isActive) {
        return notFound(`Student with ID ${command.studentId} not found`);
      }

      const course = await this.courseRepository.findById(courseId);
      if (!course) {
        return notFound(`Course with ID ${command.courseId} not found`);
      }
      if (!course.isAvailable()) {
        return failure('Course is not open for enrollment.');
      }

      const existing = await this.enrollmentRepository.findByStudentAndCourse(studentId, courseId);
      if (existing) {
        return existing.isActive
          ? conflict('Student is already enrolled in this course.')
          : failure('Enrollment exists but is inactive. Reactivate it instead.');
      }

      if (course.maxStudents !== null) {
        const enrolled = await this.enrollmentRepository.countActiveByCourse(courseId);
        if (enrolled >= course.maxStudents) {
          return failure('Course has reached its maximum number of students.');
        }
      }

      const enrollment = Enrollment.create({ studentId, courseId });
      await this.enrollmentRepository.save(enrollment);
      this.logger.log(`Student ${command.studentId} enrolled in course ${command.courseId}`);

      return success(toEnrollmentOutput(enrollment));
    });
  }
}
