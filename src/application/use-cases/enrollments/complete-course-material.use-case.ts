import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, failure, fromDomain, notFound, success } from '../../common/result';
import { EnrollmentOutputDto, toEnrollmentOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { ICourseRepositoryPort, IEnrollmentRepositoryPort } from '../../ports';
import { ENROLLMENT_QUERY_PREFIXES } from './enrollment-cache';

@InvalidatesCache(ENROLLMENT_QUERY_PREFIXES, 'Material completed')
export class CompleteCourseMaterialCommand extends ResultCommand<EnrollmentOutputDto> {
  @IsNotEmpty({ message: 'Enrollment ID is required.' })
  readonly enrollmentId: string;

  @IsNotEmpty({ message: 'Material ID is required.' })
  readonly materialId: string;

  constructor(enrollmentId: string, materialId: string) {
    super();
    this.enrollmentId = enrollmentId;
    this.materialId = materialId;
  }
}

/**
 * Marks one material of the enrolled course as done. Progress is the share of
 * the course's materials completed; the last one completes the enrollment.
 */
@Injectable()
export class CompleteCourseMaterialHandler
  implements RequestHandler<CompleteCourseMaterialCommand, Result<EnrollmentOutputDto>>
{
  constructor(
    @Inject('IEnrollmentRepository')
    private readonly enrollmentRepository: IEnrollmentRepositoryPort,
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
  ) {}

  handle(command: CompleteCourseMaterialCommand): Promise<Result<EnrollmentOutputDto>> {
    return fromDomain(async () => {
      const enrollment = await this.enrollmentRepository.findById(
        EntityId.fromString(command.enrollmentId),
      );
      if (!enrollment) {
        return notFound(`Enrollment with ID ${command.enrollmentId} not found`);
      }
      if (!enrollment.isActive) {
        return failure('Enrollment is inactive.');
      }

      const course = await this.courseRepository.findById(enrollment.courseId);
      if (!course) {
        return notFound(`Course with ID ${enrollment.courseId.toString()} not found`);
      }
      if (!course.materials.some((material) => material.id.toString() === command.materialId)) {
        return notFound(`Material with ID ${command.materialId} not found in course`);
      }

      enrollment.completeMaterial(command.materialId, course.materials.length);
      await this.enrollmentRepository.save(enrollment);

      return success(toEnrollmentOutput(enrollment));
    });
  }
}
