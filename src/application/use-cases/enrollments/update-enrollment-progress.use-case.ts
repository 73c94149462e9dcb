import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty, IsNumber, Max, Min } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { EnrollmentOutputDto, toEnrollmentOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IEnrollmentRepositoryPort } from '../../ports';
import { ENROLLMENT_QUERY_PREFIXES } from './enrollment-cache';

@InvalidatesCache(ENROLLMENT_QUERY_PREFIXES, 'Progress changed')
export class UpdateEnrollmentProgressCommand extends ResultCommand<EnrollmentOutputDto> {
  @IsNotEmpty({ message: 'Enrollment ID is required.' })
  readonly enrollmentId: string;

  @IsNumber({}, { message: 'Progress percentage must be between 0 and 100.' })
  @Min(0, { message: 'Progress percentage must be between 0 and 100.' })
  @Max(100, { message: 'Progress percentage must be between 0 and 100.' })
  readonly progressPercentage: number;

  constructor(enrollmentId: string, progressPercentage: number) {
    super();
    this.enrollmentId = enrollmentId;
    this.progressPercentage = progressPercentage;
  }
}

@Injectable()
export class UpdateEnrollmentProgressHandler
  implements RequestHandler<UpdateEnrollmentProgressCommand, Result<EnrollmentOutputDto>>
{
  constructor(
    @Inject('IEnrollmentRepository')
    private readonly enrollmentRepository: IEnrollmentRepositoryPort,
  ) {}

  handle(command: UpdateEnrollmentProgressCommand): Promise<Result<EnrollmentOutputDto>> {
    return fromDomain(async () => {
      const enrollment = await this.enrollmentRepository.findById(
        EntityId.fromString(command.enrollmentId),
      );
      if (!enrollment) {
        return notFound(`Enrollment with ID ${command.enrollmentId} not found`);
      }

      enrollment.updateProgress(command.progressPercentage);
      await this.enrollmentRepository.save(enrollment);

      return success(toEnrollmentOutput(enrollment));
    });
  }
}
