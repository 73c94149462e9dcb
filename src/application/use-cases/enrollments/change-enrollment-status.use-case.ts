import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { Enrollment } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { EnrollmentOutputDto, toEnrollmentOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IEnrollmentRepositoryPort } from '../../ports';
import { ENROLLMENT_QUERY_PREFIXES } from './enrollment-cache';

export abstract class EnrollmentStatusCommand extends ResultCommand<EnrollmentOutputDto> {
  @IsNotEmpty({ message: 'Enrollment ID is required.' })
  readonly enrollmentId: string;

  constructor(enrollmentId: string) {
    super();
    this.enrollmentId = enrollmentId;
  }

  abstract apply(enrollment: Enrollment): void;
}

@InvalidatesCache(ENROLLMENT_QUERY_PREFIXES, 'Enrollment completed')
export class CompleteEnrollmentCommand extends EnrollmentStatusCommand {
  apply(enrollment: Enrollment): void {
    enrollment.complete();
  }
}

@InvalidatesCache(ENROLLMENT_QUERY_PREFIXES, 'Enrollment deactivated')
export class DeactivateEnrollmentCommand extends EnrollmentStatusCommand {
  apply(enrollment: Enrollment): void {
    enrollment.deactivate();
  }
}

@InvalidatesCache(ENROLLMENT_QUERY_PREFIXES, 'Enrollment reactivated')
export class ReactivateEnrollmentCommand extends EnrollmentStatusCommand {
  apply(enrollment: Enrollment): void {
    enrollment.reactivate();
  }
}

@Injectable()
export class ChangeEnrollmentStatusHandler
  implements RequestHandler<EnrollmentStatusCommand, Result<EnrollmentOutputDto>>
{
  private readonly logger = new Logger(ChangeEnrollmentStatusHandler.name);

  constructor(
    @Inject('IEnrollmentRepository')
    private readonly enrollmentRepository: IEnrollmentRepositoryPort,
  ) {}

  handle(command: EnrollmentStatusCommand): Promise<Result<EnrollmentOutputDto>> {
    return fromDomain(async () => {
      const enrollment = await this.enrollmentRepository.findById(
        EntityId.fromString(command.enrollmentId),
      );
      if (!enrollment) {
        return notFound(`Enrollment with ID ${command.enrollmentId} not found`);
      }

      command.apply(enrollment);
      await this.enrollmentRepository.save(enrollment);
      this.logger.log(`${command.constructor.name} applied to enrollment ${command.enrollmentId}`);

      return success(toEnrollmentOutput(enrollment));
    });
  }
}
