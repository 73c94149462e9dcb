import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { AvailabilitySlot } from '@domain/entities';
import { EntityId, Money } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, failure, fromDomain, notFound, success } from '../../common/result';
import { AvailabilitySlotOutputDto, toAvailabilitySlotOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IAvailabilitySlotRepositoryPort, ICourseRepositoryPort } from '../../ports';
import { SLOT_QUERY_PREFIXES } from './slot-cache';

export interface CreateAvailabilitySlotInput {
  instructorId: string;
  courseId: string;
  startTime: string;
  endTime: string;
  price: number;
  currency?: string;
  maxParticipants?: number;
  notes?: string | null;
  recurringPattern?: string | null;
}

@InvalidatesCache(SLOT_QUERY_PREFIXES, 'New slot offered')
export class CreateAvailabilitySlotCommand extends ResultCommand<AvailabilitySlotOutputDto> {
  @IsNotEmpty({ message: 'Instructor ID is required.' })
  readonly instructorId!: string;

  @IsNotEmpty({ message: 'Course ID is required.' })
  readonly courseId!: string;

  @IsISO8601({}, { message: 'Start time must be a valid date.' })
  readonly startTime!: string;

  @IsISO8601({}, { message: 'End time must be a valid date.' })
  readonly endTime!: string;

  @IsNumber({}, { message: 'Price must be greater than or equal to 0.' })
  @Min(0, { message: 'Price must be greater than or equal to 0.' })
  readonly price!: number;

  @IsOptional()
  @Length(3, 3, { message: 'Currency must be a 3-character code (e.g., USD, EUR).' })
  readonly currency?: string;

  @IsOptional()
  @IsInt({ message: 'Maximum participants must be between 1 and 100.' })
  @Min(1, { message: 'Maximum participants must be between 1 and 100.' })
  @Max(100, { message: 'Maximum participants must be between 1 and 100.' })
  readonly maxParticipants?: number;

  @IsOptional()
  @MaxLength(1000, { message: 'Notes must not exceed 1000 characters.' })
  readonly notes?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  readonly recurringPattern?: string | null;

  constructor(input: CreateAvailabilitySlotInput) {
    super();
    Object.assign(this, input);
  }
}

/**
 * Offers a future time slot on one of the instructor's own courses. Slots of
 * one instructor may not overlap.
 */
@Injectable()
export class CreateAvailabilitySlotHandler
  implements RequestHandler<CreateAvailabilitySlotCommand, Result<AvailabilitySlotOutputDto>>
{
  private readonly logger = new Logger(CreateAvailabilitySlotHandler.name);

  constructor(
    @Inject('IAvailabilitySlotRepository')
    private readonly slotRepository: IAvailabilitySlotRepositoryPort,
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
  ) {}

  handle(command: CreateAvailabilitySlotCommand): Promise<Result<AvailabilitySlotOutputDto>> {
    return fromDomain(async () => {
      const course = await this.courseRepository.findById(EntityId.fromString(command.courseId));
      if (!course) {
        return notFound(`Course with ID ${command.courseId} not found`);
      }
      if (!course.isOwnedBy(command.instructorId)) {
        return failure('Instructor can only create slots for their own courses.');
      }

      const startTime = new Date(command.startTime);
      const endTime = new Date(command.endTime);
      if (startTime.getTime() <= Date.now()) {
        return failure('Start time must be in the future.');
      }

      const instructorId = EntityId.fromString(command.instructorId);
      const overlapping = await this.slotRepository.findOverlapping(instructorId, startTime, endTime);
      if (overlapping.length > 0) {
        return failure('Slot overlaps an existing slot of the instructor.');
      }

      const slot = AvailabilitySlot.create({
        courseId: course.id,
        instructorId,
        startTime,
        endTime,
        price: Money.of(command.price, command.currency?.toUpperCase() ?? course.price.currency),
        maxParticipants: command.maxParticipants,
        notes: command.notes ?? null,
      });
      if (command.recurringPattern) {
        slot.setRecurring(command.recurringPattern);
      }

      await this.slotRepository.save(slot);
      this.logger.log(`Slot ${slot.id.toString()} created for course ${command.courseId}`);

      return success(toAvailabilitySlotOutput(slot));
    });
  }
}
