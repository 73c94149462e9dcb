import { Inject, Injectable } from '@nestjs/common';
import { IsISO8601, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { Result, failure, notFound, success } from '../../common/result';
import { AvailabilitySlotOutputDto, toAvailabilitySlotOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { IAvailabilitySlotRepositoryPort } from '../../ports';

export class GetAvailabilitySlotByIdQuery
  extends ResultQuery<AvailabilitySlotOutputDto>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix = CachePrefixes.GetAvailabilitySlots;

  @IsNotEmpty({ message: 'Slot ID is required.' })
  readonly slotId: string;

  constructor(slotId: string) {
    super();
    this.slotId = slotId;
  }
}

@Injectable()
export class GetAvailabilitySlotByIdHandler
  implements RequestHandler<GetAvailabilitySlotByIdQuery, Result<AvailabilitySlotOutputDto>>
{
  constructor(
    @Inject('IAvailabilitySlotRepository')
    private readonly slotRepository: IAvailabilitySlotRepositoryPort,
  ) {}

  async handle(query: GetAvailabilitySlotByIdQuery): Promise<Result<AvailabilitySlotOutputDto>> {
    const slot = await this.slotRepository.findById(EntityId.fromString(query.slotId));
    if (!slot) {
      return notFound(`Availability slot with ID ${query.slotId} not found`);
    }
    return success(toAvailabilitySlotOutput(slot));
  }
}

export class GetAvailabilitySlotsByInstructorQuery
  extends ResultQuery<AvailabilitySlotOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix = CachePrefixes.GetAvailabilitySlotsByInstructor;

  @IsNotEmpty({ message: 'Instructor ID is required.' })
  readonly instructorId: string;

  constructor(instructorId: string) {
    super();
    this.instructorId = instructorId;
  }
}

@Injectable()
export class GetAvailabilitySlotsByInstructorHandler
  implements
    RequestHandler<GetAvailabilitySlotsByInstructorQuery, Result<AvailabilitySlotOutputDto[]>>
{
  constructor(
    @Inject('IAvailabilitySlotRepository')
    private readonly slotRepository: IAvailabilitySlotRepositoryPort,
  ) {}

  async handle(
    query: GetAvailabilitySlotsByInstructorQuery,
  ): Promise<Result<AvailabilitySlotOutputDto[]>> {
    const slots = await this.slotRepository.findByInstructor(
      EntityId.fromString(query.instructorId),
    );
    return success(slots.map(toAvailabilitySlotOutput));
  }
}

/**
 * Bookable slots starting inside [startDate, endDate), optionally for one instructor.
 */
export class GetAvailableSlotsQuery
  extends ResultQuery<AvailabilitySlotOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 2 * 60;
  readonly cachePrefix = CachePrefixes.GetAvailabilitySlots;

  @IsISO8601({}, { message: 'Start date must be a valid date.' })
  readonly startDate: string;

  @IsISO8601({}, { message: 'End date must be a valid date.' })
  readonly endDate: string;

  @IsOptional()
  @IsString()
  readonly instructorId?: string;

  constructor(startDate: string, endDate: string, instructorId?: string) {
    super();
    this.startDate = startDate;
    this.endDate = endDate;
    this.instructorId = instructorId;
  }
}

@Injectable()
export class GetAvailableSlotsHandler
  implements RequestHandler<GetAvailableSlotsQuery, Result<AvailabilitySlotOutputDto[]>>
{
  constructor(
    @Inject('IAvailabilitySlotRepository')
    private readonly slotRepository: IAvailabilitySlotRepositoryPort,
  ) {}

  async handle(query: GetAvailableSlotsQuery): Promise<Result<AvailabilitySlotOutputDto[]>> {
    const start = new Date(query.startDate);
    const end = new Date(query.endDate);
    if (end.getTime() <= start.getTime()) {
      return failure('End date must be after start date.');
    }

    const slots = await this.slotRepository.findAvailable(
      start,
      end,
      query.instructorId ? EntityId.fromString(query.instructorId) : undefined,
    );
    return success(slots.map(toAvailabilitySlotOutput));
  }
}
