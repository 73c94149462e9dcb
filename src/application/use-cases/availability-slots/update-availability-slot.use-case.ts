import { Inject, Injectable } from '@nestjs/common';
import {
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { EntityId, Money } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, failure, fromDomain, notFound, success } from '../../common/result';
import { AvailabilitySlotOutputDto, toAvailabilitySlotOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IAvailabilitySlotRepositoryPort } from '../../ports';
import { SLOT_QUERY_PREFIXES } from './slot-cache';

export interface UpdateAvailabilitySlotInput {
  slotId: string;
  startTime?: string;
  endTime?: string;
  price?: number;
  maxParticipants?: number;
  notes?: string | null;
  /** Empty string or null stops the recurrence */
  recurringPattern?: string | null;
}

@InvalidatesCache(SLOT_QUERY_PREFIXES, 'Slot changed')
export class UpdateAvailabilitySlotCommand extends ResultCommand<AvailabilitySlotOutputDto> {
  @IsNotEmpty({ message: 'Slot ID is required.' })
  readonly slotId!: string;

  @IsOptional()
  @IsISO8601({}, { message: 'Start time must be a valid date.' })
  readonly startTime?: string;

  @IsOptional()
  @IsISO8601({}, { message: 'End time must be a valid date.' })
  readonly endTime?: string;

  @IsOptional()
  @IsNumber({}, { message: 'Price must be greater than or equal to 0.' })
  @Min(0, { message: 'Price must be greater than or equal to 0.' })
  readonly price?: number;

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

  constructor(input: UpdateAvailabilitySlotInput) {
    super();
    Object.assign(this, input);
  }
}

@Injectable()
export class UpdateAvailabilitySlotHandler
  implements RequestHandler<UpdateAvailabilitySlotCommand, Result<AvailabilitySlotOutputDto>>
{
  constructor(
    @Inject('IAvailabilitySlotRepository')
    private readonly slotRepository: IAvailabilitySlotRepositoryPort,
  ) {}

  handle(command: UpdateAvailabilitySlotCommand): Promise<Result<AvailabilitySlotOutputDto>> {
    return fromDomain(async () => {
      const slot = await this.slotRepository.findById(EntityId.fromString(command.slotId));
      if (!slot) {
        return notFound(`Availability slot with ID ${command.slotId} not found`);
      }

      if (command.startTime !== undefined || command.endTime !== undefined) {
        const startTime = command.startTime ? new Date(command.startTime) : slot.startTime;
        const endTime = command.endTime ? new Date(command.endTime) : slot.endTime;
        const overlapping = await this.slotRepository.findOverlapping(
          slot.instructorId,
          startTime,
          endTime,
          slot.id,
        );
        if (overlapping.length > 0) {
          return failure('Slot overlaps an existing slot of the instructor.');
        }
        slot.updateTime(startTime, endTime);
      }
      if (command.price !== undefined) {
        slot.updatePrice(Money.of(command.price, slot.price.currency));
      }
      if (command.maxParticipants !== undefined) {
        slot.updateMaxParticipants(command.maxParticipants);
      }
      if (command.notes !== undefined) {
        slot.updateNotes(command.notes);
      }
      if (command.recurringPattern !== undefined) {
        if (command.recurringPattern) {
          slot.setRecurring(command.recurringPattern);
        } else {
          slot.cancelRecurring();
        }
      }

      await this.slotRepository.save(slot);
      return success(toAvailabilitySlotOutput(slot));
    });
  }
}
