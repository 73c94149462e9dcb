import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { AvailabilitySlot } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { AvailabilitySlotOutputDto, toAvailabilitySlotOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IAvailabilitySlotRepositoryPort } from '../../ports';
import { SLOT_QUERY_PREFIXES } from './slot-cache';

/**
 * Single-step slot transitions: visibility and raw seat bookkeeping.
 */
export abstract class AvailabilitySlotChangeCommand extends ResultCommand<AvailabilitySlotOutputDto> {
  @IsNotEmpty({ message: 'Slot ID is required.' })
  readonly slotId: string;

  constructor(slotId: string) {
    super();
    this.slotId = slotId;
  }

  abstract apply(slot: AvailabilitySlot): void;
}

@InvalidatesCache(SLOT_QUERY_PREFIXES, 'Slot reopened')
export class ActivateAvailabilitySlotCommand extends AvailabilitySlotChangeCommand {
  apply(slot: AvailabilitySlot): void {
    slot.activate();
  }
}

@InvalidatesCache(SLOT_QUERY_PREFIXES, 'Slot withdrawn')
export class DeactivateAvailabilitySlotCommand extends AvailabilitySlotChangeCommand {
  apply(slot: AvailabilitySlot): void {
    slot.deactivate();
  }
}

// Takes one seat
@InvalidatesCache(SLOT_QUERY_PREFIXES, 'Slot capacity changed')
export class BookAvailabilitySlotCommand extends AvailabilitySlotChangeCommand {
  apply(slot: AvailabilitySlot): void {
    slot.addParticipant();
  }
}

// Frees one seat
@InvalidatesCache(SLOT_QUERY_PREFIXES, 'Slot capacity changed')
export class CancelAvailabilitySlotBookingCommand extends AvailabilitySlotChangeCommand {
  apply(slot: AvailabilitySlot): void {
    slot.removeParticipant();
  }
}

@Injectable()
export class ChangeAvailabilitySlotHandler
  implements RequestHandler<AvailabilitySlotChangeCommand, Result<AvailabilitySlotOutputDto>>
{
  private readonly logger = new Logger(ChangeAvailabilitySlotHandler.name);

  constructor(
    @Inject('IAvailabilitySlotRepository')
    private readonly slotRepository: IAvailabilitySlotRepositoryPort,
  ) {}

  handle(command: AvailabilitySlotChangeCommand): Promise<Result<AvailabilitySlotOutputDto>> {
    return fromDomain(async () => {
      const slot = await this.slotRepository.findById(EntityId.fromString(command.slotId));
      if (!slot) {
        return notFound(`Availability slot with ID ${command.slotId} not found`);
      }

      command.apply(slot);
      await this.slotRepository.save(slot);
      this.logger.log(`${command.constructor.name} applied to slot ${command.slotId}`);

      return success(toAvailabilitySlotOutput(slot));
    });
  }
}
