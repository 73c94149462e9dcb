import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, failure, fromDomain, notFound, success } from '../../common/result';
import { BookingOutputDto, toBookingOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IAvailabilitySlotRepositoryPort, IBookingRepositoryPort } from '../../ports';
import { NotificationWriter } from '../../services';
import { BOOKING_QUERY_PREFIXES, SLOT_AVAILABILITY_PREFIXES } from './booking-cache';

@InvalidatesCache(BOOKING_QUERY_PREFIXES, 'Booking moved')
@InvalidatesCache(SLOT_AVAILABILITY_PREFIXES, 'Seats moved between slots')
@InvalidatesCache(CachePrefixes.GetNotificationsByUser, 'Reschedule notification')
export class RescheduleBookingCommand extends ResultCommand<BookingOutputDto> {
  @IsNotEmpty({ message: 'Booking ID is required.' })
  readonly bookingId: string;

  @IsNotEmpty({ message: 'New availability slot ID is required.' })
  readonly newSlotId: string;

  constructor(bookingId: string, newSlotId: string) {
    super();
    this.bookingId = bookingId;
    this.newSlotId = newSlotId;
  }
}

/**
 * Moves a scheduled booking to another open slot of the same course.
 */
@Injectable()
export class RescheduleBookingHandler
  implements RequestHandler<RescheduleBookingCommand, Result<BookingOutputDto>>
{
  private readonly logger = new Logger(RescheduleBookingHandler.name);

  constructor(
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
    @Inject('IAvailabilitySlotRepository')
    private readonly slotRepository: IAvailabilitySlotRepositoryPort,
    private readonly notifications: NotificationWriter,
  ) {}

  handle(command: RescheduleBookingCommand): Promise<Result<BookingOutputDto>> {
    return fromDomain(async () => {
      const booking = await this.bookingRepository.findById(EntityId.fromString(command.bookingId));
      if (!booking) {
        return notFound(`Booking with ID ${command.bookingId} not found`);
      }

      const newSlot = await this.slotRepository.findById(EntityId.fromString(command.newSlotId));
      if (!newSlot) {
        return notFound(`Availability slot with ID ${command.newSlotId} not found`);
      }
      if (!newSlot.courseId.equals(booking.courseId)) {
        return failure('New slot must belong to the same course.');
      }
      if (!newSlot.isBookable()) {
        return failure('Availability slot is not open for booking.');
      }

      const oldSlot = await this.slotRepository.findById(booking.availabilitySlotId);
      booking.reschedule(newSlot.id);
      newSlot.addParticipant();
      if (oldSlot) {
        oldSlot.removeParticipant();
        await this.slotRepository.save(oldSlot);
      }

      await this.slotRepository.save(newSlot);
      await this.bookingRepository.save(booking);
      await this.notifications.notify({
        userId: booking.studentId,
        type: 'booking_rescheduled',
        title: 'Booking rescheduled',
        message: `Your session now starts at ${newSlot.startTime.toISOString()}.`,
        relatedEntityType: 'Booking',
        relatedEntityId: booking.id.toString(),
      });

      this.logger.log(`Booking ${command.bookingId} moved to slot ${command.newSlotId}`);
      return success(toBookingOutput(booking));
    });
  }
}
