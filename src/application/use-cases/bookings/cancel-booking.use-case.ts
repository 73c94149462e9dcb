import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty, MaxLength } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { RefundPolicy } from '@domain/services';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { BookingCancellationOutputDto, toBookingOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import {
  IAvailabilitySlotRepositoryPort,
  IBookingRepositoryPort,
  IPaymentRepositoryPort,
} from '../../ports';
import { NotificationWriter } from '../../services';
import { BOOKING_QUERY_PREFIXES, SLOT_AVAILABILITY_PREFIXES } from './booking-cache';

@InvalidatesCache(BOOKING_QUERY_PREFIXES, 'Booking cancelled')
@InvalidatesCache(SLOT_AVAILABILITY_PREFIXES, 'Slot seat released')
@InvalidatesCache(
  [CachePrefixes.GetPayments, CachePrefixes.GetPaymentsByUser, CachePrefixes.GetNotificationsByUser],
  'Refund and cancellation notification',
)
export class CancelBookingCommand extends ResultCommand<BookingCancellationOutputDto> {
  @IsNotEmpty({ message: 'Booking ID is required.' })
  readonly bookingId: string;

  @IsNotEmpty({ message: 'Cancellation reason is required.' })
  @MaxLength(500, { message: 'Cancellation reason must not exceed 500 characters.' })
  readonly reason: string;

  constructor(bookingId: string, reason: string) {
    super();
    this.bookingId = bookingId;
    this.reason = reason;
  }
}

/**
 * Cancels an active booking, frees its seat and refunds a succeeded payment
 * according to the refund policy.
 */
@Injectable()
export class CancelBookingHandler
  implements RequestHandler<CancelBookingCommand, Result<BookingCancellationOutputDto>>
{
  private readonly logger = new Logger(CancelBookingHandler.name);
  private readonly refundPolicy = new RefundPolicy();

  constructor(
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
    @Inject('IAvailabilitySlotRepository')
    private readonly slotRepository: IAvailabilitySlotRepositoryPort,
    @Inject('IPaymentRepository')
    private readonly paymentRepository: IPaymentRepositoryPort,
    private readonly notifications: NotificationWriter,
  ) {}

  handle(command: CancelBookingCommand): Promise<Result<BookingCancellationOutputDto>> {
    return fromDomain(async () => {
      const booking = await this.bookingRepository.findById(EntityId.fromString(command.bookingId));
      if (!booking) {
        return notFound(`Booking with ID ${command.bookingId} not found`);
      }

      booking.cancel(command.reason);

      const slot = await this.slotRepository.findById(booking.availabilitySlotId);
      if (!slot) {
        return notFound(`Availability slot with ID ${booking.availabilitySlotId.toString()} not found`);
      }
      slot.removeParticipant();

      const refund = this.refundPolicy.calculateRefund(booking, slot.startTime);
      const payment = await this.paymentRepository.findByBooking(booking.id);
      if (payment && payment.status.isSucceeded() && refund.isPositive()) {
        payment.refund(refund, `Booking cancelled: ${command.reason}`);
        await this.paymentRepository.save(payment);
        this.logger.log(`Refunded ${refund.format()} for booking ${command.bookingId}`);
      }

      await this.slotRepository.save(slot);
      await this.bookingRepository.save(booking);
      await this.notifications.notify({
        userId: booking.studentId,
        type: 'booking_cancellation',
        title: 'Booking cancelled',
        message: refund.isPositive()
          ? `Your booking was cancelled. ${refund.format()} will be refunded.`
          : 'Your booking was cancelled.',
        relatedEntityType: 'Booking',
        relatedEntityId: booking.id.toString(),
      });

      return success({ booking: toBookingOutput(booking), refundAmount: refund.amount });
    });
  }
}
