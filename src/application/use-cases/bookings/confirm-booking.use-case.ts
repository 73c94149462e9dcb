import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { BookingOutputDto, toBookingOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IBookingRepositoryPort } from '../../ports';
import { NotificationWriter } from '../../services';
import { BOOKING_QUERY_PREFIXES } from './booking-cache';

@InvalidatesCache(BOOKING_QUERY_PREFIXES, 'Booking confirmed')
@InvalidatesCache(CachePrefixes.GetNotificationsByUser, 'Confirmation notification')
export class ConfirmBookingCommand extends ResultCommand<BookingOutputDto> {
  @IsNotEmpty({ message: 'Booking ID is required.' })
  readonly bookingId: string;

  constructor(bookingId: string) {
    super();
    this.bookingId = bookingId;
  }
}

@Injectable()
export class ConfirmBookingHandler
  implements RequestHandler<ConfirmBookingCommand, Result<BookingOutputDto>>
{
  constructor(
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
    private readonly notifications: NotificationWriter,
  ) {}

  handle(command: ConfirmBookingCommand): Promise<Result<BookingOutputDto>> {
    return fromDomain(async () => {
      const booking = await this.bookingRepository.findById(EntityId.fromString(command.bookingId));
      if (!booking) {
        return notFound(`Booking with ID ${command.bookingId} not found`);
      }

      booking.confirm();
      await this.bookingRepository.save(booking);
      await this.notifications.notify({
        userId: booking.studentId,
        type: 'booking_confirmation',
        title: 'Booking confirmed',
        message: 'Your instructor confirmed the booking.',
        relatedEntityType: 'Booking',
        relatedEntityId: booking.id.toString(),
      });

      return success(toBookingOutput(booking));
    });
  }
}
