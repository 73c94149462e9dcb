import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { Booking } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { BookingOutputDto, toBookingOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IBookingRepositoryPort } from '../../ports';
import { BOOKING_QUERY_PREFIXES } from './booking-cache';

/**
 * End-of-session outcomes of a scheduled booking.
 */
export abstract class BookingOutcomeCommand extends ResultCommand<BookingOutputDto> {
  @IsNotEmpty({ message: 'Booking ID is required.' })
  readonly bookingId: string;

  constructor(bookingId: string) {
    super();
    this.bookingId = bookingId;
  }

  abstract apply(booking: Booking): void;
}

@InvalidatesCache(BOOKING_QUERY_PREFIXES, 'Booking completed')
export class CompleteBookingCommand extends BookingOutcomeCommand {
  apply(booking: Booking): void {
    booking.complete();
  }
}

@InvalidatesCache(BOOKING_QUERY_PREFIXES, 'Student did not attend')
export class MarkBookingNoShowCommand extends BookingOutcomeCommand {
  apply(booking: Booking): void {
    booking.markNoShow();
  }
}

@Injectable()
export class BookingOutcomeHandler
  implements RequestHandler<BookingOutcomeCommand, Result<BookingOutputDto>>
{
  private readonly logger = new Logger(BookingOutcomeHandler.name);

  constructor(
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
  ) {}

  handle(command: BookingOutcomeCommand): Promise<Result<BookingOutputDto>> {
    return fromDomain(async () => {
      const booking = await this.bookingRepository.findById(EntityId.fromString(command.bookingId));
      if (!booking) {
        return notFound(`Booking with ID ${command.bookingId} not found`);
      }

      command.apply(booking);
      await this.bookingRepository.save(booking);
      this.logger.log(`Booking ${command.bookingId} is now ${booking.status.toString()}`);

      return success(toBookingOutput(booking));
    });
  }
}
