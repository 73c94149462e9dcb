import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty, IsOptional, MaxLength } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { BookingOutputDto, toBookingOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IBookingRepositoryPort } from '../../ports';
import { BOOKING_QUERY_PREFIXES } from './booking-cache';

export interface UpdateBookingNotesInput {
  bookingId: string;
  studentNotes?: string | null;
  instructorNotes?: string | null;
}

@InvalidatesCache(BOOKING_QUERY_PREFIXES, 'Booking notes changed')
export class UpdateBookingNotesCommand extends ResultCommand<BookingOutputDto> {
  @IsNotEmpty({ message: 'Booking ID is required.' })
  readonly bookingId!: string;

  @IsOptional()
  @MaxLength(1000, { message: 'Notes must not exceed 1000 characters.' })
  readonly studentNotes?: string | null;

  @IsOptional()
  @MaxLength(1000, { message: 'Notes must not exceed 1000 characters.' })
  readonly instructorNotes?: string | null;

  constructor(input: UpdateBookingNotesInput) {
    super();
    Object.assign(this, input);
  }
}

@Injectable()
export class UpdateBookingNotesHandler
  implements RequestHandler<UpdateBookingNotesCommand, Result<BookingOutputDto>>
{
  constructor(
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
  ) {}

  handle(command: UpdateBookingNotesCommand): Promise<Result<BookingOutputDto>> {
    return fromDomain(async () => {
      const booking = await this.bookingRepository.findById(EntityId.fromString(command.bookingId));
      if (!booking) {
        return notFound(`Booking with ID ${command.bookingId} not found`);
      }

      if (command.studentNotes !== undefined) {
        booking.updateStudentNotes(command.studentNotes);
      }
      if (command.instructorNotes !== undefined) {
        booking.updateInstructorNotes(command.instructorNotes);
      }

      await this.bookingRepository.save(booking);
      return success(toBookingOutput(booking));
    });
  }
}
