import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, Max, MaxLength, Min } from 'class-validator';
import { InstructorRating } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, conflict, failure, fromDomain, notFound, success } from '../../common/result';
import { RatingOutputDto, toInstructorRatingOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IBookingRepositoryPort, IRatingRepositoryPort } from '../../ports';

export interface RateInstructorInput {
  studentId: string;
  bookingId: string;
  rating: number;
  review?: string | null;
  isPublic?: boolean;
}

@InvalidatesCache(CachePrefixes.GetInstructorRatings, 'Instructor rated')
export class RateInstructorCommand extends ResultCommand<RatingOutputDto> {
  @IsNotEmpty({ message: 'Student ID is required.' })
  readonly studentId!: string;

  @IsNotEmpty({ message: 'Booking ID is required.' })
  readonly bookingId!: string;

  @IsInt({ message: 'Rating must be between 1 and 5.' })
  @Min(1, { message: 'Rating must be between 1 and 5.' })
  @Max(5, { message: 'Rating must be between 1 and 5.' })
  readonly rating!: number;

  @IsOptional()
  @MaxLength(2000, { message: 'Review cannot exceed 2000 characters.' })
  readonly review?: string | null;

  @IsOptional()
  @IsBoolean()
  readonly isPublic?: boolean;

  constructor(input: RateInstructorInput) {
    super();
    Object.assign(this, input);
  }
}

/**
 * A student rates the instructor of a session they completed, once per booking.
 */
@Injectable()
export class RateInstructorHandler
  implements RequestHandler<RateInstructorCommand, Result<RatingOutputDto>>
{
  private readonly logger = new Logger(RateInstructorHandler.name);

  constructor(
    @Inject('IRatingRepository')
    private readonly ratingRepository: IRatingRepositoryPort,
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
  ) {}

  handle(command: RateInstructorCommand): Promise<Result<RatingOutputDto>> {
    return fromDomain(async () => {
      const booking = await this.bookingRepository.findById(EntityId.fromString(command.bookingId));
      if (!booking) {
        return notFound(`Booking with ID ${command.bookingId} not found`);
      }
      if (!booking.belongsTo(command.studentId)) {
        return failure('Students can only rate instructors of their own bookings.');
      }
      if (!booking.status.isCompleted()) {
        return failure('Only completed sessions can be rated.');
      }

      const existing = await this.ratingRepository.findInstructorRatingByBooking(booking.id);
      if (existing) {
        return conflict('This session has already been rated.');
      }

      const rating = InstructorRating.create({
        instructorId: booking.instructorId,
        studentId: booking.studentId,
        bookingId: booking.id,
        rating: command.rating,
        review: command.review ?? null,
        isPublic: command.isPublic,
      });
      await this.ratingRepository.saveInstructorRating(rating);
      this.logger.log(`Instructor ${booking.instructorId.toString()} rated ${command.rating}`);

      return success(toInstructorRatingOutput(rating));
    });
  }
}
