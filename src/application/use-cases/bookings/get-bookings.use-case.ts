import { Inject, Injectable } from '@nestjs/common';
import { IsIn, IsNotEmpty } from 'class-validator';
import { BookingStatus, BookingStatusValue, EntityId } from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { Result, notFound, success } from '../../common/result';
import { BookingOutputDto, toBookingOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { IBookingRepositoryPort } from '../../ports';

export class GetBookingByIdQuery extends ResultQuery<BookingOutputDto> implements CacheableRequest {
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix = CachePrefixes.GetBookings;

  @IsNotEmpty({ message: 'Booking ID is required.' })
  readonly bookingId: string;

  constructor(bookingId: string) {
    super();
    this.bookingId = bookingId;
  }
}

@Injectable()
export class GetBookingByIdHandler
  implements RequestHandler<GetBookingByIdQuery, Result<BookingOutputDto>>
{
  constructor(
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
  ) {}

  async handle(query: GetBookingByIdQuery): Promise<Result<BookingOutputDto>> {
    const booking = await this.bookingRepository.findById(EntityId.fromString(query.bookingId));
    if (!booking) {
      return notFound(`Booking with ID ${query.bookingId} not found`);
    }
    return success(toBookingOutput(booking));
  }
}

export class GetBookingsByStatusQuery
  extends ResultQuery<BookingOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix = CachePrefixes.GetBookings;

  @IsIn(BookingStatus.VALID_STATUSES, {
    message: `Status must be one of: ${BookingStatus.VALID_STATUSES.join(', ')}.`,
  })
  readonly status: BookingStatusValue;

  constructor(status: BookingStatusValue) {
    super();
    this.status = status;
  }
}

@Injectable()
export class GetBookingsByStatusHandler
  implements RequestHandler<GetBookingsByStatusQuery, Result<BookingOutputDto[]>>
{
  constructor(
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
  ) {}

  async handle(query: GetBookingsByStatusQuery): Promise<Result<BookingOutputDto[]>> {
    const bookings = await this.bookingRepository.findByStatus(query.status);
    return success(bookings.map(toBookingOutput));
  }
}

export class GetBookingsByUserQuery
  extends ResultQuery<BookingOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix = CachePrefixes.GetBookingsByUser;

  @IsNotEmpty({ message: 'User ID is required.' })
  readonly userId: string;

  constructor(userId: string) {
    super();
    this.userId = userId;
  }
}

@Injectable()
export class GetBookingsByUserHandler
  implements RequestHandler<GetBookingsByUserQuery, Result<BookingOutputDto[]>>
{
  constructor(
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
  ) {}

  async handle(query: GetBookingsByUserQuery): Promise<Result<BookingOutputDto[]>> {
    const bookings = await this.bookingRepository.findByStudent(EntityId.fromString(query.userId));
    return success(bookings.map(toBookingOutput));
  }
}

export class GetBookingsByInstructorQuery
  extends ResultQuery<BookingOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix = CachePrefixes.GetBookingsByInstructor;

  @IsNotEmpty({ message: 'Instructor ID is required.' })
  readonly instructorId: string;

  constructor(instructorId: string) {
    super();
    this.instructorId = instructorId;
  }
}

@Injectable()
export class GetBookingsByInstructorHandler
  implements RequestHandler<GetBookingsByInstructorQuery, Result<BookingOutputDto[]>>
{
  constructor(
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
  ) {}

  async handle(query: GetBookingsByInstructorQuery): Promise<Result<BookingOutputDto[]>> {
    const bookings = await this.bookingRepository.findByInstructor(
      EntityId.fromString(query.instructorId),
    );
    return success(bookings.map(toBookingOutput));
  }
}
