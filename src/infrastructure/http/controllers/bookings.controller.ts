import { Body, Controller, Get, Param, Patch, Post, Put } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { BookingCancellationOutputDto, BookingOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import {
  BookingOutcomeHandler,
  CancelBookingCommand,
  CancelBookingHandler,
  CompleteBookingCommand,
  ConfirmBookingCommand,
  ConfirmBookingHandler,
  CreateBookingCommand,
  CreateBookingHandler,
  GetBookingByIdHandler,
  GetBookingByIdQuery,
  GetBookingsByInstructorHandler,
  GetBookingsByInstructorQuery,
  GetBookingsByStatusHandler,
  GetBookingsByStatusQuery,
  GetBookingsByUserHandler,
  GetBookingsByUserQuery,
  MarkBookingNoShowCommand,
  RescheduleBookingCommand,
  RescheduleBookingHandler,
  UpdateBookingNotesCommand,
  UpdateBookingNotesHandler,
} from '@application/use-cases';
import { BookingStatus, BookingStatusValue } from '@domain/value-objects';
import {
  CancelBookingRequestDto,
  CreateBookingRequestDto,
  RescheduleBookingRequestDto,
  UpdateBookingNotesRequestDto,
} from '../dtos/request';
import { unwrapResult } from '../result.mapper';

/**
 * Booking lifecycle: pending → confirmed → completed, with cancellation,
 * no-show and rescheduling along the way.
 */
@ApiTags('Bookings')
@Controller('api/v1/bookings')
export class BookingsController {
  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly createBooking: CreateBookingHandler,
    private readonly confirmBooking: ConfirmBookingHandler,
    private readonly cancelBooking: CancelBookingHandler,
    private readonly bookingOutcome: BookingOutcomeHandler,
    private readonly rescheduleBooking: RescheduleBookingHandler,
    private readonly updateNotes: UpdateBookingNotesHandler,
    private readonly getBookingById: GetBookingByIdHandler,
    private readonly getBookingsByStatus: GetBookingsByStatusHandler,
    private readonly getBookingsByUser: GetBookingsByUserHandler,
    private readonly getBookingsByInstructor: GetBookingsByInstructorHandler,
  ) {}

  @Get('status/:status')
  @ApiOperation({ summary: 'List bookings in a status' })
  @ApiParam({ name: 'status', enum: BookingStatus.VALID_STATUSES })
  async byStatus(@Param('status') status: BookingStatusValue): Promise<BookingOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(new GetBookingsByStatusQuery(status), this.getBookingsByStatus),
    );
  }

  @Get('user/:userId')
  @ApiOperation({ summary: 'List bookings of a student' })
  @ApiParam({ name: 'userId', description: 'Student user ID' })
  async byUser(@Param('userId') userId: string): Promise<BookingOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(new GetBookingsByUserQuery(userId), this.getBookingsByUser),
    );
  }

  @Get('instructor/:instructorId')
  @ApiOperation({ summary: 'List bookings of an instructor' })
  @ApiParam({ name: 'instructorId', description: 'Instructor user ID' })
  async byInstructor(@Param('instructorId') instructorId: string): Promise<BookingOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(
        new GetBookingsByInstructorQuery(instructorId),
        this.getBookingsByInstructor,
      ),
    );
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get booking by ID' })
  @ApiParam({ name: 'id', description: 'Booking ID' })
  @ApiNotFoundResponse({ description: 'Booking not found' })
  async getById(@Param('id') id: string): Promise<BookingOutputDto> {
    return unwrapResult(await this.pipeline.send(new GetBookingByIdQuery(id), this.getBookingById));
  }

  @Post()
  @ApiOperation({
    summary: 'Book a slot',
    description: 'Takes a seat in the slot and applies the promo code, if any.',
  })
  @ApiResponse({ status: 201, description: 'Booking created in pending status' })
  @ApiBadRequestResponse({ description: 'Slot full, inactive or promo code not applicable' })
  @ApiConflictResponse({ description: 'Student already holds a booking for the slot' })
  async create(@Body() body: CreateBookingRequestDto): Promise<BookingOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new CreateBookingCommand(body), this.createBooking),
    );
  }

  @Patch(':id/confirm')
  @ApiOperation({ summary: 'Confirm booking' })
  @ApiParam({ name: 'id', description: 'Booking ID' })
  async confirm(@Param('id') id: string): Promise<BookingOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new ConfirmBookingCommand(id), this.confirmBooking),
    );
  }

  @Patch(':id/cancel')
  @ApiOperation({
    summary: 'Cancel booking',
    description: 'Releases the seat and refunds a settled payment by the cancellation policy.',
  })
  @ApiParam({ name: 'id', description: 'Booking ID' })
  async cancel(
    @Param('id') id: string,
    @Body() body: CancelBookingRequestDto,
  ): Promise<BookingCancellationOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new CancelBookingCommand(id, body.reason), this.cancelBooking),
    );
  }

  @Patch(':id/complete')
  @ApiOperation({ summary: 'Mark booking completed' })
  @ApiParam({ name: 'id', description: 'Booking ID' })
  async complete(@Param('id') id: string): Promise<BookingOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new CompleteBookingCommand(id), this.bookingOutcome),
    );
  }

  @Patch(':id/no-show')
  @ApiOperation({ summary: 'Mark booking as no-show' })
  @ApiParam({ name: 'id', description: 'Booking ID' })
  async noShow(@Param('id') id: string): Promise<BookingOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new MarkBookingNoShowCommand(id), this.bookingOutcome),
    );
  }

  @Patch(':id/reschedule')
  @ApiOperation({ summary: 'Move booking to another slot' })
  @ApiParam({ name: 'id', description: 'Booking ID' })
  async reschedule(
    @Param('id') id: string,
    @Body() body: RescheduleBookingRequestDto,
  ): Promise<BookingOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new RescheduleBookingCommand(id, body.newSlotId),
        this.rescheduleBooking,
      ),
    );
  }

  @Put(':id/notes')
  @ApiOperation({ summary: 'Update booking notes' })
  @ApiParam({ name: 'id', description: 'Booking ID' })
  async notes(
    @Param('id') id: string,
    @Body() body: UpdateBookingNotesRequestDto,
  ): Promise<BookingOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new UpdateBookingNotesCommand({ ...body, bookingId: id }),
        this.updateNotes,
      ),
    );
  }
}
