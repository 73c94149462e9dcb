import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { Booking } from '@domain/entities';
import { EntityId, Money } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, conflict, failure, fromDomain, notFound, success } from '../../common/result';
import { BookingOutputDto, toBookingOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import {
  IAvailabilitySlotRepositoryPort,
  IBookingRepositoryPort,
  ICourseRepositoryPort,
  IPromoCodeRepositoryPort,
  IUserRepositoryPort,
} from '../../ports';
import { NotificationWriter } from '../../services';
import { BOOKING_QUERY_PREFIXES, SLOT_AVAILABILITY_PREFIXES } from './booking-cache';

export interface CreateBookingInput {
  studentId: string;
  availabilitySlotId: string;
  promoCode?: string | null;
  studentNotes?: string | null;
}

@InvalidatesCache(BOOKING_QUERY_PREFIXES, 'New booking')
@InvalidatesCache(SLOT_AVAILABILITY_PREFIXES, 'Slot seat taken')
@InvalidatesCache(
  [CachePrefixes.GetPromoCodes, CachePrefixes.GetNotificationsByUser],
  'Promo code use and booking notification',
)
export class CreateBookingCommand extends ResultCommand<BookingOutputDto> {
  @IsNotEmpty({ message: 'Student ID is required.' })
  readonly studentId!: string;

  @IsNotEmpty({ message: 'Availability slot ID is required.' })
  readonly availabilitySlotId!: string;

  @IsOptional()
  @IsString()
  @MaxLength(50, { message: 'Promo code must not exceed 50 characters.' })
  readonly promoCode?: string | null;

  @IsOptional()
  @MaxLength(1000, { message: 'Notes must not exceed 1000 characters.' })
  readonly studentNotes?: string | null;

  constructor(input: CreateBookingInput) {
    super();
    Object.assign(this, input);
  }
}

/**
 * Books a seat on an open slot of a published course. A promo code is redeemed
 * against the slot price; the booking stores the net amount and the discount.
 */
@Injectable()
export class CreateBookingHandler
  implements RequestHandler<CreateBookingCommand, Result<BookingOutputDto>>
{
  private readonly logger = new Logger(CreateBookingHandler.name);

  constructor(
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
    @Inject('IAvailabilitySlotRepository')
    private readonly slotRepository: IAvailabilitySlotRepositoryPort,
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('IPromoCodeRepository')
    private readonly promoCodeRepository: IPromoCodeRepositoryPort,
    private readonly notifications: NotificationWriter,
  ) {}

  handle(command: CreateBookingCommand): Promise<Result<BookingOutputDto>> {
    return fromDomain(async () => {
      const now = new Date();
      const studentId = EntityId.fromString(command.studentId);
      const slotId = EntityId.fromString(command.availabilitySlotId);

      const student = await this.userRepository.findById(studentId);
      if (!student || !student.isActive) {
        return notFound(`Student with ID ${command.studentId} not found`);
      }

      const slot = await this.slotRepository.findById(slotId);
      if (!slot) {
        return notFound(`Availability slot with ID ${command.availabilitySlotId} not found`);
      }
      if (!slot.isBookable(now)) {
        return failure('Availability slot is not open for booking.');
      }

      const course = await this.courseRepository.findById(slot.courseId);
      if (!course || !course.isAvailable()) {
        return failure('Course is not available for booking.');
      }

      const existing = await this.bookingRepository.findActiveForStudentAndSlot(studentId, slotId);
      if (existing) {
        return conflict('Student already has an active booking for this slot.');
      }

      const promoCode = command.promoCode
        ? await this.promoCodeRepository.findByCode(command.promoCode)
        : null;
      if (command.promoCode && !promoCode) {
        return notFound(`Promo code ${command.promoCode.trim().toUpperCase()} not found`);
      }
      const discount = promoCode
        ? promoCode.redeem(course.id.toString(), slot.price, now)
        : Money.zero(slot.price.currency);

      const booking = Booking.create({
        studentId,
        instructorId: slot.instructorId,
        courseId: course.id,
        availabilitySlotId: slot.id,
        amount: slot.price.subtract(discount),
        discountAmount: discount,
        promoCode: promoCode?.code ?? null,
        studentNotes: command.studentNotes ?? null,
      });
      slot.addParticipant();

      // Nothing is written until every domain rule above has passed
      if (promoCode) {
        await this.promoCodeRepository.save(promoCode);
      }
      await this.slotRepository.save(slot);
      await this.bookingRepository.save(booking);
      await this.notifications.notify({
        userId: studentId,
        type: 'booking_confirmation',
        title: 'Booking received',
        message: `Your booking for "${course.title}" on ${slot.startTime.toISOString()} is awaiting confirmation.`,
        relatedEntityType: 'Booking',
        relatedEntityId: booking.id.toString(),
      });

      this.logger.log(`Booking ${booking.id.toString()} created for slot ${slot.id.toString()}`);
      return success(toBookingOutput(booking));
    });
  }
}
