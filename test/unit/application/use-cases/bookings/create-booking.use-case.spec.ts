import {
  IAvailabilitySlotRepositoryPort,
  IBookingRepositoryPort,
  ICourseRepositoryPort,
  INotificationRepositoryPort,
  IPromoCodeRepositoryPort,
  IUserRepositoryPort,
} from '@application/ports';
import { NotificationWriter } from '@application/services';
import { CreateBookingCommand, CreateBookingHandler } from '@application/use-cases';
import { AvailabilitySlot, Booking, Notification, PromoCode } from '@domain/entities';
import { EntityId, Money } from '@domain/value-objects';
import {
  createBookingRepositoryMock,
  createCourseRepositoryMock,
  createNotificationRepositoryMock,
  createPromoCodeRepositoryMock,
  createSlotRepositoryMock,
  createTestCourse,
  createTestSlot,
  createTestUser,
  createUserRepositoryMock,
  hoursFromNow,
} from '../fixtures';

describe('CreateBookingHandler', () => {
  let bookingRepository: jest.Mocked<IBookingRepositoryPort>;
  let slotRepository: jest.Mocked<IAvailabilitySlotRepositoryPort>;
  let courseRepository: jest.Mocked<ICourseRepositoryPort>;
  let userRepository: jest.Mocked<IUserRepositoryPort>;
  let promoCodeRepository: jest.Mocked<IPromoCodeRepositoryPort>;
  let notificationRepository: jest.Mocked<INotificationRepositoryPort>;
  let handler: CreateBookingHandler;
  let slot: AvailabilitySlot;

  const command = (promoCode?: string) =>
    new CreateBookingCommand({
      studentId: 'student-1',
      availabilitySlotId: 'slot-1',
      promoCode,
      studentNotes: 'First time with ultrasound',
    });

  beforeEach(() => {
    bookingRepository = createBookingRepositoryMock();
    slotRepository = createSlotRepositoryMock();
    courseRepository = createCourseRepositoryMock();
    userRepository = createUserRepositoryMock();
    promoCodeRepository = createPromoCodeRepositoryMock();
    notificationRepository = createNotificationRepositoryMock();
    handler = new CreateBookingHandler(
      bookingRepository,
      slotRepository,
      courseRepository,
      userRepository,
      promoCodeRepository,
      new NotificationWriter(notificationRepository),
    );

    slot = createTestSlot();
    userRepository.findById.mockResolvedValue(createTestUser({ id: 'student-1' }));
    slotRepository.findById.mockResolvedValue(slot);
    courseRepository.findById.mockResolvedValue(createTestCourse());
    bookingRepository.findActiveForStudentAndSlot.mockResolvedValue(null);
  });

  it('should book a seat at the slot price', async () => {
    // Act
    const result = await handler.handle(command());

    // Assert
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.status).toBe('pending');
    expect(result.value.amount).toBe(100);
    expect(result.value.discountAmount).toBe(0);
    expect(result.value.promoCode).toBeNull();
    expect(result.value.instructorId).toBe('instructor-1');
    expect(slot.currentParticipants).toBe(1);
    expect(slotRepository.save).toHaveBeenCalledWith(slot);
    expect(bookingRepository.save).toHaveBeenCalledWith(expect.any(Booking));

    const notification: Notification = notificationRepository.save.mock.calls[0][0];
    expect(notification.type).toBe('booking_confirmation');
    expect(notification.relatedEntityId).toBe(result.value.id);
  });

  it('should charge the discounted amount and consume the promo code', async () => {
    // Arrange
    const promo = PromoCode.create({
      code: 'spring20',
      discountType: 'percentage',
      discountValue: 20,
      validFrom: hoursFromNow(-24),
      validUntil: hoursFromNow(24 * 30),
    });
    promoCodeRepository.findByCode.mockResolvedValue(promo);

    // Act
    const result = await handler.handle(command('spring20'));

    // Assert
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.amount).toBe(80);
    expect(result.value.discountAmount).toBe(20);
    expect(result.value.promoCode).toBe('SPRING20');
    expect(promo.currentUses).toBe(1);
    expect(promoCodeRepository.save).toHaveBeenCalledWith(promo);
  });

  it('should not persist the promo code use when the booking is rejected', async () => {
    // Arrange
    const promo = PromoCode.create({
      code: 'FREEPASS',
      discountType: 'percentage',
      discountValue: 100,
      validFrom: hoursFromNow(-24),
      validUntil: hoursFromNow(24),
    });
    promoCodeRepository.findByCode.mockResolvedValue(promo);

    // Act
    const result = await handler.handle(command('freepass'));

    // Assert
    expect(result).toEqual({
      ok: false,
      kind: 'failure',
      errors: ['Booking amount cannot be zero'],
    });
    expect(promoCodeRepository.save).not.toHaveBeenCalled();
    expect(slotRepository.save).not.toHaveBeenCalled();
    expect(bookingRepository.save).not.toHaveBeenCalled();
  });

  it('should return not found for an unknown promo code', async () => {
    promoCodeRepository.findByCode.mockResolvedValue(null);

    const result = await handler.handle(command('nope'));

    expect(result).toEqual({ ok: false, kind: 'not_found', errors: ['Promo code NOPE not found'] });
    expect(bookingRepository.save).not.toHaveBeenCalled();
  });

  it('should refuse a slot that already started', async () => {
    slotRepository.findById.mockResolvedValue(createTestSlot({ startsInHours: -1 }));

    const result = await handler.handle(command());

    expect(result).toEqual({
      ok: false,
      kind: 'failure',
      errors: ['Availability slot is not open for booking.'],
    });
  });

  it('should refuse an unpublished course', async () => {
    courseRepository.findById.mockResolvedValue(createTestCourse({ published: false }));

    const result = await handler.handle(command());

    expect(result).toEqual({
      ok: false,
      kind: 'failure',
      errors: ['Course is not available for booking.'],
    });
  });

  it('should refuse a second active booking for the same slot', async () => {
    bookingRepository.findActiveForStudentAndSlot.mockResolvedValue(
      Booking.create({
        studentId: EntityId.fromString('student-1'),
        instructorId: EntityId.fromString('instructor-1'),
        courseId: EntityId.fromString('course-1'),
        availabilitySlotId: EntityId.fromString('slot-1'),
        amount: Money.of(100),
      }),
    );

    const result = await handler.handle(command());

    expect(result).toEqual({
      ok: false,
      kind: 'conflict',
      errors: ['Student already has an active booking for this slot.'],
    });
    expect(slot.currentParticipants).toBe(0);
  });

  it('should return not found for an unknown student', async () => {
    userRepository.findById.mockResolvedValue(null);

    const result = await handler.handle(command());

    expect(result).toEqual({
      ok: false,
      kind: 'not_found',
      errors: ['Student with ID student-1 not found'],
    });
  });
});
