import {
  IAvailabilitySlotRepositoryPort,
  IBookingRepositoryPort,
  INotificationRepositoryPort,
  IPaymentRepositoryPort,
} from '@application/ports';
import { NotificationWriter } from '@application/services';
import { CancelBookingCommand, CancelBookingHandler } from '@application/use-cases';
import { AvailabilitySlot, Booking, Notification, Payment } from '@domain/entities';
import { EntityId, Money } from '@domain/value-objects';
import {
  createBookingRepositoryMock,
  createNotificationRepositoryMock,
  createPaymentRepositoryMock,
  createSlotRepositoryMock,
  createTestSlot,
} from '../fixtures';

describe('CancelBookingHandler', () => {
  let bookingRepository: jest.Mocked<IBookingRepositoryPort>;
  let slotRepository: jest.Mocked<IAvailabilitySlotRepositoryPort>;
  let paymentRepository: jest.Mocked<IPaymentRepositoryPort>;
  let notificationRepository: jest.Mocked<INotificationRepositoryPort>;
  let handler: CancelBookingHandler;
  let booking: Booking;
  let payment: Payment;

  const arrange = (startsInHours: number): AvailabilitySlot => {
    const slot = createTestSlot({ startsInHours });
    slot.addParticipant();
    slotRepository.findById.mockResolvedValue(slot);
    return slot;
  };

  beforeEach(() => {
    bookingRepository = createBookingRepositoryMock();
    slotRepository = createSlotRepositoryMock();
    paymentRepository = createPaymentRepositoryMock();
    notificationRepository = createNotificationRepositoryMock();
    handler = new CancelBookingHandler(
      bookingRepository,
      slotRepository,
      paymentRepository,
      new NotificationWriter(notificationRepository),
    );

    booking = Booking.create({
      id: EntityId.fromString('booking-1'),
      studentId: EntityId.fromString('student-1'),
      instructorId: EntityId.fromString('instructor-1'),
      courseId: EntityId.fromString('course-1'),
      availabilitySlotId: EntityId.fromString('slot-1'),
      amount: Money.of(100),
    });
    booking.confirm();
    payment = Payment.create({
      bookingId: booking.id,
      userId: booking.studentId,
      amount: Money.of(100),
      provider: 'stripe',
    });
    payment.markSucceeded('txn-test-1');

    bookingRepository.findById.mockResolvedValue(booking);
    paymentRepository.findByBooking.mockResolvedValue(payment);
  });

  it('should refund in full with more than a day of notice', async () => {
    // Arrange
    const slot = arrange(72);

    // Act
    const result = await handler.handle(new CancelBookingCommand('booking-1', 'Shift change'));

    // Assert
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.refundAmount).toBe(100);
    expect(result.value.booking.status).toBe('cancelled');
    expect(result.value.booking.cancellationReason).toBe('Shift change');
    expect(payment.status.isRefunded()).toBe(true);
    expect(slot.currentParticipants).toBe(0);
    expect(paymentRepository.save).toHaveBeenCalledWith(payment);
  });

  it('should refund half for a late cancellation', async () => {
    arrange(2);

    const result = await handler.handle(new CancelBookingCommand('booking-1', 'Sick'));

    expect(result.ok && result.value.refundAmount).toBe(50);
    expect(payment.refundAmount?.amount).toBe(50);

    const notification: Notification = notificationRepository.save.mock.calls[0][0];
    expect(notification.type).toBe('booking_cancellation');
    expect(notification.message).toBe('Your booking was cancelled. $50.00 will be refunded.');
  });

  it('should not refund a payment that never succeeded', async () => {
    arrange(72);
    paymentRepository.findByBooking.mockResolvedValue(null);

    const result = await handler.handle(new CancelBookingCommand('booking-1', 'Shift change'));

    expect(result.ok && result.value.refundAmount).toBe(100);
    expect(paymentRepository.save).not.toHaveBeenCalled();
  });

  it('should not cancel a booking twice', async () => {
    arrange(72);
    booking.cancel('Earlier');

    const result = await handler.handle(new CancelBookingCommand('booking-1', 'Again'));

    expect(result).toEqual({
      ok: false,
      kind: 'failure',
      errors: ['Only pending or confirmed bookings can be cancelled.'],
    });
    expect(bookingRepository.save).not.toHaveBeenCalled();
  });

  it('should return not found for an unknown booking', async () => {
    bookingRepository.findById.mockResolvedValue(null);

    const result = await handler.handle(new CancelBookingCommand('missing', 'Sick'));

    expect(result).toEqual({
      ok: false,
      kind: 'not_found',
      errors: ['Booking with ID missing not found'],
    });
  });
});
