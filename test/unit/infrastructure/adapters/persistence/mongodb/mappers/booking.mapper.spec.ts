import { Booking } from '@domain/entities';
import { InvalidValueException } from '@domain/exceptions';
import { EntityId, Money } from '@domain/value-objects';
import { BookingMapper, UserMapper } from '@infrastructure/adapters/persistence/mongodb/mappers';
import { BookingDocument, UserDocument } from '@infrastructure/adapters/persistence/mongodb/schemas';

describe('BookingMapper', () => {
  const createBookingDocument = (overrides: Partial<BookingDocument> = {}): BookingDocument => {
    const document = new BookingDocument();
    document._id = 'booking-1';
    document.studentId = 'student-1';
    document.instructorId = 'instructor-1';
    document.courseId = 'course-1';
    document.availabilitySlotId = 'slot-1';
    document.status = 'confirmed';
    document.amountCents = 14900;
    document.discountCents = 1490;
    document.currency = 'EUR';
    document.promoCode = 'WELCOME10';
    document.studentNotes = null;
    document.instructorNotes = null;
    document.cancellationReason = null;
    document.confirmedAt = new Date('2026-03-02T09:00:00Z');
    document.cancelledAt = null;
    document.completedAt = null;
    document.paymentId = null;
    document.rescheduledFromSlotId = null;
    document.createdAt = new Date('2026-03-01T09:00:00Z');
    document.updatedAt = new Date('2026-03-02T09:00:00Z');
    return Object.assign(document, overrides);
  };

  describe('toDomain', () => {
    it('should share the currency between amount and discount', () => {
      // Act
      const booking = BookingMapper.toDomain(createBookingDocument());

      // Assert
      expect(booking.amount.cents).toBe(14900);
      expect(booking.amount.currency).toBe('EUR');
      expect(booking.discountAmount.cents).toBe(1490);
      expect(booking.discountAmount.currency).toBe('EUR');
      expect(booking.status.value).toBe('confirmed');
    });

    it('should restore optional references', () => {
      // Act
      const booking = BookingMapper.toDomain(
        createBookingDocument({ paymentId: 'payment-1', rescheduledFromSlotId: 'slot-0' }),
      );

      // Assert
      expect(booking.paymentId?.toString()).toBe('payment-1');
      expect(booking.rescheduledFromSlotId?.toString()).toBe('slot-0');
    });

    it('should reject an unknown stored status', () => {
      expect(() => BookingMapper.toDomain(createBookingDocument({ status: 'lost' }))).toThrow(
        InvalidValueException,
      );
    });
  });

  describe('toDocument', () => {
    it('should store ids as strings and money as cents', () => {
      // Arrange
      const booking = Booking.create({
        id: EntityId.fromString('booking-2'),
        studentId: EntityId.fromString('student-1'),
        instructorId: EntityId.fromString('instructor-1'),
        courseId: EntityId.fromString('course-1'),
        availabilitySlotId: EntityId.fromString('slot-1'),
        amount: Money.of(45, 'USD'),
        studentNotes: 'First session',
      });

      // Act
      const document = BookingMapper.toDocument(booking);

      // Assert
      expect(document).toBeInstanceOf(BookingDocument);
      expect(document._id).toBe('booking-2');
      expect(document.availabilitySlotId).toBe('slot-1');
      expect(document.status).toBe('pending');
      expect(document.amountCents).toBe(4500);
      expect(document.discountCents).toBe(0);
      expect(document.currency).toBe('USD');
      expect(document.studentNotes).toBe('First session');
      expect(document.paymentId).toBeNull();
    });
  });
});

describe('UserMapper', () => {
  const createUserDocument = (): UserDocument => {
    const document = new UserDocument();
    document._id = 'user-1';
    document.name = 'Mina Sato';
    document.email = 'mina@example.test';
    document.passwordHash = 'hashed-password';
    document.role = 'student';
    document.isActive = true;
    document.emailConfirmed = false;
    document.emailConfirmationToken = null;
    document.emailConfirmationTokenExpiresAt = null;
    document.passwordResetToken = null;
    document.passwordResetTokenExpiresAt = null;
    document.timezone = 'Asia/Tokyo';
    document.phoneNumber = null;
    document.profilePictureUrl = null;
    document.lastLoginAt = null;
    document.failedLoginAttempts = 2;
    document.lockedUntil = new Date('2026-03-01T10:15:00Z');
    document.createdAt = new Date('2026-01-01T00:00:00Z');
    document.updatedAt = new Date('2026-03-01T10:00:00Z');
    return document;
  };

  it('should restore lockout state', () => {
    // Act
    const user = UserMapper.toDomain(createUserDocument());

    // Assert
    expect(user.role).toBe('student');
    expect(user.isLocked(new Date('2026-03-01T10:10:00Z'))).toBe(true);
    expect(user.isLocked(new Date('2026-03-01T10:20:00Z'))).toBe(false);
  });

  it('should keep the password hash in the document', () => {
    // Arrange
    const user = UserMapper.toDomain(createUserDocument());

    // Act
    const document = UserMapper.toDocument(user);

    // Assert
    expect(document.passwordHash).toBe('hashed-password');
    expect(document.email).toBe('mina@example.test');
    expect(document.failedLoginAttempts).toBe(2);
  });
});
