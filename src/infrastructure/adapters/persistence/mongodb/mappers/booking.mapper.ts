import { Booking } from '@domain/entities';
import { BookingStatus, EntityId, Money } from '@domain/value-objects';
import { BookingDocument } from '../schemas';

/**
 * Amount and discount share the booking's currency column.
 */
export class BookingMapper {
  static toDomain(document: BookingDocument): Booking {
    return Booking.reconstitute(EntityId.fromString(document._id), {
      studentId: EntityId.fromString(document.studentId),
      instructorId: EntityId.fromString(document.instructorId),
      courseId: EntityId.fromString(document.courseId),
      availabilitySlotId: EntityId.fromString(document.availabilitySlotId),
      status: BookingStatus.fromString(document.status),
      amount: Money.fromCents(document.amountCents, document.currency),
      discountAmount: Money.fromCents(document.discountCents, document.currency),
      promoCode: document.promoCode ?? null,
      studentNotes: document.studentNotes ?? null,
      instructorNotes: document.instructorNotes ?? null,
      cancellationReason: document.cancellationReason ?? null,
      confirmedAt: document.confirmedAt ?? null,
      cancelledAt: document.cancelledAt ?? null,
      completedAt: document.completedAt ?? null,
      paymentId: document.paymentId ? EntityId.fromString(document.paymentId) : null,
      rescheduledFromSlotId: document.rescheduledFromSlotId
        ? EntityId.fromString(document.rescheduledFromSlotId)
        : null,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static toDocument(booking: Booking): BookingDocument {
    const document = new BookingDocument();
    document._id = booking.id.toString();
    document.studentId = booking.studentId.toString();
    document.instructorId = booking.instructorId.toString();
    document.courseId = booking.courseId.toString();
    document.availabilitySlotId = booking.availabilitySlotId.toString();
    document.status = booking.status.value;
    document.amountCents = booking.amount.cents;
    document.discountCents = booking.discountAmount.cents;
    document.currency = booking.amount.currency;
    document.promoCode = booking.promoCode;
    document.studentNotes = booking.studentNotes;
    document.instructorNotes = booking.instructorNotes;
    document.cancellationReason = booking.cancellationReason;
    document.confirmedAt = booking.confirmedAt;
    document.cancelledAt = booking.cancelledAt;
    document.completedAt = booking.completedAt;
    document.paymentId = booking.paymentId?.toString() ?? null;
    document.rescheduledFromSlotId = booking.rescheduledFromSlotId?.toString() ?? null;
    document.createdAt = booking.createdAt;
    document.updatedAt = booking.updatedAt;
    return document;
  }
}
