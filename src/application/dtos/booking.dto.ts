import { Booking } from '@domain/entities';

export interface BookingOutputDto {
  readonly id: string;
  readonly studentId: string;
  readonly instructorId: string;
  readonly courseId: string;
  readonly availabilitySlotId: string;
  readonly status: string;
  /** Amount charged after discount */
  readonly amount: number;
  readonly discountAmount: number;
  readonly currency: string;
  readonly promoCode: string | null;
  readonly studentNotes: string | null;
  readonly instructorNotes: string | null;
  readonly cancellationReason: string | null;
  readonly confirmedAt: string | null;
  readonly cancelledAt: string | null;
  readonly completedAt: string | null;
  readonly paymentId: string | null;
  readonly rescheduledFromSlotId: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface BookingCancellationOutputDto {
  readonly booking: BookingOutputDto;
  /** Amount returned to the student under the refund policy */
  readonly refundAmount: number;
}

export function toBookingOutput(booking: Booking): BookingOutputDto {
  return {
    id: booking.id.toString(),
    studentId: booking.studentId.toString(),
    instructorId: booking.instructorId.toString(),
    courseId: booking.courseId.toString(),
    availabilitySlotId: booking.availabilitySlotId.toString(),
    status: booking.status.toString(),
    amount: booking.amount.amount,
    discountAmount: booking.discountAmount.amount,
    currency: booking.amount.currency,
    promoCode: booking.promoCode,
    studentNotes: booking.studentNotes,
    instructorNotes: booking.instructorNotes,
    cancellationReason: booking.cancellationReason,
    confirmedAt: booking.confirmedAt?.toISOString() ?? null,
    cancelledAt: booking.cancelledAt?.toISOString() ?? null,
    completedAt: booking.completedAt?.toISOString() ?? null,
    paymentId: booking.paymentId?.toString() ?? null,
    rescheduledFromSlotId: booking.rescheduledFromSlotId?.toString() ?? null,
    createdAt: booking.createdAt.toISOString(),
    updatedAt: booking.updatedAt.toISOString(),
  };
}
