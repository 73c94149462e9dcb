import { AggregateRoot } from '../events';
import { BusinessRuleViolationException } from '../exceptions';
import { BookingStatus, EntityId, Money } from '../value-objects';

export interface BookingProps {
  studentId: EntityId;
  instructorId: EntityId;
  courseId: EntityId;
  availabilitySlotId: EntityId;
  status: BookingStatus;
  amount: Money;
  discountAmount: Money;
  promoCode: string | null;
  studentNotes: string | null;
  instructorNotes: string | null;
  cancellationReason: string | null;
  confirmedAt: Date | null;
  cancelledAt: Date | null;
  completedAt: Date | null;
  paymentId: EntityId | null;
  rescheduledFromSlotId: EntityId | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Entity representing a student's reservation of an availability slot.
 */
export class Booking extends AggregateRoot {
  private constructor(id: EntityId, private readonly props: BookingProps) {
    super(id);
  }

  // Factory method: create a pending booking
  static create(params: {
    id?: EntityId;
    studentId: EntityId;
    instructorId: EntityId;
    courseId: EntityId;
    availabilitySlotId: EntityId;
    amount: Money;
    discountAmount?: Money;
    promoCode?: string | null;
    studentNotes?: string | null;
  }): Booking {
    if (params.amount.isZero()) {
      throw new BusinessRuleViolationException('Booking amount cannot be zero');
    }

    const now = new Date();
    const booking = new Booking(params.id ?? EntityId.generate(), {
      studentId: params.studentId,
      instructorId: params.instructorId,
      courseId: params.courseId,
      availabilitySlotId: params.availabilitySlotId,
      status: BookingStatus.pending(),
      amount: params.amount,
      discountAmount: params.discountAmount ?? Money.zero(params.amount.currency),
      promoCode: params.promoCode ?? null,
      studentNotes: params.studentNotes ?? null,
      instructorNotes: null,
      cancellationReason: null,
      confirmedAt: null,
      cancelledAt: null,
      completedAt: null,
      paymentId: null,
      rescheduledFromSlotId: null,
      createdAt: now,
      updatedAt: now,
    });
    booking.record('BookingCreated', {
      studentId: params.studentId.toString(),
      slotId: params.availabilitySlotId.toString(),
      amount: params.amount.format(),
    });
    return booking;
  }

  static reconstitute(id: EntityId, props: BookingProps): Booking {
    return new Booking(id, { ...props });
  }

  get studentId(): EntityId {
    return this.props.studentId;
  }

  get instructorId(): EntityId {
    return this.props.instructorId;
  }

  get courseId(): EntityId {
    return this.props.courseId;
  }

  get availabilitySlotId(): EntityId {
    return this.props.availabilitySlotId;
  }

  get status(): BookingStatus {
    return this.props.status;
  }

  get amount(): Money {
    return this.props.amount;
  }

  get discountAmount(): Money {
    return this.props.discountAmount;
  }

  get promoCode(): string | null {
    return this.props.promoCode;
  }

  get studentNotes(): string | null {
    return this.props.studentNotes;
  }

  get instructorNotes(): string | null {
    return this.props.instructorNotes;
  }

  get cancellationReason(): string | null {
    return this.props.cancellationReason;
  }

  get confirmedAt(): Date | null {
    return this.props.confirmedAt;
  }

  get cancelledAt(): Date | null {
    return this.props.cancelledAt;
  }

  get completedAt(): Date | null {
    return this.props.completedAt;
  }

  get paymentId(): EntityId | null {
    return this.props.paymentId;
  }

  get rescheduledFromSlotId(): EntityId | null {
    return this.props.rescheduledFromSlotId;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  canBeConfirmed(): boolean {
    return this.props.status.isPending();
  }

  canBeCancelled(): boolean {
    return this.props.status.isActive();
  }

  isActive(): boolean {
    return this.props.status.isActive();
  }

  belongsTo(userId: string): boolean {
    return this.props.studentId.toString() === userId;
  }

  // Business logic: instructor accepts the booking
  confirm(now: Date = new Date()): void {
    if (!this.canBeConfirmed()) {
      throw new BusinessRuleViolationException('Only pending bookings can be confirmed.');
    }

    this.props.status = BookingStatus.confirmed();
    this.props.confirmedAt = now;
    this.touch();
    this.record('BookingConfirmed');
  }

  // Business logic: cancel while the booking still holds a seat
  cancel(reason: string, now: Date = new Date()): void {
    if (!this.canBeCancelled()) {
      throw new BusinessRuleViolationException(
        'Only pending or confirmed bookings can be cancelled.',
      );
    }
    if (!reason || reason.trim().length === 0) {
      throw new BusinessRuleViolationException('Cancellation reason is required.');
    }

    this.props.status = BookingStatus.cancelled();
    this.props.cancellationReason = reason.trim();
    this.props.cancelledAt = now;
    this.touch();
    this.record('BookingCancelled', { reason: reason.trim() });
  }

  complete(now: Date = new Date()): void {
    if (!this.props.status.isScheduled()) {
      throw new BusinessRuleViolationException('Only confirmed bookings can be completed.');
    }

    this.props.status = BookingStatus.completed();
    this.props.completedAt = now;
    this.touch();
    this.record('BookingCompleted');
  }

  markNoShow(): void {
    if (!this.props.status.isScheduled()) {
      throw new BusinessRuleViolationException('Only confirmed bookings can be marked as no-show.');
    }

    this.props.status = BookingStatus.noShow();
    this.touch();
    this.record('BookingNoShow');
  }

  // Business logic: move a scheduled booking to another slot
  reschedule(newSlotId: EntityId): void {
    if (!this.props.status.isScheduled()) {
      throw new BusinessRuleViolationException('Only confirmed bookings can be rescheduled.');
    }
    if (newSlotId.equals(this.props.availabilitySlotId)) {
      throw new BusinessRuleViolationException('New slot must differ from the current slot.');
    }

    const previousSlotId = this.props.availabilitySlotId;
    this.props.status = BookingStatus.rescheduled();
    this.props.rescheduledFromSlotId = previousSlotId;
    this.props.availabilitySlotId = newSlotId;
    this.touch();
    this.record('BookingRescheduled', {
      fromSlotId: previousSlotId.toString(),
      toSlotId: newSlotId.toString(),
    });
  }

  updateStudentNotes(notes: string | null): void {
    this.props.studentNotes = notes;
    this.touch();
  }

  updateInstructorNotes(notes: string | null): void {
    this.props.instructorNotes = notes;
    this.touch();
  }

  assignPayment(paymentId: EntityId): void {
    if (this.props.paymentId !== null) {
      throw new BusinessRuleViolationException('Booking already has a payment assigned');
    }

    this.props.paymentId = paymentId;
    this.touch();
    this.record('BookingPaymentAssigned', { paymentId: paymentId.toString() });
  }

  private touch(): void {
    this.props.updatedAt = new Date();
  }
}
