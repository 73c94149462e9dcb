import { parseEnumeration } from './enumerations';

/**
 * Value Object representing the status of a booking.
 * Lifecycle: pending → confirmed → rescheduled* → completed | no_show,
 * or cancelled while still active.
 */
export class BookingStatus {
  static readonly VALID_STATUSES = [
    'pending',
    'confirmed',
    'cancelled',
    'completed',
    'no_show',
    'rescheduled',
  ] as const;

  private constructor(public readonly value: BookingStatusValue) {}

  static pending(): BookingStatus {
    return new BookingStatus('pending');
  }

  static confirmed(): BookingStatus {
    return new BookingStatus('confirmed');
  }

  static cancelled(): BookingStatus {
    return new BookingStatus('cancelled');
  }

  static completed(): BookingStatus {
    return new BookingStatus('completed');
  }

  static noShow(): BookingStatus {
    return new BookingStatus('no_show');
  }

  static rescheduled(): BookingStatus {
    return new BookingStatus('rescheduled');
  }

  static fromString(status: string): BookingStatus {
    return new BookingStatus(
      parseEnumeration(BookingStatus.VALID_STATUSES, status, 'BookingStatus'),
    );
  }

  isPending(): boolean {
    return this.value === 'pending';
  }

  isConfirmed(): boolean {
    return this.value === 'confirmed';
  }

  isCancelled(): boolean {
    return this.value === 'cancelled';
  }

  isCompleted(): boolean {
    return this.value === 'completed';
  }

  isNoShow(): boolean {
    return this.value === 'no_show';
  }

  isRescheduled(): boolean {
    return this.value === 'rescheduled';
  }

  // Business rule: a rescheduled booking is confirmed for its new slot
  isScheduled(): boolean {
    return this.value === 'confirmed' || this.value === 'rescheduled';
  }

  // Business rule: pending and scheduled bookings still hold a seat
  isActive(): boolean {
    return this.value === 'pending' || this.isScheduled();
  }

  equals(other: BookingStatus): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}

export type BookingStatusValue = (typeof BookingStatus.VALID_STATUSES)[number];
