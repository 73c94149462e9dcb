import { Booking } from '../entities';
import { Money } from '../value-objects';

/**
 * Domain Service deciding how much of a cancelled booking is refunded.
 * Needs both the booking and the start time of the slot it reserved.
 */
export class RefundPolicy {
  static readonly FULL_REFUND_WINDOW_MS = 24 * 60 * 60 * 1000;
  static readonly LATE_CANCELLATION_SHARE = 0.5;

  /**
   * Full refund when cancelled more than 24 hours before the session starts,
   * half otherwise. Bookings that are not cancelled get nothing back.
   */
  calculateRefund(booking: Booking, slotStart: Date): Money {
    const cancelledAt = booking.cancelledAt;
    if (!booking.status.isCancelled() || cancelledAt === null) {
      return Money.zero(booking.amount.currency);
    }

    const noticeMs = slotStart.getTime() - cancelledAt.getTime();
    if (noticeMs > RefundPolicy.FULL_REFUND_WINDOW_MS) {
      return booking.amount;
    }

    return booking.amount.multiply(RefundPolicy.LATE_CANCELLATION_SHARE);
  }
}
