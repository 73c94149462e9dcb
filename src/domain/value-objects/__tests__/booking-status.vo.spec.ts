import { BookingStatus } from '../booking-status.vo';
import { PaymentStatus } from '../payment-status.vo';
import { InvalidValueException } from '../../exceptions';

describe('BookingStatus', () => {
  it('should parse known statuses case-insensitively', () => {
    expect(BookingStatus.fromString('No_Show').value).toBe('no_show');
    expect(BookingStatus.fromString(' confirmed ').isConfirmed()).toBe(true);
  });

  it('should reject unknown statuses', () => {
    expect(() => BookingStatus.fromString('archived')).toThrow(InvalidValueException);
  });

  it('should treat pending, confirmed and rescheduled bookings as active', () => {
    expect(BookingStatus.pending().isActive()).toBe(true);
    expect(BookingStatus.confirmed().isActive()).toBe(true);
    expect(BookingStatus.rescheduled().isActive()).toBe(true);
    expect(BookingStatus.cancelled().isActive()).toBe(false);
    expect(BookingStatus.completed().isActive()).toBe(false);
  });

  it('should only treat confirmed and rescheduled bookings as scheduled', () => {
    expect(BookingStatus.pending().isScheduled()).toBe(false);
    expect(BookingStatus.rescheduled().isScheduled()).toBe(true);
  });
});

describe('PaymentStatus', () => {
  it('should parse and compare statuses', () => {
    const status = PaymentStatus.fromString('partially_refunded');

    expect(status.isRefunded()).toBe(true);
    expect(status.equals(PaymentStatus.partiallyRefunded())).toBe(true);
  });

  it('should list the valid values in the error message', () => {
    expect(() => PaymentStatus.fromString('void')).toThrow(
      'Invalid PaymentStatus: "void" is not valid. Valid values: pending, succeeded, failed, cancelled, refunded, partially_refunded',
    );
  });
});
