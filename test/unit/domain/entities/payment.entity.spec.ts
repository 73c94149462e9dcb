import { Payment } from '@domain/entities';
import { EntityId, Money } from '@domain/value-objects';

describe('Payment', () => {
  const createTestPayment = (): Payment =>
    Payment.create({
      bookingId: EntityId.fromString('booking-1'),
      userId: EntityId.fromString('student-1'),
      amount: Money.of(100),
      provider: 'stripe',
    });

  it('should start pending', () => {
    expect(createTestPayment().status.isPending()).toBe(true);
  });

  it('should mark a pending payment as succeeded once', () => {
    const payment = createTestPayment();

    payment.markSucceeded('txn_123');

    expect(payment.status.isSucceeded()).toBe(true);
    expect(payment.providerTransactionId).toBe('txn_123');
    expect(() => payment.markSucceeded()).toThrow(
      'Only pending payments can be marked as succeeded.',
    );
  });

  it('should require a failure reason', () => {
    expect(() => createTestPayment().markFailed('')).toThrow('Failure reason is required.');
  });

  it('should refund the full amount as refunded', () => {
    const payment = createTestPayment();
    payment.markSucceeded();

    payment.refund(Money.of(100), 'Course cancelled');

    expect(payment.status.toString()).toBe('refunded');
    expect(payment.refundAmount?.cents).toBe(10000);
  });

  it('should refund part of the amount as partially refunded', () => {
    const payment = createTestPayment();
    payment.markSucceeded();

    payment.refund(Money.of(50), 'Late cancellation');

    expect(payment.status.toString()).toBe('partially_refunded');
  });

  it('should validate refunds', () => {
    const payment = createTestPayment();
    expect(() => payment.refund(Money.of(10), 'x')).toThrow(
      'Only succeeded payments can be refunded.',
    );

    payment.markSucceeded();
    expect(() => payment.refund(Money.of(150), 'x')).toThrow(
      'Refund amount must be positive and less than or equal to the payment amount.',
    );
    expect(() => payment.refund(Money.of(10), ' ')).toThrow('Refund reason is required.');
  });

  it('should not cancel a failed payment', () => {
    const payment = createTestPayment();
    payment.markFailed('Card declined');

    expect(() => payment.cancel()).toThrow('Only pending or succeeded payments can be cancelled.');
  });
});
