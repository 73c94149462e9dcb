import { AggregateRoot } from '../events';
import { BusinessRuleViolationException } from '../exceptions';
import { EntityId, Money, PaymentProvider, PaymentStatus } from '../value-objects';

export interface PaymentProps {
  bookingId: EntityId;
  userId: EntityId;
  amount: Money;
  status: PaymentStatus;
  provider: PaymentProvider;
  providerTransactionId: string | null;
  failureReason: string | null;
  processedAt: Date | null;
  refundAmount: Money | null;
  refundReason: string | null;
  refundedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Entity representing a charge for a booking. The provider call itself happens
 * outside this service; only its outcome is recorded here.
 */
export class Payment extends AggregateRoot {
  private constructor(id: EntityId, private readonly props: PaymentProps) {
    super(id);
  }

  static create(params: {
    id?: EntityId;
    bookingId: EntityId;
    userId: EntityId;
    amount: Money;
    provider: PaymentProvider;
    providerTransactionId?: string | null;
  }): Payment {
    if (!params.amount.isPositive()) {
      throw new BusinessRuleViolationException('Payment amount must be positive.');
    }

    const now = new Date();
    const payment = new Payment(params.id ?? EntityId.generate(), {
      bookingId: params.bookingId,
      userId: params.userId,
      amount: params.amount,
      status: PaymentStatus.pending(),
      provider: params.provider,
      providerTransactionId: params.providerTransactionId ?? null,
      failureReason: null,
      processedAt: null,
      refundAmount: null,
      refundReason: null,
      refundedAt: null,
      createdAt: now,
      updatedAt: now,
    });
    payment.record('PaymentCreated', {
      bookingId: params.bookingId.toString(),
      amount: params.amount.format(),
    });
    return payment;
  }

  static reconstitute(id: EntityId, props: PaymentProps): Payment {
    return new Payment(id, { ...props });
  }

  get bookingId(): EntityId {
    return this.props.bookingId;
  }

  get userId(): EntityId {
    return this.props.userId;
  }

  get amount(): Money {
    return this.props.amount;
  }

  get status(): PaymentStatus {
    return this.props.status;
  }

  get provider(): PaymentProvider {
    return this.props.provider;
  }

  get providerTransactionId(): string | null {
    return this.props.providerTransactionId;
  }

  get failureReason(): string | null {
    return this.props.failureReason;
  }

  get processedAt(): Date | null {
    return this.props.processedAt;
  }

  get refundAmount(): Money | null {
    return this.props.refundAmount;
  }

  get refundReason(): string | null {
    return this.props.refundReason;
  }

  get refundedAt(): Date | null {
    return this.props.refundedAt;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  markSucceeded(providerTransactionId?: string, now: Date = new Date()): void {
    if (!this.props.status.isPending()) {
      throw new BusinessRuleViolationException(
        'Only pending payments can be marked as succeeded.',
      );
    }

    this.props.status = PaymentStatus.succeeded();
    this.props.providerTransactionId = providerTransactionId ?? this.props.providerTransactionId;
    this.props.processedAt = now;
    this.touch();
    this.record('PaymentSucceeded', { amount: this.props.amount.format() });
  }

  markFailed(reason: string, now: Date = new Date()): void {
    if (!this.props.status.isPending()) {
      throw new BusinessRuleViolationException('Only pending payments can be marked as failed.');
    }
    if (!reason || reason.trim().length === 0) {
      throw new BusinessRuleViolationException('Failure reason is required.');
    }

    this.props.status = PaymentStatus.failed();
    this.props.failureReason = reason.trim();
    this.props.processedAt = now;
    this.touch();
    this.record('PaymentFailed', { reason: reason.trim() });
  }

  cancel(): void {
    if (!this.props.status.isPending() && !this.props.status.isSucceeded()) {
      throw new BusinessRuleViolationException(
        'Only pending or succeeded payments can be cancelled.',
      );
    }

    this.props.status = PaymentStatus.cancelled();
    this.touch();
    this.record('PaymentCancelled');
  }

  // Business logic: full refund → refunded, partial refund → partially_refunded
  refund(amount: Money, reason: string, now: Date = new Date()): void {
    if (!this.props.status.isSucceeded()) {
      throw new BusinessRuleViolationException('Only succeeded payments can be refunded.');
    }
    if (!amount.isPositive() || amount.isGreaterThan(this.props.amount)) {
      throw new BusinessRuleViolationException(
        'Refund amount must be positive and less than or equal to the payment amount.',
      );
    }
    if (!reason || reason.trim().length === 0) {
      throw new BusinessRuleViolationException('Refund reason is required.');
    }

    this.props.status = amount.equals(this.props.amount)
      ? PaymentStatus.refunded()
      : PaymentStatus.partiallyRefunded();
    this.props.refundAmount = amount;
    this.props.refundReason = reason.trim();
    this.props.refundedAt = now;
    this.touch();
    this.record('PaymentRefunded', { amount: amount.format(), reason: reason.trim() });
  }

  private touch(): void {
    this.props.updatedAt = new Date();
  }
}
