import { parseEnumeration } from './enumerations';

/**
 * Value Object representing the status of a payment.
 */
export class PaymentStatus {
  static readonly VALID_STATUSES = [
    'pending',
    'succeeded',
    'failed',
    'cancelled',
    'refunded',
    'partially_refunded',
  ] as const;

  private constructor(public readonly value: PaymentStatusValue) {}

  static pending(): PaymentStatus {
    return new PaymentStatus('pending');
  }

  static succeeded(): PaymentStatus {
    return new PaymentStatus('succeeded');
  }

  static failed(): PaymentStatus {
    return new PaymentStatus('failed');
  }

  static cancelled(): PaymentStatus {
    return new PaymentStatus('cancelled');
  }

  static refunded(): PaymentStatus {
    return new PaymentStatus('refunded');
  }

  static partiallyRefunded(): PaymentStatus {
    return new PaymentStatus('partially_refunded');
  }

  static fromString(status: string): PaymentStatus {
    return new PaymentStatus(
      parseEnumeration(PaymentStatus.VALID_STATUSES, status, 'PaymentStatus'),
    );
  }

  isPending(): boolean {
    return this.value === 'pending';
  }

  isSucceeded(): boolean {
    return this.value === 'succeeded';
  }

  isRefunded(): boolean {
    return this.value === 'refunded' || this.value === 'partially_refunded';
  }

  equals(other: PaymentStatus): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}

export type PaymentStatusValue = (typeof PaymentStatus.VALID_STATUSES)[number];
