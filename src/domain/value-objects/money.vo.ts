import { InvalidValueException } from '../exceptions';
import { Currency } from './currency.vo';

const SYMBOLS: Readonly<Record<string, string>> = { USD: '$', EUR: '€', GBP: '£' };

/**
 * A non-negative amount in one currency, held as whole cents.
 * Prices, discounts, payments and refunds all travel as Money.
 */
export class Money {
  public readonly currency: string;

  private constructor(public readonly cents: number, currency: string) {
    this.currency = Currency.of(currency).code;
    if (!Number.isFinite(cents)) {
      throw new InvalidValueException('Money', 'amount must be a finite number');
    }
    if (cents < 0) {
      throw new InvalidValueException('Money', 'amount cannot be negative');
    }
  }

  static fromCents(cents: number, currency = 'USD'): Money {
    return new Money(Math.round(cents), currency);
  }

  /** From a decimal amount such as 49.99 */
  static of(amount: number, currency = 'USD'): Money {
    return Money.fromCents(amount * 100, currency);
  }

  static zero(currency = 'USD'): Money {
    return new Money(0, currency);
  }

  get amount(): number {
    return this.cents / 100;
  }

  add(other: Money): Money {
    return this.withCents(this.cents + this.centsOf(other));
  }

  subtract(other: Money): Money {
    const remaining = this.cents - this.centsOf(other);
    if (remaining < 0) {
      throw new InvalidValueException('Money', 'result cannot be negative');
    }
    return this.withCents(remaining);
  }

  multiply(factor: number): Money {
    if (factor < 0) {
      throw new InvalidValueException('Money', 'factor cannot be negative');
    }
    return this.withCents(Math.round(this.cents * factor));
  }

  /** `percent` of this amount, rounded to the cent */
  percentage(percent: number): Money {
    return this.multiply(percent / 100);
  }

  min(other: Money): Money {
    return this.compareTo(other) <= 0 ? this : other;
  }

  compareTo(other: Money): number {
    return Math.sign(this.cents - this.centsOf(other));
  }

  isGreaterThan(other: Money): boolean {
    return this.compareTo(other) > 0;
  }

  isZero(): boolean {
    return this.cents === 0;
  }

  isPositive(): boolean {
    return this.cents > 0;
  }

  equals(other: Money): boolean {
    return this.currency === other.currency && this.cents === other.cents;
  }

  format(): string {
    const symbol = SYMBOLS[this.currency] ?? `${this.currency} `;
    return `${symbol}${this.amount.toFixed(2)}`;
  }

  toString(): string {
    return this.format();
  }

  private withCents(cents: number): Money {
    return new Money(cents, this.currency);
  }

  private centsOf(other: Money): number {
    if (other.currency !== this.currency) {
      throw new InvalidValueException(
        'Money',
        `cannot operate on different currencies: ${this.currency} vs ${other.currency}`,
      );
    }
    return other.cents;
  }
}
