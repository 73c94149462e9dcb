import { InvalidValueException } from '../exceptions';

/**
 * ISO 4217 currency code (three upper-case letters).
 */
export class Currency {
  private static readonly PATTERN = /^[A-Z]{3}$/;

  private constructor(public readonly code: string) {
    this.validate();
  }

  static of(code: string): Currency {
    return new Currency((code ?? '').trim());
  }

  static usd(): Currency {
    return new Currency('USD');
  }

  private validate(): void {
    if (!this.code) {
      throw new InvalidValueException('Currency', 'code cannot be null or empty');
    }
    if (!Currency.PATTERN.test(this.code)) {
      throw new InvalidValueException(
        'Currency',
        'code must be a 3-letter ISO code (e.g., USD, EUR)',
      );
    }
  }

  equals(other: Currency): boolean {
    return this.code === other.code;
  }

  toString(): string {
    return this.code;
  }
}
