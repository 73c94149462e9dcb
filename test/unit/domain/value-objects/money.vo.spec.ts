import { Money } from '@domain/value-objects';
import { InvalidValueException } from '@domain/exceptions';

describe('Money', () => {
  it('should keep course prices in whole cents', () => {
    const price = Money.of(49.99, 'EUR');

    expect(price.cents).toBe(4999);
    expect(price.amount).toBe(49.99);
    expect(price.currency).toBe('EUR');
  });

  it('should default to USD', () => {
    expect(Money.fromCents(1250).currency).toBe('USD');
    expect(Money.zero().isZero()).toBe(true);
    expect(Money.zero().isPositive()).toBe(false);
  });

  it('should reject negative amounts and malformed currencies', () => {
    expect(() => Money.fromCents(-1)).toThrow(InvalidValueException);
    expect(() => Money.of(10, 'usd')).toThrow(
      'Invalid Currency: code must be a 3-letter ISO code (e.g., USD, EUR)',
    );
  });

  describe('arithmetic', () => {
    it('should add and subtract within one currency', () => {
      const fee = Money.of(120);

      expect(fee.add(Money.of(30)).cents).toBe(15000);
      expect(fee.subtract(Money.of(20)).cents).toBe(10000);
      expect(fee.cents).toBe(12000);
    });

    it('should refuse a subtraction that goes below zero', () => {
      expect(() => Money.of(20).subtract(Money.of(25))).toThrow(
        'Invalid Money: result cannot be negative',
      );
    });

    it('should refuse to mix currencies', () => {
      expect(() => Money.of(10, 'USD').add(Money.of(10, 'GBP'))).toThrow(
        'Invalid Money: cannot operate on different currencies: USD vs GBP',
      );
    });

    it('should round multiplications to the cent', () => {
      expect(Money.fromCents(999).multiply(0.5).cents).toBe(500);
      expect(() => Money.of(5).multiply(-2)).toThrow('Invalid Money: factor cannot be negative');
    });

    it('should take a percentage', () => {
      expect(Money.of(80).percentage(15).cents).toBe(1200);
    });
  });

  describe('comparison', () => {
    it('should order amounts', () => {
      const low = Money.of(30);
      const high = Money.of(50);

      expect(high.isGreaterThan(low)).toBe(true);
      expect(low.compareTo(high)).toBe(-1);
      expect(high.min(low)).toBe(low);
    });

    it('should compare by value and currency', () => {
      expect(Money.of(5).equals(Money.fromCents(500))).toBe(true);
      expect(Money.of(5, 'USD').equals(Money.of(5, 'EUR'))).toBe(false);
    });
  });

  it('should format with the currency symbol when one is known', () => {
    expect(Money.of(89).format()).toBe('$89.00');
    expect(Money.fromCents(550, 'EUR').format()).toBe('€5.50');
    expect(Money.fromCents(12000, 'CHF').toString()).toBe('CHF 120.00');
  });
});
