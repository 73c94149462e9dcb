import { Email } from '../email.vo';
import { PhoneNumber } from '../phone-number.vo';
import { Currency } from '../currency.vo';

describe('Email', () => {
  it('should normalize to lower case', () => {
    expect(Email.of('  Jane.Doe@Example.COM ').value).toBe('jane.doe@example.com');
  });

  it('should expose the domain part', () => {
    expect(Email.of('jane@hospital.org').domain).toBe('hospital.org');
  });

  it('should reject empty and malformed addresses', () => {
    expect(() => Email.of('')).toThrow('Invalid Email: email cannot be empty');
    expect(() => Email.of('jane@')).toThrow('Invalid Email: invalid email format');
  });
});

describe('PhoneNumber', () => {
  it('should strip formatting and prefix with +', () => {
    expect(PhoneNumber.of('+1 (555) 010-2030').value).toBe('+15550102030');
    expect(PhoneNumber.of('44 20 7946 0000').value).toBe('+442079460000');
  });

  it('should reject numbers that are not E.164', () => {
    expect(() => PhoneNumber.of('0123')).toThrow('Invalid PhoneNumber: must be in E.164 format');
    expect(() => PhoneNumber.of('abc')).toThrow('Invalid PhoneNumber: phone number cannot be empty');
  });
});

describe('Currency', () => {
  it('should accept three upper-case letters', () => {
    expect(Currency.of('EUR').code).toBe('EUR');
  });

  it('should reject empty or malformed codes', () => {
    expect(() => Currency.of('')).toThrow('Invalid Currency: code cannot be null or empty');
    expect(() => Currency.of('EU')).toThrow(
      'Invalid Currency: code must be a 3-letter ISO code (e.g., USD, EUR)',
    );
  });
});
