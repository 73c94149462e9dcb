import { InvalidValueException } from '../exceptions';

/**
 * Phone number in E.164 format (+ followed by up to 15 digits).
 */
export class PhoneNumber {
  private static readonly E164 = /^\+[1-9]\d{1,14}$/;

  private constructor(public readonly value: string) {
    this.validate();
  }

  static of(phone: string): PhoneNumber {
    const digits = (phone ?? '').replace(/\D/g, '');
    return new PhoneNumber(digits ? `+${digits}` : '');
  }

  private validate(): void {
    if (!this.value) {
      throw new InvalidValueException('PhoneNumber', 'phone number cannot be empty');
    }
    if (!PhoneNumber.E164.test(this.value)) {
      throw new InvalidValueException('PhoneNumber', 'must be in E.164 format');
    }
  }

  equals(other: PhoneNumber): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
