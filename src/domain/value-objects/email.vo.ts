import { InvalidValueException } from '../exceptions';

/**
 * Value Object for e-mail addresses. Stored lower-cased.
 */
export class Email {
  private static readonly PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

  private constructor(public readonly value: string) {
    this.validate();
  }

  static of(email: string): Email {
    return new Email((email ?? '').trim().toLowerCase());
  }

  private validate(): void {
    if (!this.value) {
      throw new InvalidValueException('Email', 'email cannot be empty');
    }
    if (!Email.PATTERN.test(this.value)) {
      throw new InvalidValueException('Email', 'invalid email format');
    }
  }

  get domain(): string {
    return this.value.slice(this.value.indexOf('@') + 1);
  }

  equals(other: Email): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
