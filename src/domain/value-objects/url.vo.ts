import { InvalidValueException } from '../exceptions';

/**
 * Value Object for http(s) links such as thumbnails, videos and material files.
 * A missing scheme is treated as https.
 */
export class Url {
  private static readonly PATTERN =
    /^https?:\/\/(www\.)?[-a-zA-Z0-9@:%._+~#=]{1,256}\.[a-zA-Z0-9()]{1,6}\b([-a-zA-Z0-9()@:%_+.~#?&/=]*)$/i;

  private constructor(public readonly value: string) {
    this.validate();
  }

  static of(url: string): Url {
    const trimmed = (url ?? '').trim();
    if (trimmed && !/^https?:\/\//i.test(trimmed)) {
      return new Url(`https://${trimmed}`);
    }
    return new Url(trimmed);
  }

  // Returns null for empty input instead of throwing
  static ofNullable(url: string | null | undefined): Url | null {
    if (url === null || url === undefined || url.trim() === '') {
      return null;
    }
    return Url.of(url);
  }

  static isValid(url: string): boolean {
    try {
      Url.of(url);
      return true;
    } catch {
      return false;
    }
  }

  private validate(): void {
    if (!this.value) {
      throw new InvalidValueException('Url', 'URL cannot be empty');
    }
    if (!Url.PATTERN.test(this.value)) {
      throw new InvalidValueException('Url', 'must be a valid HTTP/HTTPS URL');
    }
  }

  get isSecure(): boolean {
    return this.value.toLowerCase().startsWith('https://');
  }

  get host(): string {
    return new URL(this.value).host;
  }

  equals(other: Url): boolean {
    return this.value.toLowerCase() === other.value.toLowerCase();
  }

  toString(): string {
    return this.value;
  }
}
