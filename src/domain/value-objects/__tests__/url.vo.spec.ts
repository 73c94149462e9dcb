import { Url } from '../url.vo';
import { InvalidValueException } from '../../exceptions';

describe('Url', () => {
  it('should keep a valid https url as is', () => {
    const url = Url.of('https://cdn.example.com/videos/intro.mp4');

    expect(url.value).toBe('https://cdn.example.com/videos/intro.mp4');
    expect(url.isSecure).toBe(true);
    expect(url.host).toBe('cdn.example.com');
  });

  it('should prepend https when the scheme is missing', () => {
    const url = Url.of('  example.com/thumb.png ');

    expect(url.value).toBe('https://example.com/thumb.png');
  });

  it('should accept http urls and report them as not secure', () => {
    const url = Url.of('http://example.org');

    expect(url.isSecure).toBe(false);
  });

  it('should reject malformed urls', () => {
    expect(() => Url.of('not a url')).toThrow(InvalidValueException);
    expect(() => Url.of('not a url')).toThrow('Invalid Url: must be a valid HTTP/HTTPS URL');
  });

  it('should reject empty input', () => {
    expect(() => Url.of('   ')).toThrow('Invalid Url: URL cannot be empty');
  });

  it('should return null from ofNullable for blank values', () => {
    expect(Url.ofNullable(undefined)).toBeNull();
    expect(Url.ofNullable('')).toBeNull();
    expect(Url.ofNullable('example.com')?.value).toBe('https://example.com');
  });

  it('should validate without throwing through isValid', () => {
    expect(Url.isValid('https://example.com')).toBe(true);
    expect(Url.isValid('ftp://example.com')).toBe(false);
  });

  it('should compare case-insensitively', () => {
    expect(Url.of('https://Example.com').equals(Url.of('https://example.com'))).toBe(true);
  });
});
