import { User } from '@domain/entities';
import { Email } from '@domain/value-objects';

describe('User', () => {
  const HOUR = 60 * 60 * 1000;

  const createTestUser = (): User =>
    User.create({
      name: 'Ada Student',
      email: Email.of('ada@example.com'),
      passwordHash: 'hashed-password',
      role: 'student',
    });

  it('should create an active, unconfirmed user', () => {
    const user = createTestUser();

    expect(user.isActive).toBe(true);
    expect(user.emailConfirmed).toBe(false);
    expect(user.timezone).toBe('UTC');
    expect(user.failedLoginAttempts).toBe(0);
  });

  it('should require a name', () => {
    expect(() =>
      User.create({
        name: ' ',
        email: Email.of('ada@example.com'),
        passwordHash: 'hash',
        role: 'student',
      }),
    ).toThrow('Name is required.');
  });

  describe('confirmEmail', () => {
    it('should confirm with the issued token', () => {
      const user = createTestUser();
      const now = new Date('2025-01-01T00:00:00Z');
      const token = user.generateEmailConfirmationToken(24 * HOUR, now);

      user.confirmEmail(token, new Date('2025-01-01T12:00:00Z'));

      expect(user.emailConfirmed).toBe(true);
      expect(user.emailConfirmationToken).toBeNull();
    });

    it('should reject empty, wrong and expired tokens', () => {
      const user = createTestUser();
      const now = new Date('2025-01-01T00:00:00Z');
      const token = user.generateEmailConfirmationToken(HOUR, now);

      expect(() => user.confirmEmail('')).toThrow('Token cannot be empty.');
      expect(() => user.confirmEmail('other', now)).toThrow('Invalid confirmation token.');
      expect(() => user.confirmEmail(token, new Date('2025-01-01T02:00:00Z'))).toThrow(
        'Confirmation token has expired.',
      );
    });

    it('should reject a second confirmation', () => {
      const user = createTestUser();
      const token = user.generateEmailConfirmationToken(HOUR);
      user.confirmEmail(token);

      expect(() => user.confirmEmail(token)).toThrow('Email is already confirmed.');
    });
  });

  describe('passwords', () => {
    it('should not change the password of an inactive user', () => {
      const user = createTestUser();
      user.deactivate();

      expect(() => user.changePassword('new-hash')).toThrow(
        'Cannot change password for inactive user.',
      );
    });

    it('should reset the password with a valid token and unlock the account', () => {
      const user = createTestUser();
      const now = new Date('2025-01-01T00:00:00Z');
      user.lockAccount(HOUR, now);
      const token = user.generatePasswordResetToken(HOUR, now);

      user.resetPassword(token, 'new-hash', new Date('2025-01-01T00:30:00Z'));

      expect(user.passwordHash).toBe('new-hash');
      expect(user.passwordResetToken).toBeNull();
      expect(user.lockedUntil).toBeNull();
    });

    it('should reject an expired reset token', () => {
      const user = createTestUser();
      const now = new Date('2025-01-01T00:00:00Z');
      const token = user.generatePasswordResetToken(HOUR, now);

      expect(() =>
        user.resetPassword(token, 'new-hash', new Date('2025-01-01T03:00:00Z')),
      ).toThrow('Password reset token has expired.');
      expect(() => user.resetPassword('wrong', 'new-hash', now)).toThrow(
        'Invalid password reset token.',
      );
    });
  });

  describe('lockout', () => {
    it('should lock the account after the maximum number of failures', () => {
      const user = createTestUser();
      const now = new Date('2025-01-01T00:00:00Z');

      expect(user.recordLoginFailure(3, HOUR, now)).toBe(false);
      expect(user.recordLoginFailure(3, HOUR, now)).toBe(false);
      expect(user.recordLoginFailure(3, HOUR, now)).toBe(true);

      expect(user.isLocked(now)).toBe(true);
      expect(user.lockedUntil).toEqual(new Date('2025-01-01T01:00:00Z'));
      expect(user.isLocked(new Date('2025-01-01T01:00:01Z'))).toBe(false);
    });

    it('should reset failures after a successful login', () => {
      const user = createTestUser();
      user.recordLoginFailure(5, HOUR);

      user.recordLoginSuccess(new Date('2025-01-02T00:00:00Z'));

      expect(user.failedLoginAttempts).toBe(0);
      expect(user.lastLoginAt).toEqual(new Date('2025-01-02T00:00:00Z'));
    });

    it('should validate lock duration and double locking', () => {
      const user = createTestUser();
      const now = new Date('2025-01-01T00:00:00Z');

      expect(() => user.lockAccount(0, now)).toThrow('Lock duration must be positive.');
      user.lockAccount(HOUR, now);
      expect(() => user.lockAccount(HOUR, now)).toThrow('User is already locked.');
    });
  });
});
