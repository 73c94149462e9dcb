import { randomBytes } from 'crypto';
import { AggregateRoot } from '../events';
import { BusinessRuleViolationException } from '../exceptions';
import { Email, EntityId, PhoneNumber, Url, UserRole } from '../value-objects';

export interface UserProps {
  name: string;
  email: Email;
  passwordHash: string;
  role: UserRole;
  isActive: boolean;
  emailConfirmed: boolean;
  emailConfirmationToken: string | null;
  emailConfirmationTokenExpiresAt: Date | null;
  passwordResetToken: string | null;
  passwordResetTokenExpiresAt: Date | null;
  timezone: string;
  phoneNumber: PhoneNumber | null;
  profilePictureUrl: Url | null;
  lastLoginAt: Date | null;
  failedLoginAttempts: number;
  lockedUntil: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Entity representing a platform account (student, instructor or admin).
 * Owns credentials, e-mail confirmation and lockout state.
 */
export class User extends AggregateRoot {
  private constructor(id: EntityId, private readonly props: UserProps) {
    super(id);
  }

  // Factory method: register a new account
  static create(params: {
    id?: EntityId;
    name: string;
    email: Email;
    passwordHash: string;
    role: UserRole;
    timezone?: string;
    phoneNumber?: PhoneNumber | null;
  }): User {
    User.ensureName(params.name);
    User.ensurePasswordHash(params.passwordHash);

    const now = new Date();
    const user = new User(params.id ?? EntityId.generate(), {
      name: params.name.trim(),
      email: params.email,
      passwordHash: params.passwordHash,
      role: params.role,
      isActive: true,
      emailConfirmed: false,
      emailConfirmationToken: null,
      emailConfirmationTokenExpiresAt: null,
      passwordResetToken: null,
      passwordResetTokenExpiresAt: null,
      timezone: params.timezone ?? 'UTC',
      phoneNumber: params.phoneNumber ?? null,
      profilePictureUrl: null,
      lastLoginAt: null,
      failedLoginAttempts: 0,
      lockedUntil: null,
      createdAt: now,
      updatedAt: now,
    });
    user.record('UserRegistered', { email: params.email.toString(), role: params.role });
    return user;
  }

  // Factory method: reconstitute from persistence
  static reconstitute(id: EntityId, props: UserProps): User {
    return new User(id, { ...props });
  }

  get name(): string {
    return this.props.name;
  }

  get email(): Email {
    return this.props.email;
  }

  get passwordHash(): string {
    return this.props.passwordHash;
  }

  get role(): UserRole {
    return this.props.role;
  }

  get isActive(): boolean {
    return this.props.isActive;
  }

  get emailConfirmed(): boolean {
    return this.props.emailConfirmed;
  }

  get emailConfirmationToken(): string | null {
    return this.props.emailConfirmationToken;
  }

  get emailConfirmationTokenExpiresAt(): Date | null {
    return this.props.emailConfirmationTokenExpiresAt;
  }

  get passwordResetToken(): string | null {
    return this.props.passwordResetToken;
  }

  get passwordResetTokenExpiresAt(): Date | null {
    return this.props.passwordResetTokenExpiresAt;
  }

  get timezone(): string {
    return this.props.timezone;
  }

  get phoneNumber(): PhoneNumber | null {
    return this.props.phoneNumber;
  }

  get profilePictureUrl(): Url | null {
    return this.props.profilePictureUrl;
  }

  get lastLoginAt(): Date | null {
    return this.props.lastLoginAt;
  }

  get failedLoginAttempts(): number {
    return this.props.failedLoginAttempts;
  }

  get lockedUntil(): Date | null {
    return this.props.lockedUntil;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  isInstructor(): boolean {
    return this.props.role === 'instructor';
  }

  isAdmin(): boolean {
    return this.props.role === 'admin';
  }

  isLocked(now: Date = new Date()): boolean {
    return this.props.lockedUntil !== null && this.props.lockedUntil.getTime() > now.getTime();
  }

  // Business logic: issue a new e-mail confirmation token
  generateEmailConfirmationToken(validForMs: number, now: Date = new Date()): string {
    const token = User.newToken();
    this.props.emailConfirmationToken = token;
    this.props.emailConfirmationTokenExpiresAt = new Date(now.getTime() + validForMs);
    this.touch();
    return token;
  }

  // Business logic: confirm the e-mail address with a previously issued token
  confirmEmail(token: string, now: Date = new Date()): void {
    if (!token || token.trim().length === 0) {
      throw new BusinessRuleViolationException('Token cannot be empty.');
    }
    if (this.props.emailConfirmed) {
      throw new BusinessRuleViolationException('Email is already confirmed.');
    }
    if (this.props.emailConfirmationToken !== token) {
      throw new BusinessRuleViolationException('Invalid confirmation token.');
    }
    const expiresAt = this.props.emailConfirmationTokenExpiresAt;
    if (expiresAt !== null && expiresAt.getTime() < now.getTime()) {
      throw new BusinessRuleViolationException('Confirmation token has expired.');
    }

    this.props.emailConfirmed = true;
    this.props.emailConfirmationToken = null;
    this.props.emailConfirmationTokenExpiresAt = null;
    this.touch();
    this.record('UserEmailConfirmed', { email: this.props.email.toString() });
  }

  // Business logic: replace the password hash
  changePassword(newPasswordHash: string): void {
    User.ensurePasswordHash(newPasswordHash);
    if (!this.props.isActive) {
      throw new BusinessRuleViolationException('Cannot change password for inactive user.');
    }

    this.props.passwordHash = newPasswordHash;
    this.props.passwordResetToken = null;
    this.props.passwordResetTokenExpiresAt = null;
    this.touch();
    this.record('UserPasswordChanged');
  }

  // Business logic: issue a password reset token
  generatePasswordResetToken(validForMs: number, now: Date = new Date()): string {
    const token = User.newToken();
    this.props.passwordResetToken = token;
    this.props.passwordResetTokenExpiresAt = new Date(now.getTime() + validForMs);
    this.touch();
    return token;
  }

  // Business logic: set a new password with a reset token
  resetPassword(token: string, newPasswordHash: string, now: Date = new Date()): void {
    if (!token || token.trim().length === 0) {
      throw new BusinessRuleViolationException('Token cannot be empty.');
    }
    if (this.props.passwordResetToken === null || this.props.passwordResetToken !== token) {
      throw new BusinessRuleViolationException('Invalid password reset token.');
    }
    const expiresAt = this.props.passwordResetTokenExpiresAt;
    if (expiresAt !== null && expiresAt.getTime() < now.getTime()) {
      throw new BusinessRuleViolationException('Password reset token has expired.');
    }

    this.changePassword(newPasswordHash);
    this.props.failedLoginAttempts = 0;
    this.props.lockedUntil = null;
    this.record('UserPasswordReset');
  }

  // Business logic: lock the account for a period
  lockAccount(durationMs: number, now: Date = new Date()): void {
    if (durationMs <= 0) {
      throw new BusinessRuleViolationException('Lock duration must be positive.');
    }
    if (this.isLocked(now)) {
      throw new BusinessRuleViolationException('User is already locked.');
    }

    this.props.lockedUntil = new Date(now.getTime() + durationMs);
    this.touch();
    this.record('UserLocked', { lockedUntil: this.props.lockedUntil.toISOString() });
  }

  unlock(): void {
    this.props.lockedUntil = null;
    this.props.failedLoginAttempts = 0;
    this.touch();
  }

  recordLoginSuccess(now: Date = new Date()): void {
    this.props.failedLoginAttempts = 0;
    this.props.lockedUntil = null;
    this.props.lastLoginAt = now;
    this.touch();
    this.record('UserLoggedIn');
  }

  /**
   * Counts a failed login and locks the account once the threshold is reached.
   *
   * @returns true when this failure locked the account
   */
  recordLoginFailure(maxAttempts: number, lockDurationMs: number, now: Date = new Date()): boolean {
    this.props.failedLoginAttempts += 1;
    this.touch();

    if (this.props.failedLoginAttempts >= maxAttempts && !this.isLocked(now)) {
      this.lockAccount(lockDurationMs, now);
      this.props.failedLoginAttempts = 0;
      return true;
    }
    return false;
  }

  updateName(name: string): void {
    User.ensureName(name);
    this.props.name = name.trim();
    this.touch();
  }

  updatePhoneNumber(phoneNumber: PhoneNumber | null): void {
    this.props.phoneNumber = phoneNumber;
    this.touch();
  }

  updateProfilePicture(url: Url | null): void {
    this.props.profilePictureUrl = url;
    this.touch();
  }

  updateTimezone(timezone: string): void {
    if (!timezone || timezone.trim().length === 0) {
      throw new BusinessRuleViolationException('Timezone is required.');
    }
    this.props.timezone = timezone.trim();
    this.touch();
  }

  activate(): void {
    if (this.props.isActive) {
      throw new BusinessRuleViolationException('User is already active.');
    }
    this.props.isActive = true;
    this.touch();
    this.record('UserActivated');
  }

  deactivate(): void {
    if (!this.props.isActive) {
      throw new BusinessRuleViolationException('User is already inactive.');
    }
    this.props.isActive = false;
    this.touch();
    this.record('UserDeactivated');
  }

  private static ensureName(name: string): void {
    if (!name || name.trim().length === 0) {
      throw new BusinessRuleViolationException('Name is required.');
    }
  }

  private static ensurePasswordHash(hash: string): void {
    if (!hash || hash.trim().length === 0) {
      throw new BusinessRuleViolationException('Password cannot be empty.');
    }
  }

  private static newToken(): string {
    return randomBytes(32).toString('hex');
  }

  private touch(): void {
    this.props.updatedAt = new Date();
  }
}
