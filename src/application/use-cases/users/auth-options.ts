export interface AuthOptions {
  maxFailedLogins: number;
  lockoutMinutes: number;
  emailTokenTtlHours: number;
  passwordResetTtlMinutes: number;
}

export const AUTH_OPTIONS = 'AUTH_OPTIONS';

export const DEFAULT_AUTH_OPTIONS: AuthOptions = {
  maxFailedLogins: 5,
  lockoutMinutes: 15,
  emailTokenTtlHours: 24,
  passwordResetTtlMinutes: 60,
};
