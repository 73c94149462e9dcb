import { InvalidValueException } from '../exceptions';

export const USER_ROLES = ['admin', 'instructor', 'student'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const DIFFICULTY_LEVELS = ['beginner', 'intermediate', 'advanced', 'expert'] as const;
export type DifficultyLevel = (typeof DIFFICULTY_LEVELS)[number];

export const SORT_DIRECTIONS = ['asc', 'desc'] as const;
export type SortDirection = (typeof SORT_DIRECTIONS)[number];

export const NOTIFICATION_TYPES = [
  'booking_confirmation',
  'booking_reminder',
  'booking_cancellation',
  'booking_rescheduled',
  'payment_confirmation',
  'payment_failed',
  'course_published',
  'course_updated',
  'email_verification',
  'password_reset',
  'general_announcement',
] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export const AUDIT_ACTIONS = [
  'create',
  'update',
  'delete',
  'login',
  'logout',
  'email_confirmation',
  'password_reset',
  'booking_created',
  'booking_updated',
  'payment_processed',
] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export const PAYMENT_PROVIDERS = ['stripe', 'paypal', 'manual'] as const;
export type PaymentProvider = (typeof PAYMENT_PROVIDERS)[number];

export const DISCOUNT_TYPES = ['percentage', 'fixed_amount'] as const;
export type DiscountType = (typeof DISCOUNT_TYPES)[number];

/**
 * Narrows a raw string (from persistence or a request) to one of the allowed literals.
 *
 * @throws InvalidValueException when the value is not part of the set
 */
export function parseEnumeration<T extends string>(
  allowed: readonly T[],
  value: string,
  name: string,
): T {
  const normalized = value.toLowerCase().trim();
  const match = allowed.find((candidate) => candidate === normalized);
  if (match === undefined) {
    throw new InvalidValueException(
      name,
      `"${value}" is not valid. Valid values: ${allowed.join(', ')}`,
    );
  }
  return match;
}
