export { EntityId } from './entity-id.vo';
export { Currency } from './currency.vo';
export { Money } from './money.vo';
export { Email } from './email.vo';
export { Url } from './url.vo';
export { PhoneNumber } from './phone-number.vo';
export { BookingStatus, BookingStatusValue } from './booking-status.vo';
export { PaymentStatus, PaymentStatusValue } from './payment-status.vo';
export {
  USER_ROLES,
  UserRole,
  DIFFICULTY_LEVELS,
  DifficultyLevel,
  SORT_DIRECTIONS,
  SortDirection,
  NOTIFICATION_TYPES,
  NotificationType,
  AUDIT_ACTIONS,
  AuditAction,
  PAYMENT_PROVIDERS,
  PaymentProvider,
  DISCOUNT_TYPES,
  DiscountType,
  parseEnumeration,
} from './enumerations';
