export {
  ICacheServicePort,
  CacheEntryOptions,
  CacheItemPriority,
  extractCachePrefix,
} from './cache-service.port';
export { IUnitOfWorkPort } from './unit-of-work.port';
export { IRequestMetricsPort, RequestOutcome } from './request-metrics.port';
export { IPasswordHasherPort } from './password-hasher.port';
export { IUserRepositoryPort, UserSearchCriteria } from './user-repository.port';
export {
  ICourseRepositoryPort,
  CourseSearchCriteria,
  CourseSortField,
  COURSE_SORT_FIELDS,
  DateRange,
} from './course-repository.port';
export { IAvailabilitySlotRepositoryPort } from './availability-slot-repository.port';
export { IBookingRepositoryPort } from './booking-repository.port';
export { IPaymentRepositoryPort } from './payment-repository.port';
export { IEnrollmentRepositoryPort } from './enrollment-repository.port';
export { IRatingRepositoryPort } from './rating-repository.port';
export { INotificationRepositoryPort } from './notification-repository.port';
export { IPromoCodeRepositoryPort } from './promo-code-repository.port';
export { IAuditLogRepositoryPort } from './audit-log-repository.port';
