export { AuditLogsController } from './audit-logs.controller';
export { AuthController } from './auth.controller';
export { AvailabilitySlotsController } from './availability-slots.controller';
export { BookingsController } from './bookings.controller';
export { CoursesController } from './courses.controller';
export { EnrollmentsController } from './enrollments.controller';
export { HealthController } from './health.controller';
export { NotificationsController } from './notifications.controller';
export { PaymentsController } from './payments.controller';
export { PromoCodesController } from './promo-codes.controller';
export { RatingsController } from './ratings.controller';
export { UsersController } from './users.controller';
