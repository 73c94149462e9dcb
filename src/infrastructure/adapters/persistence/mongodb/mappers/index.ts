export { UserMapper } from './user.mapper';
export { CourseMapper } from './course.mapper';
export { AvailabilitySlotMapper } from './availability-slot.mapper';
export { BookingMapper } from './booking.mapper';
export { PaymentMapper } from './payment.mapper';
export { EnrollmentMapper } from './enrollment.mapper';
export { RatingMapper } from './rating.mapper';
export { NotificationMapper } from './notification.mapper';
export { PromoCodeMapper } from './promo-code.mapper';
export { AuditLogMapper } from './audit-log.mapper';
