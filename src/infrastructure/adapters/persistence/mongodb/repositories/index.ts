export { MongoUserRepository } from './mongo-user.repository';
export { MongoCourseRepository } from './mongo-course.repository';
export { MongoAvailabilitySlotRepository } from './mongo-availability-slot.repository';
export { MongoBookingRepository } from './mongo-booking.repository';
export { MongoPaymentRepository } from './mongo-payment.repository';
export { MongoEnrollmentRepository } from './mongo-enrollment.repository';
export { MongoRatingRepository } from './mongo-rating.repository';
export { MongoNotificationRepository } from './mongo-notification.repository';
export { MongoPromoCodeRepository } from './mongo-promo-code.repository';
export { MongoAuditLogRepository } from './mongo-audit-log.repository';
