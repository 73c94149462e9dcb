export { User, UserProps } from './user.entity';
export { Course, CourseProps, CourseDetails } from './course.entity';
export {
  CourseMaterial,
  CourseMaterialProps,
  NewCourseMaterialProps,
} from './course-material.entity';
export { AvailabilitySlot, AvailabilitySlotProps } from './availability-slot.entity';
export { Booking, BookingProps } from './booking.entity';
export { Payment, PaymentProps } from './payment.entity';
export { Enrollment, EnrollmentProps } from './enrollment.entity';
export { Notification, NotificationProps } from './notification.entity';
export { PromoCode, PromoCodeProps } from './promo-code.entity';
export {
  Rating,
  RatingProps,
  CourseRating,
  CourseRatingProps,
  InstructorRating,
  InstructorRatingProps,
} from './rating.entity';
export { AuditLog, AuditLogProps } from './audit-log.entity';
