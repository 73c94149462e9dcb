export { UserDocument, UserDocumentType, UserSchema } from './user.schema';

export {
  CourseDocument,
  CourseDocumentType,
  CourseSchema,
  CourseMaterialDocument,
  CourseMaterialSchema,
} from './course.schema';

export {
  AvailabilitySlotDocument,
  AvailabilitySlotDocumentType,
  AvailabilitySlotSchema,
} from './availability-slot.schema';

export { BookingDocument, BookingDocumentType, BookingSchema } from './booking.schema';

export { PaymentDocument, PaymentDocumentType, PaymentSchema } from './payment.schema';

export { EnrollmentDocument, EnrollmentDocumentType, EnrollmentSchema } from './enrollment.schema';

export {
  CourseRatingDocument,
  CourseRatingDocumentType,
  CourseRatingSchema,
  InstructorRatingDocument,
  InstructorRatingDocumentType,
  InstructorRatingSchema,
} from './rating.schema';

export {
  NotificationDocument,
  NotificationDocumentType,
  NotificationSchema,
} from './notification.schema';

export { PromoCodeDocument, PromoCodeDocumentType, PromoCodeSchema } from './promo-code.schema';

export { AuditLogDocument, AuditLogDocumentType, AuditLogSchema } from './audit-log.schema';
