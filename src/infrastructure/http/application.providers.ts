import { Provider } from '@nestjs/common';
import {
  CACHE_INVALIDATION_OPTIONS,
  CacheInvalidationBehavior,
  CachingBehavior,
  LoggingBehavior,
  PERFORMANCE_THRESHOLDS,
  PIPELINE_BEHAVIORS,
  PerformanceMetricsBehavior,
  PipelineBehavior,
  RequestPipeline,
  TransactionBehavior,
  ValidationBehavior,
} from '@application/pipeline';
import { NotificationWriter } from '@application/services';
import {
  AUTH_OPTIONS,
  AuthenticateUserHandler,
  BookingOutcomeHandler,
  CancelBookingHandler,
  ChangeAvailabilitySlotHandler,
  ChangeCourseStateHandler,
  ChangeEnrollmentStatusHandler,
  ChangePasswordHandler,
  ChangeUserStatusHandler,
  CompleteCourseMaterialHandler,
  ConfirmBookingHandler,
  ConfirmEmailHandler,
  CreateAvailabilitySlotHandler,
  CreateBookingHandler,
  CreateCourseHandler,
  CreatePaymentHandler,
  CreatePromoCodeHandler,
  CreateUserHandler,
  EnrollStudentHandler,
  GetAllCoursesHandler,
  GetAuditLogsHandler,
  GetAvailabilitySlotByIdHandler,
  GetAvailabilitySlotsByInstructorHandler,
  GetAvailableSlotsHandler,
  GetBookingByIdHandler,
  GetBookingsByInstructorHandler,
  GetBookingsByStatusHandler,
  GetBookingsByUserHandler,
  GetCourseByIdHandler,
  GetCourseRatingsHandler,
  GetCoursesByInstructorHandler,
  GetEnrollmentsByCourseHandler,
  GetEnrollmentsByUserHandler,
  GetInstructorRatingsHandler,
  GetNotificationsByUserHandler,
  GetPaymentByIdHandler,
  GetPaymentsByUserHandler,
  GetPromoCodesHandler,
  GetUserByIdHandler,
  GetUsersHandler,
  MarkNotificationReadHandler,
  MarkPaymentFailedHandler,
  MarkPaymentSucceededHandler,
  RateCourseHandler,
  RateInstructorHandler,
  RefundPaymentHandler,
  ReorderCourseMaterialsHandler,
  RequestPasswordResetHandler,
  RescheduleBookingHandler,
  ResetPasswordHandler,
  UpdateAvailabilitySlotHandler,
  UpdateBookingNotesHandler,
  UpdateCourseHandler,
  UpdateEnrollmentProgressHandler,
  UpdatePromoCodeHandler,
  UpdateUserProfileHandler,
  ValidatePromoCodeHandler,
} from '@application/use-cases';
import { EnvConfigService } from '@infrastructure/config/env-config.service';

const BEHAVIOR_CLASSES = [
  ValidationBehavior,
  CachingBehavior,
  PerformanceMetricsBehavior,
  TransactionBehavior,
  CacheInvalidationBehavior,
  LoggingBehavior,
];

export const HANDLERS = [
  CreateCourseHandler,
  UpdateCourseHandler,
  ChangeCourseStateHandler,
  ReorderCourseMaterialsHandler,
  GetAllCoursesHandler,
  GetCourseByIdHandler,
  GetCoursesByInstructorHandler,
  CreateUserHandler,
  ConfirmEmailHandler,
  ChangePasswordHandler,
  RequestPasswordResetHandler,
  ResetPasswordHandler,
  AuthenticateUserHandler,
  UpdateUserProfileHandler,
  ChangeUserStatusHandler,
  GetUserByIdHandler,
  GetUsersHandler,
  CreateAvailabilitySlotHandler,
  UpdateAvailabilitySlotHandler,
  ChangeAvailabilitySlotHandler,
  GetAvailabilitySlotByIdHandler,
  GetAvailabilitySlotsByInstructorHandler,
  GetAvailableSlotsHandler,
  CreateBookingHandler,
  ConfirmBookingHandler,
  CancelBookingHandler,
  BookingOutcomeHandler,
  RescheduleBookingHandler,
  UpdateBookingNotesHandler,
  GetBookingByIdHandler,
  GetBookingsByStatusHandler,
  GetBookingsByUserHandler,
  GetBookingsByInstructorHandler,
  CreatePaymentHandler,
  MarkPaymentSucceededHandler,
  MarkPaymentFailedHandler,
  RefundPaymentHandler,
  GetPaymentByIdHandler,
  GetPaymentsByUserHandler,
  EnrollStudentHandler,
  UpdateEnrollmentProgressHandler,
  CompleteCourseMaterialHandler,
  ChangeEnrollmentStatusHandler,
  GetEnrollmentsByUserHandler,
  GetEnrollmentsByCourseHandler,
  RateCourseHandler,
  RateInstructorHandler,
  GetCourseRatingsHandler,
  GetInstructorRatingsHandler,
  GetNotificationsByUserHandler,
  MarkNotificationReadHandler,
  CreatePromoCodeHandler,
  UpdatePromoCodeHandler,
  ValidatePromoCodeHandler,
  GetPromoCodesHandler,
  GetAuditLogsHandler,
];

/**
 * Request pipeline, its settings and every use-case handler.
 * Behaviors run in list order, the first one outermost.
 */
export const APPLICATION_PROVIDERS: Provider[] = [
  ...BEHAVIOR_CLASSES,
  {
    provide: PIPELINE_BEHAVIORS,
    useFactory: (...behaviors: PipelineBehavior[]) => behaviors,
    inject: BEHAVIOR_CLASSES,
  },
  {
    provide: PERFORMANCE_THRESHOLDS,
    useFactory: (envConfig: EnvConfigService) => envConfig.performanceThresholds,
    inject: [EnvConfigService],
  },
  {
    provide: CACHE_INVALIDATION_OPTIONS,
    useFactory: (envConfig: EnvConfigService) => envConfig.cacheInvalidation,
    inject: [EnvConfigService],
  },
  {
    provide: AUTH_OPTIONS,
    useFactory: (envConfig: EnvConfigService) => envConfig.auth,
    inject: [EnvConfigService],
  },
  RequestPipeline,
  NotificationWriter,
  ...HANDLERS,
];
