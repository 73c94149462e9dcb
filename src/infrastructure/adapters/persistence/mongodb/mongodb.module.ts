import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { EnvConfigService } from '@infrastructure/config';
import {
  AuditLogDocument,
  AuditLogSchema,
  AvailabilitySlotDocument,
  AvailabilitySlotSchema,
  BookingDocument,
  BookingSchema,
  CourseDocument,
  CourseRatingDocument,
  CourseRatingSchema,
  CourseSchema,
  EnrollmentDocument,
  EnrollmentSchema,
  InstructorRatingDocument,
  InstructorRatingSchema,
  NotificationDocument,
  NotificationSchema,
  PaymentDocument,
  PaymentSchema,
  PromoCodeDocument,
  PromoCodeSchema,
  UserDocument,
  UserSchema,
} from './schemas';
import {
  MongoAuditLogRepository,
  MongoAvailabilitySlotRepository,
  MongoBookingRepository,
  MongoCourseRepository,
  MongoEnrollmentRepository,
  MongoNotificationRepository,
  MongoPaymentRepository,
  MongoPromoCodeRepository,
  MongoRatingRepository,
  MongoUserRepository,
} from './repositories';
import { MongoSessionContext } from './mongo-session.context';
import { MongoUnitOfWork, UNIT_OF_WORK_OPTIONS, UnitOfWorkOptions } from './mongo-unit-of-work';
import { AggregateWriter } from './aggregate-writer';
import { AuditTrailRecorder } from './audit-trail.recorder';

const REPOSITORY_TOKENS = [
  'IUserRepository',
  'ICourseRepository',
  'IAvailabilitySlotRepository',
  'IBookingRepository',
  'IPaymentRepository',
  'IEnrollmentRepository',
  'IRatingRepository',
  'INotificationRepository',
  'IPromoCodeRepository',
  'IAuditLogRepository',
];

/**
 * Module that configures the MongoDB persistence layer.
 *
 * Registers every schema and exposes the repositories and the unit of work
 * under their port tokens.
 *
 * @example
 * ```typescript
 * constructor(
 *   @Inject('IBookingRepository')
 *   private readonly bookings: IBookingRepositoryPort,
 * ) {}
 * ```
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: UserDocument.name, schema: UserSchema },
      { name: CourseDocument.name, schema: CourseSchema },
      { name: AvailabilitySlotDocument.name, schema: AvailabilitySlotSchema },
      { name: BookingDocument.name, schema: BookingSchema },
      { name: PaymentDocument.name, schema: PaymentSchema },
      { name: EnrollmentDocument.name, schema: EnrollmentSchema },
      { name: CourseRatingDocument.name, schema: CourseRatingSchema },
      { name: InstructorRatingDocument.name, schema: InstructorRatingSchema },
      { name: NotificationDocument.name, schema: NotificationSchema },
      { name: PromoCodeDocument.name, schema: PromoCodeSchema },
      { name: AuditLogDocument.name, schema: AuditLogSchema },
    ]),
  ],
  providers: [
    MongoSessionContext,
    AuditTrailRecorder,
    AggregateWriter,
    {
      provide: UNIT_OF_WORK_OPTIONS,
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService): UnitOfWorkOptions => ({
        useTransactions: config.mongoTransactions,
      }),
    },
    { provide: 'IUnitOfWork', useClass: MongoUnitOfWork },
    { provide: 'IUserRepository', useClass: MongoUserRepository },
    { provide: 'ICourseRepository', useClass: MongoCourseRepository },
    { provide: 'IAvailabilitySlotRepository', useClass: MongoAvailabilitySlotRepository },
    { provide: 'IBookingRepository', useClass: MongoBookingRepository },
    { provide: 'IPaymentRepository', useClass: MongoPaymentRepository },
    { provide: 'IEnrollmentRepository', useClass: MongoEnrollmentRepository },
    { provide: 'IRatingRepository', useClass: MongoRatingRepository },
    { provide: 'INotificationRepository', useClass: MongoNotificationRepository },
    { provide: 'IPromoCodeRepository', useClass: MongoPromoCodeRepository },
    { provide: 'IAuditLogRepository', useClass: MongoAuditLogRepository },
  ],
  exports: [MongooseModule, 'IUnitOfWork', ...REPOSITORY_TOKENS],
})
export class MongoDBModule {}
