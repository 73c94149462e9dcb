import { Module } from '@nestjs/common';
import { MongoDBModule } from '@infrastructure/adapters/persistence/mongodb';
import { APPLICATION_PROVIDERS } from './application.providers';
import {
  AuditLogsController,
  AuthController,
  AvailabilitySlotsController,
  BookingsController,
  CoursesController,
  EnrollmentsController,
  HealthController,
  NotificationsController,
  PaymentsController,
  PromoCodesController,
  RatingsController,
  UsersController,
} from './controllers';

/**
 * HTTP Module that configures all REST API endpoints.
 *
 * Controllers hand their requests to the RequestPipeline together with the
 * use-case handler; repositories come from MongoDBModule.
 */
@Module({
  imports: [MongoDBModule],
  controllers: [
    CoursesController,
    UsersController,
    AuthController,
    AvailabilitySlotsController,
    BookingsController,
    PaymentsController,
    EnrollmentsController,
    RatingsController,
    NotificationsController,
    PromoCodesController,
    AuditLogsController,
    HealthController,
  ],
  providers: APPLICATION_PROVIDERS,
})
export class HttpModule {}
