import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { MongooseModule } from '@nestjs/mongoose';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { ConfigModule, EnvConfigService } from '@infrastructure/config';
import { CacheModule } from '@infrastructure/cache';
import { ContextModule, RequestContextMiddleware } from '@infrastructure/context';
import { HttpModule } from '@infrastructure/http';
import { LoggerModule } from '@infrastructure/observability/logging/logger.module';
import { MetricsInterceptor } from '@infrastructure/observability/metrics/metrics.interceptor';
import { MetricsModule } from '@infrastructure/observability/metrics/metrics.module';
import { SecurityModule } from '@infrastructure/security';

@Module({
  imports: [
    // Validated environment, available everywhere
    ConfigModule,
    LoggerModule,
    MetricsModule,
    ContextModule,
    CacheModule,
    SecurityModule,

    // Connect to MongoDB using environment variable
    MongooseModule.forRootAsync({
      useFactory: (envConfig: EnvConfigService) => ({
        uri: envConfig.mongoUri,
      }),
      inject: [EnvConfigService],
    }),

    ThrottlerModule.forRootAsync({
      useFactory: (envConfig: EnvConfigService) => [
        { ttl: envConfig.throttleTtlMs, limit: envConfig.throttleLimit },
      ],
      inject: [EnvConfigService],
    }),

    HttpModule,
  ],
  providers: [
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    { provide: APP_INTERCEPTOR, useExisting: MetricsInterceptor },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestContextMiddleware).forRoutes('*');
  }
}
