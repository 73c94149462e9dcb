import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ConfigModule, EnvConfigService } from '@infrastructure/config';
import { ContextModule } from '@infrastructure/context';
import { SeedsModule } from '@infrastructure/database/seeds';
import { LoggerModule } from '@infrastructure/observability/logging/logger.module';
import { MetricsModule } from '@infrastructure/observability/metrics/metrics.module';
import { SecurityModule } from '@infrastructure/security';

/**
 * Module for CLI commands.
 *
 * Entry point for nest-commander: database seeding and index maintenance.
 */
@Module({
  imports: [
    ConfigModule,
    LoggerModule,
    MetricsModule,
    ContextModule,
    SecurityModule,
    MongooseModule.forRootAsync({
      useFactory: (envConfig: EnvConfigService) => ({
        uri: envConfig.mongoUri,
        serverSelectionTimeoutMS: 30000,
      }),
      inject: [EnvConfigService],
    }),
    SeedsModule,
  ],
})
export class CliModule {}
