import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { EnvConfigService } from '@infrastructure/config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));

  // Enable CORS for frontend applications
  app.enableCors({
    origin: true,
    credentials: true,
  });

  // Global validation pipe for DTOs
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip unknown properties
      forbidNonWhitelisted: true, // Throw error for unknown properties
      transform: true, // Auto-transform payloads to DTO instances
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Swagger API documentation
  const config = new DocumentBuilder()
    .setTitle('Medical Education Marketplace API')
    .setDescription(
      `REST API for the medical-education marketplace.

This API allows you to:
- Publish courses and their materials
- Offer instructor availability slots and book them
- Take payments, apply promo codes and refund cancellations
- Track enrollments, progress and ratings`,
    )
    .setVersion('1.0')
    .addTag('Courses', 'Course catalogue and materials')
    .addTag('Users', 'Accounts and profiles')
    .addTag('Auth', 'Credentials and email-token flows')
    .addTag('Availability Slots', 'Instructor availability')
    .addTag('Bookings', 'Booking lifecycle')
    .addTag('Payments', 'Payments and refunds')
    .addTag('Enrollments', 'Course enrollments and progress')
    .addTag('Ratings', 'Course and instructor ratings')
    .addTag('Notifications', 'In-app notifications')
    .addTag('Promo Codes', 'Discount codes')
    .addTag('Audit Logs', 'Entity change history')
    .addTag('Health', 'Application health monitoring')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      docExpansion: 'list',
      filter: true,
      showRequestDuration: true,
    },
  });

  const port = app.get(EnvConfigService).port;
  await app.listen(port);

  console.log(`
╔═══════════════════════════════════════════════════════════════╗
║           Medical Education Marketplace API Started           ║
╠═══════════════════════════════════════════════════════════════╣
║  Server:     http://localhost:${port}                         ║
║  Swagger:    http://localhost:${port}/api/docs                ║
║  Health:     http://localhost:${port}/api/v1/health           ║
║  Metrics:    http://localhost:${port}/metrics                 ║
╚═══════════════════════════════════════════════════════════════╝
  `);
}

void bootstrap();
