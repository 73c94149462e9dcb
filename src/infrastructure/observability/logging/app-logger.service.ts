// src/infrastructure/observability/logging/app-logger.service.ts
import { Injectable } from '@nestjs/common';
import { PinoLogger, InjectPinoLogger } from 'nestjs-pino';
import { DomainEvent } from '@domain/events';

export type DbOperation = 'find' | 'save' | 'update' | 'delete' | 'sync';

/**
 * Structured log lines for infrastructure concerns that are not HTTP requests.
 */
@Injectable()
export class AppLoggerService {
  constructor(
    @InjectPinoLogger(AppLoggerService.name)
    private readonly logger: PinoLogger,
  ) {}

  logDBOperation(context: {
    operation: DbOperation;
    collection: string;
    durationMs: number;
    success: boolean;
    error?: string;
  }): void {
    const logData = {
      component: 'database',
      ...context,
    };

    if (context.success) {
      this.logger.debug(logData, `DB ${context.operation} on ${context.collection}`);
    } else {
      this.logger.error(logData, `DB ${context.operation} failed on ${context.collection}`);
    }
  }

  /**
   * Domain events are published as log lines once their aggregate is persisted.
   */
  logDomainEvents(events: readonly DomainEvent[]): void {
    for (const event of events) {
      this.logger.info(
        {
          component: 'domain',
          event: event.name,
          aggregateType: event.aggregateType,
          aggregateId: event.aggregateId,
          occurredAt: event.occurredAt.toISOString(),
          payload: event.payload,
        },
        `${event.aggregateType} ${event.aggregateId}: ${event.name}`,
      );
    }
  }

  logAuditEntry(context: {
    entityName: string;
    entityId: string;
    action: string;
    userId: string | null;
  }): void {
    this.logger.debug(
      { component: 'audit', ...context },
      `Audit ${context.action} on ${context.entityName} ${context.entityId}`,
    );
  }

  logAuthAttempt(context: { email: string; success: boolean; reason?: string }): void {
    const logData = { component: 'auth', ...context };

    if (context.success) {
      this.logger.info(logData, `Login succeeded for ${context.email}`);
    } else {
      this.logger.warn(logData, `Login rejected for ${context.email}`);
    }
  }

  logSeed(context: { collection: string; inserted: number; skipped: number }): void {
    this.logger.info(
      { component: 'seed', ...context },
      `Seeded ${context.collection}: ${context.inserted} inserted, ${context.skipped} skipped`,
    );
  }
}
