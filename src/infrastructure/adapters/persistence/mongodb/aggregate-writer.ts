import { Injectable } from '@nestjs/common';
import { ClientSession } from 'mongoose';
import { AggregateRoot } from '@domain/events';
import { AppLoggerService, DbOperation } from '@infrastructure/observability/logging/app-logger.service';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';
import { AuditTrailRecorder } from './audit-trail.recorder';
import { MongoSessionContext } from './mongo-session.context';

export interface AggregateWrite {
  collection: string;
  entityName: string;
  aggregate: AggregateRoot;
  document: object;
  /** Upserts the document and resolves with the stored one it replaced, if any */
  upsert: (session: ClientSession | null) => Promise<object | null>;
}

/**
 * Shared save path of the repositories: upsert in the active session,
 * append the audit entry, then hand the aggregate's events to the unit of work.
 * Resolves with the replaced document.
 */
@Injectable()
export class AggregateWriter {
  constructor(
    private readonly sessions: MongoSessionContext,
    private readonly auditTrail: AuditTrailRecorder,
    private readonly appLogger: AppLoggerService,
    private readonly metrics: MetricsService,
  ) {}

  async save(write: AggregateWrite): Promise<object | null> {
    const previous = await this.timed('save', write.collection, () =>
      write.upsert(this.sessions.session()),
    );

    const events = write.aggregate.pullDomainEvents();
    await this.auditTrail.record({
      entityName: write.entityName,
      entityId: write.aggregate.id.toString(),
      previous,
      current: write.document,
      events,
    });

    const scope = this.sessions.scope();
    if (scope) {
      scope.pendingEvents.push(...events);
    } else {
      this.appLogger.logDomainEvents(events);
    }
    return previous;
  }

  /**
   * Times a query for the database histogram and the debug log.
   */
  async timed<T>(operation: DbOperation, collection: string, query: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await query();
      this.observe(operation, collection, startedAt, true);
      return result;
    } catch (error) {
      this.observe(
        operation,
        collection,
        startedAt,
        false,
        error instanceof Error ? error.message : String(error),
      );
      throw error;
    }
  }

  private observe(
    operation: DbOperation,
    collection: string,
    startedAt: number,
    success: boolean,
    error?: string,
  ): void {
    const durationMs = Date.now() - startedAt;
    this.metrics.recordDBQuery(operation, collection, durationMs / 1000);
    this.appLogger.logDBOperation({ operation, collection, durationMs, success, error });
  }
}
