import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import { IUnitOfWorkPort } from '@application/ports';
import { AppLoggerService } from '@infrastructure/observability/logging/app-logger.service';
import { MongoSessionContext, SessionScope } from './mongo-session.context';

export interface UnitOfWorkOptions {
  /** Standalone servers (no replica set) cannot run transactions */
  useTransactions: boolean;
}

export const UNIT_OF_WORK_OPTIONS = 'UNIT_OF_WORK_OPTIONS';

/**
 * Runs work inside `connection.transaction()`, which retries the whole
 * callback on transient transaction errors. Nested calls join the outer unit.
 * Domain events recorded during the work are logged once it commits.
 */
@Injectable()
export class MongoUnitOfWork implements IUnitOfWorkPort {
  private readonly logger = new Logger(MongoUnitOfWork.name);

  constructor(
    @InjectConnection()
    private readonly connection: Connection,
    private readonly sessions: MongoSessionContext,
    private readonly appLogger: AppLoggerService,
    @Inject(UNIT_OF_WORK_OPTIONS)
    private readonly options: UnitOfWorkOptions,
  ) {}

  async execute<T>(work: () => Promise<T>): Promise<T> {
    if (this.sessions.scope()) {
      return work();
    }

    if (!this.options.useTransactions) {
      const scope: SessionScope = { session: null, pendingEvents: [] };
      const result = await this.sessions.run(scope, work);
      this.appLogger.logDomainEvents(scope.pendingEvents);
      return result;
    }

    // One scope per attempt; only the committed attempt's events are published
    const attempts: SessionScope[] = [];
    const result = await this.connection.transaction(async (session) => {
      if (attempts.length > 0) {
        this.logger.warn(`Retrying transaction (attempt ${attempts.length + 1})`);
      }
      const scope: SessionScope = { session, pendingEvents: [] };
      attempts.push(scope);
      return this.sessions.run(scope, work);
    });

    const committed = attempts[attempts.length - 1];
    if (committed) {
      this.appLogger.logDomainEvents(committed.pendingEvents);
    }
    return result;
  }
}
