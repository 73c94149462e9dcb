import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { AuditLog } from '@domain/entities';
import { IAuditLogRepositoryPort } from '@application/ports/outbound';
import { AppLoggerService, DbOperation } from '@infrastructure/observability/logging/app-logger.service';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';
import { AuditLogDocument } from '../schemas';
import { AuditLogMapper } from '../mappers';
import { MongoSessionContext } from '../mongo-session.context';

const COLLECTION = 'audit_logs';

/**
 * Append-only store for audit entries. Writes bypass the aggregate writer
 * so an entry never audits itself.
 */
@Injectable()
export class MongoAuditLogRepository implements IAuditLogRepositoryPort {
  constructor(
    @InjectModel(AuditLogDocument.name)
    private readonly auditLogModel: Model<AuditLogDocument>,
    private readonly sessions: MongoSessionContext,
    private readonly appLogger: AppLoggerService,
    private readonly metrics: MetricsService,
  ) {}

  async append(entry: AuditLog): Promise<void> {
    await this.timed('save', () =>
      this.auditLogModel.create([AuditLogMapper.toDocument(entry)], {
        session: this.sessions.session(),
      }),
    );
  }

  async findByEntity(entityName: string, entityId: string): Promise<AuditLog[]> {
    const documents = await this.timed('find', () =>
      this.auditLogModel
        .find({ entityName, entityId })
        .sort({ createdAt: -1 })
        .session(this.sessions.session())
        .exec(),
    );
    return documents.map((doc) => AuditLogMapper.toDomain(doc));
  }

  private async timed<T>(operation: DbOperation, query: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    let success = false;
    try {
      const result = await query();
      success = true;
      return result;
    } finally {
      const durationMs = Date.now() - startedAt;
      this.metrics.recordDBQuery(operation, COLLECTION, durationMs / 1000);
      this.appLogger.logDBOperation({ operation, collection: COLLECTION, durationMs, success });
    }
  }
}
