import { Inject, Injectable } from '@nestjs/common';
import { AuditLog } from '@domain/entities';
import { DomainEvent } from '@domain/events';
import { AuditAction } from '@domain/value-objects';
import { IAuditLogRepositoryPort } from '@application/ports';
import { RequestContext } from '@infrastructure/context';
import { AppLoggerService } from '@infrastructure/observability/logging/app-logger.service';

const EVENT_ACTIONS: Readonly<Record<string, AuditAction>> = {
  BookingCreated: 'booking_created',
  PaymentSucceeded: 'payment_processed',
  PaymentFailed: 'payment_processed',
  PaymentRefunded: 'payment_processed',
  UserEmailConfirmed: 'email_confirmation',
  UserPasswordReset: 'password_reset',
  UserLoggedIn: 'login',
};

// Never written to the trail in clear
const SENSITIVE_FIELDS = new Set([
  'passwordHash',
  'emailConfirmationToken',
  'passwordResetToken',
]);

const IGNORED_FIELDS = new Set(['_id', '__v', 'createdAt', 'updatedAt']);

/**
 * Picks the audit action for a write from the events the aggregate recorded.
 */
export function resolveAuditAction(events: readonly DomainEvent[], isNew: boolean): AuditAction {
  for (const event of events) {
    const action = EVENT_ACTIONS[event.name];
    if (action) {
      return action;
    }
  }
  if (events.some((event) => event.name.startsWith('Booking'))) {
    return 'booking_updated';
  }
  if (events.some((event) => event.name.endsWith('Deactivated'))) {
    return 'delete';
  }
  return isNew ? 'create' : 'update';
}

function snapshot(document: object): Map<string, string> {
  const fields = new Map<string, string>();
  for (const [key, value] of Object.entries(document)) {
    if (IGNORED_FIELDS.has(key) || value === undefined) {
      continue;
    }
    fields.set(key, SENSITIVE_FIELDS.has(key) ? '"[REDACTED]"' : JSON.stringify(value));
  }
  return fields;
}

function toJson(fields: Map<string, string>): string {
  return `{${[...fields].map(([key, value]) => `${JSON.stringify(key)}:${value}`).join(',')}}`;
}

export interface AuditedWrite {
  entityName: string;
  entityId: string;
  /** Stored document before the write, null when it was inserted */
  previous: object | null;
  current: object;
  events: readonly DomainEvent[];
}

/**
 * Appends an AuditLog entry for every persisted change: changed fields only
 * for updates, the whole document for inserts.
 */
@Injectable()
export class AuditTrailRecorder {
  constructor(
    @Inject('IAuditLogRepository')
    private readonly auditLogs: IAuditLogRepositoryPort,
    private readonly requestContext: RequestContext,
    private readonly appLogger: AppLoggerService,
  ) {}

  async record(write: AuditedWrite): Promise<AuditLog | null> {
    const isNew = write.previous === null;
    const after = snapshot(write.current);
    const before = write.previous ? snapshot(write.previous) : new Map<string, string>();

    const oldValues = new Map<string, string>();
    const newValues = new Map<string, string>();
    for (const [key, value] of after) {
      const previousValue = before.get(key);
      if (isNew || previousValue !== value) {
        newValues.set(key, value);
        if (previousValue !== undefined) {
          oldValues.set(key, previousValue);
        }
      }
    }

    if (!isNew && newValues.size === 0 && write.events.length === 0) {
      return null;
    }

    const request = this.requestContext.current();
    const entry = AuditLog.create({
      entityName: write.entityName,
      entityId: write.entityId,
      action: resolveAuditAction(write.events, isNew),
      userId: request?.userId ?? null,
      ipAddress: request?.ipAddress ?? null,
      userAgent: request?.userAgent ?? null,
      oldValues: oldValues.size > 0 ? toJson(oldValues) : null,
      newValues: newValues.size > 0 ? toJson(newValues) : null,
      metadata:
        write.events.length > 0 || request?.requestId
          ? JSON.stringify({
              events: write.events.map((event) => event.name),
              requestId: request?.requestId ?? null,
            })
          : null,
    });

    await this.auditLogs.append(entry);
    this.appLogger.logAuditEntry({
      entityName: entry.entityName,
      entityId: entry.entityId,
      action: entry.action,
      userId: entry.userId,
    });
    return entry;
  }
}
