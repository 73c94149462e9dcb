import { AuditLog } from '@domain/entities';
import { AUDIT_ACTIONS, EntityId, parseEnumeration } from '@domain/value-objects';
import { AuditLogDocument } from '../schemas';

export class AuditLogMapper {
  static toDomain(document: AuditLogDocument): AuditLog {
    return AuditLog.reconstitute(EntityId.fromString(document._id), {
      entityName: document.entityName,
      entityId: document.entityId,
      action: parseEnumeration(AUDIT_ACTIONS, document.action, 'AuditAction'),
      userId: document.userId ?? null,
      ipAddress: document.ipAddress ?? null,
      userAgent: document.userAgent ?? null,
      oldValues: document.oldValues ?? null,
      newValues: document.newValues ?? null,
      metadata: document.metadata ?? null,
      createdAt: document.createdAt,
    });
  }

  static toDocument(entry: AuditLog): AuditLogDocument {
    const document = new AuditLogDocument();
    document._id = entry.id.toString();
    document.entityName = entry.entityName;
    document.entityId = entry.entityId;
    document.action = entry.action;
    document.userId = entry.userId;
    document.ipAddress = entry.ipAddress;
    document.userAgent = entry.userAgent;
    document.oldValues = entry.oldValues;
    document.newValues = entry.newValues;
    document.metadata = entry.metadata;
    document.createdAt = entry.createdAt;
    return document;
  }
}
