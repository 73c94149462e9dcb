import { AuditLog } from '@domain/entities';

export interface AuditLogOutputDto {
  readonly id: string;
  readonly entityName: string;
  readonly entityId: string;
  readonly action: string;
  readonly userId: string | null;
  readonly oldValues: string | null;
  readonly newValues: string | null;
  readonly createdAt: string;
}

export function toAuditLogOutput(entry: AuditLog): AuditLogOutputDto {
  return {
    id: entry.id.toString(),
    entityName: entry.entityName,
    entityId: entry.entityId,
    action: entry.action,
    userId: entry.userId,
    oldValues: entry.oldValues,
    newValues: entry.newValues,
    createdAt: entry.createdAt.toISOString(),
  };
}
