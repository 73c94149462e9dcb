import { AuditLog } from '@domain/entities';

/**
 * Outbound port for the audit trail. Entries are append-only.
 */
export interface IAuditLogRepositoryPort {
  append(entry: AuditLog): Promise<void>;

  /**
   * Entries for one entity, newest first.
   */
  findByEntity(entityName: string, entityId: string): Promise<AuditLog[]>;
}
