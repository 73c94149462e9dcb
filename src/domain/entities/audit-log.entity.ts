import { AuditAction, EntityId } from '../value-objects';

export interface AuditLogProps {
  entityName: string;
  entityId: string;
  action: AuditAction;
  userId: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  oldValues: string | null;
  newValues: string | null;
  metadata: string | null;
  createdAt: Date;
}

/**
 * Immutable record of a change made to an audited aggregate.
 * Old and new values are JSON snapshots of the persisted document.
 */
export class AuditLog {
  private constructor(public readonly id: EntityId, private readonly props: AuditLogProps) {}

  static create(params: Omit<AuditLogProps, 'createdAt'> & { id?: EntityId }): AuditLog {
    const { id, ...props } = params;
    return new AuditLog(id ?? EntityId.generate(), { ...props, createdAt: new Date() });
  }

  static reconstitute(id: EntityId, props: AuditLogProps): AuditLog {
    return new AuditLog(id, { ...props });
  }

  get entityName(): string {
    return this.props.entityName;
  }

  get entityId(): string {
    return this.props.entityId;
  }

  get action(): AuditAction {
    return this.props.action;
  }

  get userId(): string | null {
    return this.props.userId;
  }

  get ipAddress(): string | null {
    return this.props.ipAddress;
  }

  get userAgent(): string | null {
    return this.props.userAgent;
  }

  get oldValues(): string | null {
    return this.props.oldValues;
  }

  get newValues(): string | null {
    return this.props.newValues;
  }

  get metadata(): string | null {
    return this.props.metadata;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }
}
