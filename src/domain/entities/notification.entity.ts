import { AggregateRoot } from '../events';
import { BusinessRuleViolationException } from '../exceptions';
import { EntityId, NotificationType } from '../value-objects';

export interface NotificationProps {
  userId: EntityId;
  type: NotificationType;
  title: string;
  message: string;
  isRead: boolean;
  readAt: Date | null;
  emailSent: boolean;
  emailSentAt: Date | null;
  smsSent: boolean;
  smsSentAt: Date | null;
  pushSent: boolean;
  pushSentAt: Date | null;
  relatedEntityType: string | null;
  relatedEntityId: string | null;
  metadata: Record<string, string>;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * In-app message for a user. Delivery over e-mail, SMS or push happens elsewhere;
 * the flags only record that it happened.
 */
export class Notification extends AggregateRoot {
  private constructor(id: EntityId, private readonly props: NotificationProps) {
    super(id);
  }

  static create(params: {
    id?: EntityId;
    userId: EntityId;
    type: NotificationType;
    title: string;
    message: string;
    relatedEntityType?: string;
    relatedEntityId?: string;
    metadata?: Record<string, string>;
  }): Notification {
    if (!params.title || params.title.trim().length === 0) {
      throw new BusinessRuleViolationException('Notification title is required.');
    }
    if (!params.message || params.message.trim().length === 0) {
      throw new BusinessRuleViolationException('Notification message is required.');
    }

    const now = new Date();
    return new Notification(params.id ?? EntityId.generate(), {
      userId: params.userId,
      type: params.type,
      title: params.title.trim(),
      message: params.message.trim(),
      isRead: false,
      readAt: null,
      emailSent: false,
      emailSentAt: null,
      smsSent: false,
      smsSentAt: null,
      pushSent: false,
      pushSentAt: null,
      relatedEntityType: params.relatedEntityType ?? null,
      relatedEntityId: params.relatedEntityId ?? null,
      metadata: { ...(params.metadata ?? {}) },
      createdAt: now,
      updatedAt: now,
    });
  }

  static reconstitute(id: EntityId, props: NotificationProps): Notification {
    return new Notification(id, { ...props });
  }

  get userId(): EntityId {
    return this.props.userId;
  }

  get type(): NotificationType {
    return this.props.type;
  }

  get title(): string {
    return this.props.title;
  }

  get message(): string {
    return this.props.message;
  }

  get isRead(): boolean {
    return this.props.isRead;
  }

  get readAt(): Date | null {
    return this.props.readAt;
  }

  get emailSent(): boolean {
    return this.props.emailSent;
  }

  get emailSentAt(): Date | null {
    return this.props.emailSentAt;
  }

  get smsSent(): boolean {
    return this.props.smsSent;
  }

  get smsSentAt(): Date | null {
    return this.props.smsSentAt;
  }

  get pushSent(): boolean {
    return this.props.pushSent;
  }

  get pushSentAt(): Date | null {
    return this.props.pushSentAt;
  }

  get relatedEntityType(): string | null {
    return this.props.relatedEntityType;
  }

  get relatedEntityId(): string | null {
    return this.props.relatedEntityId;
  }

  get metadata(): Readonly<Record<string, string>> {
    return { ...this.props.metadata };
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  markRead(now: Date = new Date()): void {
    if (this.props.isRead) {
      throw new BusinessRuleViolationException('Notification is already read.');
    }
    this.props.isRead = true;
    this.props.readAt = now;
    this.touch();
  }

  markEmailSent(now: Date = new Date()): void {
    if (this.props.emailSent) {
      throw new BusinessRuleViolationException('Email has already been sent.');
    }
    this.props.emailSent = true;
    this.props.emailSentAt = now;
    this.touch();
  }

  markSmsSent(now: Date = new Date()): void {
    if (this.props.smsSent) {
      throw new BusinessRuleViolationException('SMS has already been sent.');
    }
    this.props.smsSent = true;
    this.props.smsSentAt = now;
    this.touch();
  }

  markPushSent(now: Date = new Date()): void {
    if (this.props.pushSent) {
      throw new BusinessRuleViolationException('Push notification has already been sent.');
    }
    this.props.pushSent = true;
    this.props.pushSentAt = now;
    this.touch();
  }

  private touch(): void {
    this.props.updatedAt = new Date();
  }
}
