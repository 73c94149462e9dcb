import { Notification } from '@domain/entities';
import { EntityId, NOTIFICATION_TYPES, parseEnumeration } from '@domain/value-objects';
import { NotificationDocument } from '../schemas';

export class NotificationMapper {
  static toDomain(document: NotificationDocument): Notification {
    return Notification.reconstitute(EntityId.fromString(document._id), {
      userId: EntityId.fromString(document.userId),
      type: parseEnumeration(NOTIFICATION_TYPES, document.type, 'NotificationType'),
      title: document.title,
      message: document.message,
      isRead: document.isRead,
      readAt: document.readAt ?? null,
      emailSent: document.emailSent,
      emailSentAt: document.emailSentAt ?? null,
      smsSent: document.smsSent,
      smsSentAt: document.smsSentAt ?? null,
      pushSent: document.pushSent,
      pushSentAt: document.pushSentAt ?? null,
      relatedEntityType: document.relatedEntityType ?? null,
      relatedEntityId: document.relatedEntityId ?? null,
      metadata: { ...(document.metadata ?? {}) },
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static toDocument(notification: Notification): NotificationDocument {
    const document = new NotificationDocument();
    document._id = notification.id.toString();
    document.userId = notification.userId.toString();
    document.type = notification.type;
    document.title = notification.title;
    document.message = notification.message;
    document.isRead = notification.isRead;
    document.readAt = notification.readAt;
    document.emailSent = notification.emailSent;
    document.emailSentAt = notification.emailSentAt;
    document.smsSent = notification.smsSent;
    document.smsSentAt = notification.smsSentAt;
    document.pushSent = notification.pushSent;
    document.pushSentAt = notification.pushSentAt;
    document.relatedEntityType = notification.relatedEntityType;
    document.relatedEntityId = notification.relatedEntityId;
    document.metadata = { ...notification.metadata };
    document.createdAt = notification.createdAt;
    document.updatedAt = notification.updatedAt;
    return document;
  }
}
