import { Notification } from '@domain/entities';

export interface NotificationOutputDto {
  readonly id: string;
  readonly userId: string;
  readonly type: string;
  readonly title: string;
  readonly message: string;
  readonly isRead: boolean;
  readonly readAt: string | null;
  readonly relatedEntityType: string | null;
  readonly relatedEntityId: string | null;
  readonly createdAt: string;
}

export function toNotificationOutput(notification: Notification): NotificationOutputDto {
  return {
    id: notification.id.toString(),
    userId: notification.userId.toString(),
    type: notification.type,
    title: notification.title,
    message: notification.message,
    isRead: notification.isRead,
    readAt: notification.readAt?.toISOString() ?? null,
    relatedEntityType: notification.relatedEntityType,
    relatedEntityId: notification.relatedEntityId,
    createdAt: notification.createdAt.toISOString(),
  };
}
