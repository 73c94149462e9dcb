import { Inject, Injectable, Logger } from '@nestjs/common';
import { Notification } from '@domain/entities';
import { EntityId, NotificationType } from '@domain/value-objects';
import { INotificationRepositoryPort } from '../ports';

export interface NewNotification {
  userId: EntityId;
  type: NotificationType;
  title: string;
  message: string;
  relatedEntityType?: string;
  relatedEntityId?: string;
  metadata?: Record<string, string>;
}

/**
 * Stores in-app notifications raised by use cases. Runs inside the caller's
 * transaction, so a rolled back command leaves no notification behind.
 */
@Injectable()
export class NotificationWriter {
  private readonly logger = new Logger(NotificationWriter.name);

  constructor(
    @Inject('INotificationRepository')
    private readonly notificationRepository: INotificationRepositoryPort,
  ) {}

  async notify(notification: NewNotification): Promise<Notification> {
    const created = Notification.create(notification);
    await this.notificationRepository.save(created);
    this.logger.debug(
      `Notification ${notification.type} created for user ${notification.userId.toString()}`,
    );
    return created;
  }
}
