import { Notification } from '@domain/entities';
import { EntityId } from '@domain/value-objects';

export interface INotificationRepositoryPort {
  save(notification: Notification): Promise<void>;

  findById(id: EntityId): Promise<Notification | null>;

  /**
   * Notifications of a user, newest first.
   *
   * @param unreadOnly - Leave out notifications already read
   */
  findByUser(userId: EntityId, unreadOnly: boolean): Promise<Notification[]>;
}
