import { getCacheInvalidationRules } from '@application/caching';
import { INotificationRepositoryPort } from '@application/ports';
import { MarkNotificationReadCommand, MarkNotificationReadHandler } from '@application/use-cases';
import { Notification } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { createNotificationRepositoryMock } from '../fixtures';

describe('MarkNotificationReadHandler', () => {
  let notificationRepository: jest.Mocked<INotificationRepositoryPort>;
  let handler: MarkNotificationReadHandler;

  beforeEach(() => {
    notificationRepository = createNotificationRepositoryMock();
    handler = new MarkNotificationReadHandler(notificationRepository);
  });

  it('should mark the notification as read', async () => {
    const notification = Notification.create({
      id: EntityId.fromString('notification-1'),
      userId: EntityId.fromString('user-1'),
      type: 'general_announcement',
      title: 'Schedule update',
      message: 'The skills lab moved to room 4.',
    });
    notificationRepository.findById.mockResolvedValue(notification);

    const result = await handler.handle(new MarkNotificationReadCommand('notification-1'));

    expect(result.ok && result.value.isRead).toBe(true);
    expect(notificationRepository.save).toHaveBeenCalledWith(notification);
  });

  it('should return not found for an unknown notification', async () => {
    notificationRepository.findById.mockResolvedValue(null);

    const result = await handler.handle(new MarkNotificationReadCommand('missing'));

    expect(result).toEqual({
      ok: false,
      kind: 'not_found',
      errors: ['Notification with ID missing not found'],
    });
  });

  it('should invalidate the cached notification lists', () => {
    expect(getCacheInvalidationRules(MarkNotificationReadCommand)).toEqual([
      { prefixes: ['GetNotifications', 'GetNotificationsByUser'], reason: 'Notification read' },
    ]);
  });
});
