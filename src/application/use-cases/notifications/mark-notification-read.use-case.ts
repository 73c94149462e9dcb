import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { NotificationOutputDto, toNotificationOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { INotificationRepositoryPort } from '../../ports';

@InvalidatesCache(
  [CachePrefixes.GetNotifications, CachePrefixes.GetNotificationsByUser],
  'Notification read',
)
export class MarkNotificationReadCommand extends ResultCommand<NotificationOutputDto> {
  @IsNotEmpty({ message: 'Notification ID is required.' })
  readonly notificationId: string;

  constructor(notificationId: string) {
    super();
    this.notificationId = notificationId;
  }
}

@Injectable()
export class MarkNotificationReadHandler
  implements RequestHandler<MarkNotificationReadCommand, Result<NotificationOutputDto>>
{
  constructor(
    @Inject('INotificationRepository')
    private readonly notificationRepository: INotificationRepositoryPort,
  ) {}

  handle(command: MarkNotificationReadCommand): Promise<Result<NotificationOutputDto>> {
    return fromDomain(async () => {
      const notification = await this.notificationRepository.findById(
        EntityId.fromString(command.notificationId),
      );
      if (!notification) {
        return notFound(`Notification with ID ${command.notificationId} not found`);
      }

      notification.markRead();
      await this.notificationRepository.save(notification);

      return success(toNotificationOutput(notification));
    });
  }
}
