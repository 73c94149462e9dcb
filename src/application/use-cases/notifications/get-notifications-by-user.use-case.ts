import { Inject, Injectable } from '@nestjs/common';
import { IsBoolean, IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { Result, success } from '../../common/result';
import { NotificationOutputDto, toNotificationOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { INotificationRepositoryPort } from '../../ports';

export class GetNotificationsByUserQuery
  extends ResultQuery<NotificationOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 60;
  readonly cachePrefix = CachePrefixes.GetNotificationsByUser;

  @IsNotEmpty({ message: 'User ID is required.' })
  readonly userId: string;

  @IsBoolean()
  readonly unreadOnly: boolean;

  constructor(userId: string, unreadOnly = false) {
    super();
    this.userId = userId;
    this.unreadOnly = unreadOnly;
  }
}

@Injectable()
export class GetNotificationsByUserHandler
  implements RequestHandler<GetNotificationsByUserQuery, Result<NotificationOutputDto[]>>
{
  constructor(
    @Inject('INotificationRepository')
    private readonly notificationRepository: INotificationRepositoryPort,
  ) {}

  async handle(query: GetNotificationsByUserQuery): Promise<Result<NotificationOutputDto[]>> {
    const notifications = await this.notificationRepository.findByUser(
      EntityId.fromString(query.userId),
      query.unreadOnly,
    );
    return success(notifications.map(toNotificationOutput));
  }
}
