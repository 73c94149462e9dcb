import { Controller, Get, Param, Patch, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { NotificationOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import {
  GetNotificationsByUserHandler,
  GetNotificationsByUserQuery,
  MarkNotificationReadCommand,
  MarkNotificationReadHandler,
} from '@application/use-cases';
import { UnreadOnlyQueryDto } from '../dtos/request';
import { unwrapResult } from '../result.mapper';

@ApiTags('Notifications')
@Controller('api/v1/notifications')
export class NotificationsController {
  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly getByUser: GetNotificationsByUserHandler,
    private readonly markRead: MarkNotificationReadHandler,
  ) {}

  @Get('user/:userId')
  @ApiOperation({ summary: 'List notifications of a user', description: 'Newest first.' })
  @ApiParam({ name: 'userId', description: 'User ID' })
  async byUser(
    @Param('userId') userId: string,
    @Query() query: UnreadOnlyQueryDto,
  ): Promise<NotificationOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(
        new GetNotificationsByUserQuery(userId, query.unreadOnly ?? false),
        this.getByUser,
      ),
    );
  }

  @Patch(':id/read')
  @ApiOperation({ summary: 'Mark notification read' })
  @ApiParam({ name: 'id', description: 'Notification ID' })
  async read(@Param('id') id: string): Promise<NotificationOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new MarkNotificationReadCommand(id), this.markRead),
    );
  }
}
