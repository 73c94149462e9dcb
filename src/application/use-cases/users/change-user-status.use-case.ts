import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { User } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { UserOutputDto, toUserOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IUserRepositoryPort } from '../../ports';
import { USER_QUERY_PREFIXES } from './user-cache';

export abstract class UserStatusCommand extends ResultCommand<UserOutputDto> {
  @IsNotEmpty({ message: 'User ID is required.' })
  readonly userId: string;

  constructor(userId: string) {
    super();
    this.userId = userId;
  }

  abstract apply(user: User): void;
}

@InvalidatesCache(USER_QUERY_PREFIXES, 'User activated')
export class ActivateUserCommand extends UserStatusCommand {
  apply(user: User): void {
    user.activate();
  }
}

@InvalidatesCache(USER_QUERY_PREFIXES, 'User deactivated')
export class DeactivateUserCommand extends UserStatusCommand {
  apply(user: User): void {
    user.deactivate();
  }
}

@Injectable()
export class ChangeUserStatusHandler
  implements RequestHandler<UserStatusCommand, Result<UserOutputDto>>
{
  private readonly logger = new Logger(ChangeUserStatusHandler.name);

  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
  ) {}

  handle(command: UserStatusCommand): Promise<Result<UserOutputDto>> {
    return fromDomain(async () => {
      const user = await this.userRepository.findById(EntityId.fromString(command.userId));
      if (!user) {
        return notFound(`User with ID ${command.userId} not found`);
      }

      command.apply(user);
      await this.userRepository.save(user);
      this.logger.log(`${command.constructor.name} applied to user ${command.userId}`);

      return success(toUserOutput(user));
    });
  }
}
