import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty, Matches, MaxLength, MinLength } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success, unauthorized } from '../../common/result';
import { UserOutputDto, toUserOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IPasswordHasherPort, IUserRepositoryPort } from '../../ports';
import { PASSWORD_RULE, PASSWORD_RULE_MESSAGE } from './create-user.use-case';
import { USER_QUERY_PREFIXES } from './user-cache';

@InvalidatesCache(USER_QUERY_PREFIXES, 'Password changed')
export class ChangePasswordCommand extends ResultCommand<UserOutputDto> {
  @IsNotEmpty({ message: 'User ID is required.' })
  readonly userId: string;

  @IsNotEmpty({ message: 'Current password is required.' })
  readonly currentPassword: string;

  @MinLength(8, { message: 'Password must be at least 8 characters long.' })
  @MaxLength(128, { message: 'Password must not exceed 128 characters.' })
  @Matches(PASSWORD_RULE, { message: PASSWORD_RULE_MESSAGE })
  readonly newPassword: string;

  constructor(userId: string, currentPassword: string, newPassword: string) {
    super();
    this.userId = userId;
    this.currentPassword = currentPassword;
    this.newPassword = newPassword;
  }
}

@Injectable()
export class ChangePasswordHandler
  implements RequestHandler<ChangePasswordCommand, Result<UserOutputDto>>
{
  private readonly logger = new Logger(ChangePasswordHandler.name);

  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('IPasswordHasher')
    private readonly passwordHasher: IPasswordHasherPort,
  ) {}

  handle(command: ChangePasswordCommand): Promise<Result<UserOutputDto>> {
    return fromDomain(async () => {
      const user = await this.userRepository.findById(EntityId.fromString(command.userId));
      if (!user) {
        return notFound(`User with ID ${command.userId} not found`);
      }

      const matches = await this.passwordHasher.verify(command.currentPassword, user.passwordHash);
      if (!matches) {
        this.logger.warn(`Password change rejected for user ${command.userId}`);
        return unauthorized('Current password is incorrect.');
      }

      user.changePassword(await this.passwordHasher.hash(command.newPassword));
      await this.userRepository.save(user);

      return success(toUserOutput(user));
    });
  }
}
