import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty, Matches, MaxLength, MinLength } from 'class-validator';
import { InvalidatesCache } from '../../caching';
import { Result, failure, fromDomain, success } from '../../common/result';
import { UserOutputDto, toUserOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IPasswordHasherPort, IUserRepositoryPort } from '../../ports';
import { PASSWORD_RULE, PASSWORD_RULE_MESSAGE } from './create-user.use-case';
import { USER_QUERY_PREFIXES } from './user-cache';

@InvalidatesCache(USER_QUERY_PREFIXES, 'Password reset')
export class ResetPasswordCommand extends ResultCommand<UserOutputDto> {
  @IsNotEmpty({ message: 'Token cannot be empty.' })
  readonly token: string;

  @MinLength(8, { message: 'Password must be at least 8 characters long.' })
  @MaxLength(128, { message: 'Password must not exceed 128 characters.' })
  @Matches(PASSWORD_RULE, { message: PASSWORD_RULE_MESSAGE })
  readonly newPassword: string;

  constructor(token: string, newPassword: string) {
    super();
    this.token = token;
    this.newPassword = newPassword;
  }
}

@Injectable()
export class ResetPasswordHandler
  implements RequestHandler<ResetPasswordCommand, Result<UserOutputDto>>
{
  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('IPasswordHasher')
    private readonly passwordHasher: IPasswordHasherPort,
  ) {}

  handle(command: ResetPasswordCommand): Promise<Result<UserOutputDto>> {
    return fromDomain(async () => {
      const user = await this.userRepository.findByPasswordResetToken(command.token);
      if (!user) {
        return failure('Invalid password reset token.');
      }

      user.resetPassword(command.token, await this.passwordHasher.hash(command.newPassword));
      await this.userRepository.save(user);

      return success(toUserOutput(user));
    });
  }
}
