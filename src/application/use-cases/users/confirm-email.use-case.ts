import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { InvalidatesCache } from '../../caching';
import { Result, failure, fromDomain, success } from '../../common/result';
import { UserOutputDto, toUserOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IUserRepositoryPort } from '../../ports';
import { USER_QUERY_PREFIXES } from './user-cache';

@InvalidatesCache(USER_QUERY_PREFIXES, 'Email confirmed')
export class ConfirmEmailCommand extends ResultCommand<UserOutputDto> {
  @IsNotEmpty({ message: 'Token cannot be empty.' })
  readonly token: string;

  constructor(token: string) {
    super();
    this.token = token;
  }
}

@Injectable()
export class ConfirmEmailHandler
  implements RequestHandler<ConfirmEmailCommand, Result<UserOutputDto>>
{
  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
  ) {}

  handle(command: ConfirmEmailCommand): Promise<Result<UserOutputDto>> {
    return fromDomain(async () => {
      const user = await this.userRepository.findByEmailConfirmationToken(command.token);
      if (!user) {
        return failure('Invalid confirmation token.');
      }

      user.confirmEmail(command.token);
      await this.userRepository.save(user);

      return success(toUserOutput(user));
    });
  }
}
