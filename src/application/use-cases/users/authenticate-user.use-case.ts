import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsEmail, IsNotEmpty } from 'class-validator';
import { Email } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, success, unauthorized } from '../../common/result';
import { AuthenticationOutputDto, toUserOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IPasswordHasherPort, IUserRepositoryPort } from '../../ports';
import { AUTH_OPTIONS, AuthOptions } from './auth-options';
import { USER_QUERY_PREFIXES } from './user-cache';

const INVALID_CREDENTIALS = 'Invalid email or password.';

@InvalidatesCache(USER_QUERY_PREFIXES, 'Login state changed')
export class AuthenticateUserCommand extends ResultCommand<AuthenticationOutputDto> {
  // Failed attempts must be stored even though the result is a failure
  readonly commitFailedResults = true;

  @IsEmail({}, { message: 'A valid email address is required.' })
  readonly email: string;

  @IsNotEmpty({ message: 'Password is required.' })
  readonly password: string;

  constructor(email: string, password: string) {
    super();
    this.email = email;
    this.password = password;
  }
}

/**
 * Verifies credentials. Repeated failures lock the account for the configured
 * period; a locked or inactive account cannot sign in.
 */
@Injectable()
export class AuthenticateUserHandler
  implements RequestHandler<AuthenticateUserCommand, Result<AuthenticationOutputDto>>
{
  private readonly logger = new Logger(AuthenticateUserHandler.name);

  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('IPasswordHasher')
    private readonly passwordHasher: IPasswordHasherPort,
    @Inject(AUTH_OPTIONS)
    private readonly authOptions: AuthOptions,
  ) {}

  handle(command: AuthenticateUserCommand): Promise<Result<AuthenticationOutputDto>> {
    return fromDomain(async () => {
      const now = new Date();
      const user = await this.userRepository.findByEmail(Email.of(command.email));
      if (!user) {
        return unauthorized(INVALID_CREDENTIALS);
      }
      if (!user.isActive) {
        return unauthorized('Account is inactive.');
      }
      if (user.isLocked(now)) {
        return unauthorized('Account is locked. Try again later.');
      }

      const matches = await this.passwordHasher.verify(command.password, user.passwordHash);
      if (!matches) {
        const locked = user.recordLoginFailure(
          this.authOptions.maxFailedLogins,
          this.authOptions.lockoutMinutes * 60 * 1000,
          now,
        );
        await this.userRepository.save(user);

        if (locked) {
          this.logger.warn(`User ${user.id.toString()} locked after repeated failed logins`);
          return unauthorized('Account is locked. Try again later.');
        }
        return unauthorized(INVALID_CREDENTIALS);
      }

      user.recordLoginSuccess(now);
      await this.userRepository.save(user);

      return success({
        user: toUserOutput(user, now),
        authenticatedAt: now.toISOString(),
      });
    });
  }
}
