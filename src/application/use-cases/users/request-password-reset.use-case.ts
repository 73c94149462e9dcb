import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsEmail } from 'class-validator';
import { Email } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, fromDomain, success } from '../../common/result';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IUserRepositoryPort } from '../../ports';
import { NotificationWriter } from '../../services';
import { AUTH_OPTIONS, AuthOptions } from './auth-options';

@InvalidatesCache(CachePrefixes.GetNotificationsByUser, 'Password reset notification created')
export class RequestPasswordResetCommand extends ResultCommand<boolean> {
  @IsEmail({}, { message: 'A valid email address is required.' })
  readonly email: string;

  constructor(email: string) {
    super();
    this.email = email;
  }
}

/**
 * Issues a reset token for an active account. Succeeds for unknown addresses
 * too, so the response does not reveal which e-mails are registered.
 */
@Injectable()
export class RequestPasswordResetHandler
  implements RequestHandler<RequestPasswordResetCommand, Result<boolean>>
{
  private readonly logger = new Logger(RequestPasswordResetHandler.name);

  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    private readonly notifications: NotificationWriter,
    @Inject(AUTH_OPTIONS)
    private readonly authOptions: AuthOptions,
  ) {}

  handle(command: RequestPasswordResetCommand): Promise<Result<boolean>> {
    return fromDomain(async () => {
      const user = await this.userRepository.findByEmail(Email.of(command.email));
      if (!user || !user.isActive) {
        this.logger.debug('Password reset requested for an unknown or inactive account');
        return success(true);
      }

      const token = user.generatePasswordResetToken(
        this.authOptions.passwordResetTtlMinutes * 60 * 1000,
      );
      await this.userRepository.save(user);
      await this.notifications.notify({
        userId: user.id,
        type: 'password_reset',
        title: 'Reset your password',
        message: `A password reset was requested. The link is valid for ${this.authOptions.passwordResetTtlMinutes} minutes.`,
        relatedEntityType: 'User',
        relatedEntityId: user.id.toString(),
        metadata: { token },
      });

      return success(true);
    });
  }
}
