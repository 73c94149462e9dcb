import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsEmail, IsIn, IsNotEmpty, IsOptional, Matches, MaxLength, MinLength } from 'class-validator';
import { User } from '@domain/entities';
import { Email, PhoneNumber, USER_ROLES, UserRole } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, conflict, fromDomain, success } from '../../common/result';
import { UserOutputDto, toUserOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IPasswordHasherPort, IUserRepositoryPort } from '../../ports';
import { NotificationWriter } from '../../services';
import { AUTH_OPTIONS, AuthOptions } from './auth-options';
import { USER_QUERY_PREFIXES } from './user-cache';

export interface CreateUserInput {
  name: string;
  email: string;
  password: string;
  role?: UserRole;
  timezone?: string;
  phoneNumber?: string | null;
}

export const PASSWORD_RULE = /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d).+$/;
export const PASSWORD_RULE_MESSAGE =
  'Password must contain at least one uppercase letter, one lowercase letter and one digit.';

@InvalidatesCache(USER_QUERY_PREFIXES, 'New user registered')
@InvalidatesCache(CachePrefixes.GetNotificationsByUser, 'Verification notification created')
export class CreateUserCommand extends ResultCommand<UserOutputDto> {
  @IsNotEmpty({ message: 'Name is required.' })
  @MaxLength(200, { message: 'Name must not exceed 200 characters.' })
  readonly name!: string;

  @IsEmail({}, { message: 'A valid email address is required.' })
  @MaxLength(256)
  readonly email!: string;

  @MinLength(8, { message: 'Password must be at least 8 characters long.' })
  @MaxLength(128, { message: 'Password must not exceed 128 characters.' })
  @Matches(PASSWORD_RULE, { message: PASSWORD_RULE_MESSAGE })
  readonly password!: string;

  @IsIn(USER_ROLES, { message: `Role must be one of: ${USER_ROLES.join(', ')}.` })
  readonly role: UserRole = 'student';

  @IsOptional()
  @MaxLength(50)
  readonly timezone?: string;

  @IsOptional()
  @Matches(/^\+[1-9]\d{1,14}$/, { message: 'Phone number must be in E.164 format.' })
  readonly phoneNumber?: string | null;

  constructor(input: CreateUserInput) {
    super();
    Object.assign(this, input);
    this.role = input.role ?? 'student';
  }
}

/**
 * Registers an account and issues an e-mail confirmation token, delivered
 * through an email_verification notification.
 */
@Injectable()
export class CreateUserHandler implements RequestHandler<CreateUserCommand, Result<UserOutputDto>> {
  private readonly logger = new Logger(CreateUserHandler.name);

  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('IPasswordHasher')
    private readonly passwordHasher: IPasswordHasherPort,
    private readonly notifications: NotificationWriter,
    @Inject(AUTH_OPTIONS)
    private readonly authOptions: AuthOptions,
  ) {}

  handle(command: CreateUserCommand): Promise<Result<UserOutputDto>> {
    return fromDomain(async () => {
      const email = Email.of(command.email);
      if (await this.userRepository.existsByEmail(email)) {
        this.logger.warn(`Registration rejected, email already in use: ${email.toString()}`);
        return conflict(`User with email ${email.toString()} already exists`);
      }

      const user = User.create({
        name: command.name,
        email,
        passwordHash: await this.passwordHasher.hash(command.password),
        role: command.role,
        timezone: command.timezone,
        phoneNumber: command.phoneNumber ? PhoneNumber.of(command.phoneNumber) : null,
      });
      const token = user.generateEmailConfirmationToken(
        this.authOptions.emailTokenTtlHours * 60 * 60 * 1000,
      );

      await this.userRepository.save(user);
      await this.notifications.notify({
        userId: user.id,
        type: 'email_verification',
        title: 'Confirm your email address',
        message: `Welcome ${user.name}! Please confirm your email address to activate all features.`,
        relatedEntityType: 'User',
        relatedEntityId: user.id.toString(),
        metadata: { token },
      });

      this.logger.log(`User ${user.id.toString()} registered as ${user.role}`);
      return success(toUserOutput(user));
    });
  }
}
