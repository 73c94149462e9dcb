import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty, IsOptional, IsUrl, Matches, MaxLength } from 'class-validator';
import { EntityId, PhoneNumber, Url } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { UserOutputDto, toUserOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IUserRepositoryPort } from '../../ports';
import { USER_QUERY_PREFIXES } from './user-cache';

export interface UpdateUserProfileInput {
  userId: string;
  name?: string;
  timezone?: string;
  phoneNumber?: string | null;
  profilePictureUrl?: string | null;
}

@InvalidatesCache(USER_QUERY_PREFIXES, 'Profile changed')
export class UpdateUserProfileCommand extends ResultCommand<UserOutputDto> {
  @IsNotEmpty({ message: 'User ID is required.' })
  readonly userId!: string;

  @IsOptional()
  @IsNotEmpty({ message: 'Name is required.' })
  @MaxLength(200, { message: 'Name must not exceed 200 characters.' })
  readonly name?: string;

  @IsOptional()
  @IsNotEmpty({ message: 'Timezone is required.' })
  @MaxLength(50)
  readonly timezone?: string;

  @IsOptional()
  @Matches(/^\+[1-9]\d{1,14}$/, { message: 'Phone number must be in E.164 format.' })
  readonly phoneNumber?: string | null;

  @IsOptional()
  @IsUrl({}, { message: 'Profile picture URL must be a valid URL.' })
  readonly profilePictureUrl?: string | null;

  constructor(input: UpdateUserProfileInput) {
    super();
    Object.assign(this, input);
  }
}

/**
 * Omitted fields keep their value; `null` clears the phone number or picture.
 */
@Injectable()
export class UpdateUserProfileHandler
  implements RequestHandler<UpdateUserProfileCommand, Result<UserOutputDto>>
{
  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
  ) {}

  handle(command: UpdateUserProfileCommand): Promise<Result<UserOutputDto>> {
    return fromDomain(async () => {
      const user = await this.userRepository.findById(EntityId.fromString(command.userId));
      if (!user) {
        return notFound(`User with ID ${command.userId} not found`);
      }

      if (command.name !== undefined) {
        user.updateName(command.name);
      }
      if (command.timezone !== undefined) {
        user.updateTimezone(command.timezone);
      }
      if (command.phoneNumber !== undefined) {
        user.updatePhoneNumber(command.phoneNumber ? PhoneNumber.of(command.phoneNumber) : null);
      }
      if (command.profilePictureUrl !== undefined) {
        user.updateProfilePicture(Url.ofNullable(command.profilePictureUrl));
      }

      await this.userRepository.save(user);
      return success(toUserOutput(user));
    });
  }
}
