import { User } from '@domain/entities';
import { PagedResult } from '../common/paged-result';

/**
 * Public view of an account. Credentials and tokens never leave the application layer.
 */
export interface UserOutputDto {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly role: string;
  readonly isActive: boolean;
  readonly emailConfirmed: boolean;
  readonly timezone: string;
  readonly phoneNumber: string | null;
  readonly profilePictureUrl: string | null;
  readonly lastLoginAt: string | null;
  readonly isLocked: boolean;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export type UserListOutputDto = PagedResult<UserOutputDto>;

export interface AuthenticationOutputDto {
  readonly user: UserOutputDto;
  readonly authenticatedAt: string;
}

export function toUserOutput(user: User, now: Date = new Date()): UserOutputDto {
  return {
    id: user.id.toString(),
    name: user.name,
    email: user.email.toString(),
    role: user.role,
    isActive: user.isActive,
    emailConfirmed: user.emailConfirmed,
    timezone: user.timezone,
    phoneNumber: user.phoneNumber?.toString() ?? null,
    profilePictureUrl: user.profilePictureUrl?.toString() ?? null,
    lastLoginAt: user.lastLoginAt?.toISOString() ?? null,
    isLocked: user.isLocked(now),
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}
