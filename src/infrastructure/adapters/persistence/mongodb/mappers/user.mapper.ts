import { User } from '@domain/entities';
import {
  Email,
  EntityId,
  PhoneNumber,
  Url,
  USER_ROLES,
  parseEnumeration,
} from '@domain/value-objects';
import { UserDocument } from '../schemas';

/**
 * Mapper for converting between the User entity and its MongoDB document.
 */
export class UserMapper {
  static toDomain(document: UserDocument): User {
    return User.reconstitute(EntityId.fromString(document._id), {
      name: document.name,
      email: Email.of(document.email),
      passwordHash: document.passwordHash,
      role: parseEnumeration(USER_ROLES, document.role, 'UserRole'),
      isActive: document.isActive,
      emailConfirmed: document.emailConfirmed,
      emailConfirmationToken: document.emailConfirmationToken ?? null,
      emailConfirmationTokenExpiresAt: document.emailConfirmationTokenExpiresAt ?? null,
      passwordResetToken: document.passwordResetToken ?? null,
      passwordResetTokenExpiresAt: document.passwordResetTokenExpiresAt ?? null,
      timezone: document.timezone,
      phoneNumber: document.phoneNumber ? PhoneNumber.of(document.phoneNumber) : null,
      profilePictureUrl: Url.ofNullable(document.profilePictureUrl),
      lastLoginAt: document.lastLoginAt ?? null,
      failedLoginAttempts: document.failedLoginAttempts,
      lockedUntil: document.lockedUntil ?? null,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static toDocument(user: User): UserDocument {
    const document = new UserDocument();
    document._id = user.id.toString();
    document.name = user.name;
    document.email = user.email.toString();
    document.passwordHash = user.passwordHash;
    document.role = user.role;
    document.isActive = user.isActive;
    document.emailConfirmed = user.emailConfirmed;
    document.emailConfirmationToken = user.emailConfirmationToken;
    document.emailConfirmationTokenExpiresAt = user.emailConfirmationTokenExpiresAt;
    document.passwordResetToken = user.passwordResetToken;
    document.passwordResetTokenExpiresAt = user.passwordResetTokenExpiresAt;
    document.timezone = user.timezone;
    document.phoneNumber = user.phoneNumber?.toString() ?? null;
    document.profilePictureUrl = user.profilePictureUrl?.toString() ?? null;
    document.lastLoginAt = user.lastLoginAt;
    document.failedLoginAttempts = user.failedLoginAttempts;
    document.lockedUntil = user.lockedUntil;
    document.createdAt = user.createdAt;
    document.updatedAt = user.updatedAt;
    return document;
  }
}
