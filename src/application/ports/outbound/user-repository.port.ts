import { User } from '@domain/entities';
import { Email, EntityId, UserRole } from '@domain/value-objects';
import { PageRequest } from '../../common/paged-result';

export interface UserSearchCriteria {
  role?: UserRole;
  isActive?: boolean;
  /** Case-insensitive match on name or email */
  search?: string;
}

export interface IUserRepositoryPort {
  /**
   * Persists a user. Existing users are updated.
   *
   * @param user - The user entity to save
   */
  save(user: User): Promise<void>;

  /**
   * @returns the user if found, null otherwise
   */
  findById(id: EntityId): Promise<User | null>;

  /**
   * @returns the user registered with the address, null otherwise
   */
  findByEmail(email: Email): Promise<User | null>;

  existsByEmail(email: Email): Promise<boolean>;

  findByEmailConfirmationToken(token: string): Promise<User | null>;

  findByPasswordResetToken(token: string): Promise<User | null>;

  /**
   * Retrieves one page of users, newest first.
   */
  findPage(
    criteria: UserSearchCriteria,
    page: PageRequest,
  ): Promise<{ items: User[]; totalCount: number }>;
}
