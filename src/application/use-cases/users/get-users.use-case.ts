import { Inject, Injectable } from '@nestjs/common';
import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { USER_ROLES, UserRole } from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, toPagedResult } from '../../common/paged-result';
import { Result, success } from '../../common/result';
import { UserListOutputDto, toUserOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { IUserRepositoryPort } from '../../ports';

export interface UserFilters {
  role?: UserRole;
  isActive?: boolean;
  search?: string;
  page?: number;
  pageSize?: number;
}

export class GetUsersQuery extends ResultQuery<UserListOutputDto> implements CacheableRequest {
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix: string;

  @IsOptional()
  @IsIn(USER_ROLES, { message: `Role must be one of: ${USER_ROLES.join(', ')}.` })
  readonly role?: UserRole;

  @IsOptional()
  @IsBoolean()
  readonly isActive?: boolean;

  @IsOptional()
  @IsString()
  readonly search?: string;

  @IsInt()
  @Min(0, { message: 'Page cannot be negative.' })
  readonly page: number;

  @IsInt()
  @Min(1, { message: `Page size must be between 1 and ${MAX_PAGE_SIZE}.` })
  @Max(MAX_PAGE_SIZE, { message: `Page size must be between 1 and ${MAX_PAGE_SIZE}.` })
  readonly pageSize: number;

  constructor(filters: UserFilters = {}) {
    super();
    this.role = filters.role;
    this.isActive = filters.isActive;
    this.search = filters.search;
    this.page = filters.page ?? 0;
    this.pageSize = filters.pageSize ?? DEFAULT_PAGE_SIZE;
    // Role listings are invalidated separately from the full listing
    this.cachePrefix = filters.role ? CachePrefixes.GetUsersByRole : CachePrefixes.GetAllUsers;
  }
}

@Injectable()
export class GetUsersHandler implements RequestHandler<GetUsersQuery, Result<UserListOutputDto>> {
  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
  ) {}

  async handle(query: GetUsersQuery): Promise<Result<UserListOutputDto>> {
    const page = { page: query.page, pageSize: query.pageSize };
    const { items, totalCount } = await this.userRepository.findPage(
      { role: query.role, isActive: query.isActive, search: query.search },
      page,
    );
    return success(toPagedResult(items.map((user) => toUserOutput(user)), totalCount, page));
  }
}
