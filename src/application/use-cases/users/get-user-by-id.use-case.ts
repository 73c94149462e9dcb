import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { Result, notFound, success } from '../../common/result';
import { UserOutputDto, toUserOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { IUserRepositoryPort } from '../../ports';

export class GetUserByIdQuery extends ResultQuery<UserOutputDto> implements CacheableRequest {
  readonly cacheDurationSeconds = 15 * 60;
  readonly cachePrefix = CachePrefixes.GetUserById;

  @IsNotEmpty({ message: 'User ID is required.' })
  readonly userId: string;

  constructor(userId: string) {
    super();
    this.userId = userId;
  }
}

@Injectable()
export class GetUserByIdHandler implements RequestHandler<GetUserByIdQuery, Result<UserOutputDto>> {
  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
  ) {}

  async handle(query: GetUserByIdQuery): Promise<Result<UserOutputDto>> {
    const user = await this.userRepository.findById(EntityId.fromString(query.userId));
    if (!user) {
      return notFound(`User with ID ${query.userId} not found`);
    }
    return success(toUserOutput(user));
  }
}
