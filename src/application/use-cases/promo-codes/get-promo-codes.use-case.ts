import { Inject, Injectable } from '@nestjs/common';
import { IsBoolean } from 'class-validator';
import { CachePrefixes } from '../../caching';
import { Result, success } from '../../common/result';
import { PromoCodeOutputDto, toPromoCodeOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { IPromoCodeRepositoryPort } from '../../ports';

export class GetPromoCodesQuery
  extends ResultQuery<PromoCodeOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 10 * 60;
  readonly cachePrefix = CachePrefixes.GetPromoCodes;

  @IsBoolean()
  readonly activeOnly: boolean;

  constructor(activeOnly = false) {
    super();
    this.activeOnly = activeOnly;
  }
}

@Injectable()
export class GetPromoCodesHandler
  implements RequestHandler<GetPromoCodesQuery, Result<PromoCodeOutputDto[]>>
{
  constructor(
    @Inject('IPromoCodeRepository')
    private readonly promoCodeRepository: IPromoCodeRepositoryPort,
  ) {}

  async handle(query: GetPromoCodesQuery): Promise<Result<PromoCodeOutputDto[]>> {
    const promoCodes = await this.promoCodeRepository.findAll(query.activeOnly);
    return success(promoCodes.map(toPromoCodeOutput));
  }
}
