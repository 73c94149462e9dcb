import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes } from '../../caching';
import { Result, notFound, success } from '../../common/result';
import { PaymentOutputDto, toPaymentOutput } from '../../dtos';
import { CacheableRequest, RequestHandler, ResultQuery } from '../../pipeline';
import { IPaymentRepositoryPort } from '../../ports';

export class GetPaymentByIdQuery extends ResultQuery<PaymentOutputDto> implements CacheableRequest {
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix = CachePrefixes.GetPayments;

  @IsNotEmpty({ message: 'Payment ID is required.' })
  readonly paymentId: string;

  constructor(paymentId: string) {
    super();
    this.paymentId = paymentId;
  }
}

@Injectable()
export class GetPaymentByIdHandler
  implements RequestHandler<GetPaymentByIdQuery, Result<PaymentOutputDto>>
{
  constructor(
    @Inject('IPaymentRepository')
    private readonly paymentRepository: IPaymentRepositoryPort,
  ) {}

  async handle(query: GetPaymentByIdQuery): Promise<Result<PaymentOutputDto>> {
    const payment = await this.paymentRepository.findById(EntityId.fromString(query.paymentId));
    if (!payment) {
      return notFound(`Payment with ID ${query.paymentId} not found`);
    }
    return success(toPaymentOutput(payment));
  }
}

export class GetPaymentsByUserQuery
  extends ResultQuery<PaymentOutputDto[]>
  implements CacheableRequest
{
  readonly cacheDurationSeconds = 5 * 60;
  readonly cachePrefix = CachePrefixes.GetPaymentsByUser;

  @IsNotEmpty({ message: 'User ID is required.' })
  readonly userId: string;

  constructor(userId: string) {
    super();
    this.userId = userId;
  }
}

@Injectable()
export class GetPaymentsByUserHandler
  implements RequestHandler<GetPaymentsByUserQuery, Result<PaymentOutputDto[]>>
{
  constructor(
    @Inject('IPaymentRepository')
    private readonly paymentRepository: IPaymentRepositoryPort,
  ) {}

  async handle(query: GetPaymentsByUserQuery): Promise<Result<PaymentOutputDto[]>> {
    const payments = await this.paymentRepository.findByUser(EntityId.fromString(query.userId));
    return success(payments.map(toPaymentOutput));
  }
}
