import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty, IsNumber, IsOptional, MaxLength, Min } from 'class-validator';
import { EntityId, Money } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { PaymentOutputDto, toPaymentOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IPaymentRepositoryPort } from '../../ports';
import { PAYMENT_QUERY_PREFIXES } from './payment-cache';

@InvalidatesCache(PAYMENT_QUERY_PREFIXES, 'Payment refunded')
export class RefundPaymentCommand extends ResultCommand<PaymentOutputDto> {
  @IsNotEmpty({ message: 'Payment ID is required.' })
  readonly paymentId: string;

  @IsNotEmpty({ message: 'Refund reason is required.' })
  @MaxLength(500, { message: 'Refund reason must not exceed 500 characters.' })
  readonly reason: string;

  /** Full payment amount when omitted */
  @IsOptional()
  @IsNumber({}, { message: 'Refund amount must be a number.' })
  @Min(0.01, { message: 'Refund amount must be positive.' })
  readonly amount?: number;

  constructor(paymentId: string, reason: string, amount?: number) {
    super();
    this.paymentId = paymentId;
    this.reason = reason;
    this.amount = amount;
  }
}

@Injectable()
export class RefundPaymentHandler
  implements RequestHandler<RefundPaymentCommand, Result<PaymentOutputDto>>
{
  private readonly logger = new Logger(RefundPaymentHandler.name);

  constructor(
    @Inject('IPaymentRepository')
    private readonly paymentRepository: IPaymentRepositoryPort,
  ) {}

  handle(command: RefundPaymentCommand): Promise<Result<PaymentOutputDto>> {
    return fromDomain(async () => {
      const payment = await this.paymentRepository.findById(EntityId.fromString(command.paymentId));
      if (!payment) {
        return notFound(`Payment with ID ${command.paymentId} not found`);
      }

      const amount =
        command.amount !== undefined
          ? Money.of(command.amount, payment.amount.currency)
          : payment.amount;
      payment.refund(amount, command.reason);
      await this.paymentRepository.save(payment);
      this.logger.log(`Refunded ${amount.format()} of payment ${command.paymentId}`);

      return success(toPaymentOutput(payment));
    });
  }
}
