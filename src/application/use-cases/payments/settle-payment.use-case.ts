import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { EntityId } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { PaymentOutputDto, toPaymentOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IPaymentRepositoryPort } from '../../ports';
import { NotificationWriter } from '../../services';
import { PAYMENT_QUERY_PREFIXES } from './payment-cache';

@InvalidatesCache(PAYMENT_QUERY_PREFIXES, 'Payment succeeded')
@InvalidatesCache(CachePrefixes.GetNotificationsByUser, 'Payment notification')
export class MarkPaymentSucceededCommand extends ResultCommand<PaymentOutputDto> {
  @IsNotEmpty({ message: 'Payment ID is required.' })
  readonly paymentId: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  readonly providerTransactionId?: string;

  constructor(paymentId: string, providerTransactionId?: string) {
    super();
    this.paymentId = paymentId;
    this.providerTransactionId = providerTransactionId;
  }
}

@InvalidatesCache(PAYMENT_QUERY_PREFIXES, 'Payment failed')
@InvalidatesCache(CachePrefixes.GetNotificationsByUser, 'Payment notification')
export class MarkPaymentFailedCommand extends ResultCommand<PaymentOutputDto> {
  @IsNotEmpty({ message: 'Payment ID is required.' })
  readonly paymentId: string;

  @IsNotEmpty({ message: 'Failure reason is required.' })
  @MaxLength(500, { message: 'Failure reason must not exceed 500 characters.' })
  readonly reason: string;

  constructor(paymentId: string, reason: string) {
    super();
    this.paymentId = paymentId;
    this.reason = reason;
  }
}

/**
 * Records a successful charge reported by the provider and tells the payer.
 */
@Injectable()
export class MarkPaymentSucceededHandler
  implements RequestHandler<MarkPaymentSucceededCommand, Result<PaymentOutputDto>>
{
  private readonly logger = new Logger(MarkPaymentSucceededHandler.name);

  constructor(
    @Inject('IPaymentRepository')
    private readonly paymentRepository: IPaymentRepositoryPort,
    private readonly notifications: NotificationWriter,
  ) {}

  handle(command: MarkPaymentSucceededCommand): Promise<Result<PaymentOutputDto>> {
    return fromDomain(async () => {
      const payment = await this.paymentRepository.findById(EntityId.fromString(command.paymentId));
      if (!payment) {
        return notFound(`Payment with ID ${command.paymentId} not found`);
      }

      payment.markSucceeded(command.providerTransactionId);
      await this.paymentRepository.save(payment);
      await this.notifications.notify({
        userId: payment.userId,
        type: 'payment_confirmation',
        title: 'Payment received',
        message: `We received your payment of ${payment.amount.format()}.`,
        relatedEntityType: 'Payment',
        relatedEntityId: payment.id.toString(),
      });

      this.logger.log(`Payment ${command.paymentId} succeeded`);
      return success(toPaymentOutput(payment));
    });
  }
}

@Injectable()
export class MarkPaymentFailedHandler
  implements RequestHandler<MarkPaymentFailedCommand, Result<PaymentOutputDto>>
{
  private readonly logger = new Logger(MarkPaymentFailedHandler.name);

  constructor(
    @Inject('IPaymentRepository')
    private readonly paymentRepository: IPaymentRepositoryPort,
    private readonly notifications: NotificationWriter,
  ) {}

  handle(command: MarkPaymentFailedCommand): Promise<Result<PaymentOutputDto>> {
    return fromDomain(async () => {
      const payment = await this.paymentRepository.findById(EntityId.fromString(command.paymentId));
      if (!payment) {
        return notFound(`Payment with ID ${command.paymentId} not found`);
      }

      payment.markFailed(command.reason);
      await this.paymentRepository.save(payment);
      await this.notifications.notify({
        userId: payment.userId,
        type: 'payment_failed',
        title: 'Payment failed',
        message: `Your payment of ${payment.amount.format()} failed: ${command.reason}`,
        relatedEntityType: 'Payment',
        relatedEntityId: payment.id.toString(),
      });

      this.logger.warn(`Payment ${command.paymentId} failed: ${command.reason}`);
      return success(toPaymentOutput(payment));
    });
  }
}
