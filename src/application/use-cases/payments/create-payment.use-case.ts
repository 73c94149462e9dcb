import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { Payment } from '@domain/entities';
import { EntityId, PAYMENT_PROVIDERS, PaymentProvider } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, conflict, failure, fromDomain, notFound, success } from '../../common/result';
import { PaymentOutputDto, toPaymentOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IBookingRepositoryPort, IPaymentRepositoryPort } from '../../ports';
import { PAYMENT_QUERY_PREFIXES } from './payment-cache';

@InvalidatesCache(PAYMENT_QUERY_PREFIXES, 'New payment')
@InvalidatesCache(
  [CachePrefixes.GetBookings, CachePrefixes.GetBookingsByUser, CachePrefixes.GetBookingsByInstructor],
  'Payment assigned to booking',
)
export class CreatePaymentCommand extends ResultCommand<PaymentOutputDto> {
  @IsNotEmpty({ message: 'Booking ID is required.' })
  readonly bookingId: string;

  @IsIn(PAYMENT_PROVIDERS, { message: `Provider must be one of: ${PAYMENT_PROVIDERS.join(', ')}.` })
  readonly provider: PaymentProvider;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  readonly providerTransactionId?: string | null;

  constructor(bookingId: string, provider: PaymentProvider, providerTransactionId?: string | null) {
    super();
    this.bookingId = bookingId;
    this.provider = provider;
    this.providerTransactionId = providerTransactionId;
  }
}

/**
 * Opens a pending payment for the booking's net amount and links it to the booking.
 */
@Injectable()
export class CreatePaymentHandler
  implements RequestHandler<CreatePaymentCommand, Result<PaymentOutputDto>>
{
  private readonly logger = new Logger(CreatePaymentHandler.name);

  constructor(
    @Inject('IPaymentRepository')
    private readonly paymentRepository: IPaymentRepositoryPort,
    @Inject('IBookingRepository')
    private readonly bookingRepository: IBookingRepositoryPort,
  ) {}

  handle(command: CreatePaymentCommand): Promise<Result<PaymentOutputDto>> {
    return fromDomain(async () => {
      const booking = await this.bookingRepository.findById(EntityId.fromString(command.bookingId));
      if (!booking) {
        return notFound(`Booking with ID ${command.bookingId} not found`);
      }
      if (!booking.isActive()) {
        return failure('Payments can only be created for active bookings.');
      }
      if (booking.paymentId !== null) {
        return conflict('Booking already has a payment assigned');
      }

      const payment = Payment.create({
        bookingId: booking.id,
        userId: booking.studentId,
        amount: booking.amount,
        provider: command.provider,
        providerTransactionId: command.providerTransactionId ?? null,
      });
      booking.assignPayment(payment.id);

      await this.paymentRepository.save(payment);
      await this.bookingRepository.save(booking);
      this.logger.log(`Payment ${payment.id.toString()} created for booking ${command.bookingId}`);

      return success(toPaymentOutput(payment));
    });
  }
}
