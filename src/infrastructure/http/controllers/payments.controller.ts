import { Body, Controller, Get, Param, Patch, Post } from '@nestjs/common';
import { ApiNotFoundResponse, ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { PaymentOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import {
  CreatePaymentCommand,
  CreatePaymentHandler,
  GetPaymentByIdHandler,
  GetPaymentByIdQuery,
  GetPaymentsByUserHandler,
  GetPaymentsByUserQuery,
  MarkPaymentFailedCommand,
  MarkPaymentFailedHandler,
  MarkPaymentSucceededCommand,
  MarkPaymentSucceededHandler,
  RefundPaymentCommand,
  RefundPaymentHandler,
} from '@application/use-cases';
import {
  CreatePaymentRequestDto,
  PaymentFailedRequestDto,
  PaymentSucceededRequestDto,
  RefundPaymentRequestDto,
} from '../dtos/request';
import { unwrapResult } from '../result.mapper';

@ApiTags('Payments')
@Controller('api/v1/payments')
export class PaymentsController {
  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly createPayment: CreatePaymentHandler,
    private readonly markSucceeded: MarkPaymentSucceededHandler,
    private readonly markFailed: MarkPaymentFailedHandler,
    private readonly refundPayment: RefundPaymentHandler,
    private readonly getPaymentById: GetPaymentByIdHandler,
    private readonly getPaymentsByUser: GetPaymentsByUserHandler,
  ) {}

  @Get('user/:userId')
  @ApiOperation({ summary: 'List payments of a user' })
  @ApiParam({ name: 'userId', description: 'User ID' })
  async byUser(@Param('userId') userId: string): Promise<PaymentOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(new GetPaymentsByUserQuery(userId), this.getPaymentsByUser),
    );
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get payment by ID' })
  @ApiParam({ name: 'id', description: 'Payment ID' })
  @ApiNotFoundResponse({ description: 'Payment not found' })
  async getById(@Param('id') id: string): Promise<PaymentOutputDto> {
    return unwrapResult(await this.pipeline.send(new GetPaymentByIdQuery(id), this.getPaymentById));
  }

  @Post()
  @ApiOperation({
    summary: 'Start payment',
    description: 'Creates a pending payment for the booking amount and links it to the booking.',
  })
  async create(@Body() body: CreatePaymentRequestDto): Promise<PaymentOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new CreatePaymentCommand(body.bookingId, body.provider, body.providerTransactionId),
        this.createPayment,
      ),
    );
  }

  @Patch(':id/succeeded')
  @ApiOperation({ summary: 'Mark payment succeeded' })
  @ApiParam({ name: 'id', description: 'Payment ID' })
  async succeeded(
    @Param('id') id: string,
    @Body() body: PaymentSucceededRequestDto,
  ): Promise<PaymentOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new MarkPaymentSucceededCommand(id, body.providerTransactionId),
        this.markSucceeded,
      ),
    );
  }

  @Patch(':id/failed')
  @ApiOperation({ summary: 'Mark payment failed' })
  @ApiParam({ name: 'id', description: 'Payment ID' })
  async failed(
    @Param('id') id: string,
    @Body() body: PaymentFailedRequestDto,
  ): Promise<PaymentOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new MarkPaymentFailedCommand(id, body.reason), this.markFailed),
    );
  }

  @Post(':id/refund')
  @ApiOperation({ summary: 'Refund payment', description: 'Full refund unless an amount is given.' })
  @ApiParam({ name: 'id', description: 'Payment ID' })
  async refund(
    @Param('id') id: string,
    @Body() body: RefundPaymentRequestDto,
  ): Promise<PaymentOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new RefundPaymentCommand(id, body.reason, body.amount),
        this.refundPayment,
      ),
    );
  }
}
