import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsNumber, IsOptional, IsString } from 'class-validator';
import { PAYMENT_PROVIDERS, PaymentProvider } from '@domain/value-objects';

export class CreatePaymentRequestDto {
  @ApiProperty()
  @IsString()
  bookingId!: string;

  @ApiProperty({ enum: PAYMENT_PROVIDERS })
  @IsIn(PAYMENT_PROVIDERS)
  provider!: PaymentProvider;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  providerTransactionId?: string | null;
}

export class PaymentSucceededRequestDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  providerTransactionId?: string;
}

export class PaymentFailedRequestDto {
  @ApiProperty({ example: 'Card declined' })
  @IsString()
  reason!: string;
}

export class RefundPaymentRequestDto {
  @ApiProperty({ example: 'Session cancelled by instructor' })
  @IsString()
  reason!: string;

  @ApiPropertyOptional({ description: 'Partial refund amount; full amount when omitted' })
  @IsOptional()
  @IsNumber()
  amount?: number;
}
