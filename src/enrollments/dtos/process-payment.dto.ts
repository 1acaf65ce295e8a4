import { ApiProperty } from '@nestjs/swagger';
import { IsEnum, IsObject } from 'class-validator';
import { PaymentMethod } from '../../payments/enums/payment.enums';

export class ProcessPaymentDto {
  @ApiProperty({ enum: PaymentMethod, example: PaymentMethod.CREDIT_CARD })
  @IsEnum(PaymentMethod, { message: 'Invalid payment method' })
  paymentMethod: PaymentMethod;

  // checked per method by PaymentGatewayAdapter.parseDetails
  @ApiProperty({
    type: 'object',
    additionalProperties: true,
    example: {
      cardNumber: '4111111111111111',
      cardExpiry: '12/30',
      cardCvv: '123',
      cardHolderName: 'Nguyen Van An',
    },
  })
  @IsObject({ message: 'Payment details are required' })
  paymentDetails: Record<string, unknown>;
}
