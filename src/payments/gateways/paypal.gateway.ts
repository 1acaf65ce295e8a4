import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '../../common/utils/http-service';
import { ENROLLMENT_CONFIG, EnrollmentConfig } from '../../config/enrollment.config';
import { PaymentMethod } from '../enums/payment.enums';
import { ChargeRequest, PaypalDetails } from '../interfaces/payment-gateway.interface';
import { HttpPaymentGateway } from './http-payment.gateway';

@Injectable()
export class PaypalGateway extends HttpPaymentGateway<PaymentMethod.PAYPAL> {
  readonly method = PaymentMethod.PAYPAL;
  protected readonly path = '/paypal/charges';

  constructor(
    httpService: HttpService,
    configService: ConfigService,
    @Inject(ENROLLMENT_CONFIG) config: EnrollmentConfig,
  ) {
    super(httpService, configService, config);
  }

  protected buildPayload(request: ChargeRequest, details: PaypalDetails): Record<string, unknown> {
    return {
      reference: request.paymentId,
      amount: request.amount,
      currency: request.currency,
      description: request.description,
      payerEmail: details.paypalEmail,
    };
  }
}
