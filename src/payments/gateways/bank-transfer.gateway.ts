import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '../../common/utils/http-service';
import { ENROLLMENT_CONFIG, EnrollmentConfig } from '../../config/enrollment.config';
import { PaymentMethod } from '../enums/payment.enums';
import { BankTransferDetails, ChargeRequest } from '../interfaces/payment-gateway.interface';
import { HttpPaymentGateway } from './http-payment.gateway';

@Injectable()
export class BankTransferGateway extends HttpPaymentGateway<PaymentMethod.BANK_TRANSFER> {
  readonly method = PaymentMethod.BANK_TRANSFER;
  protected readonly path = '/bank-transfers';

  constructor(
    httpService: HttpService,
    configService: ConfigService,
    @Inject(ENROLLMENT_CONFIG) config: EnrollmentConfig,
  ) {
    super(httpService, configService, config);
  }

  protected buildPayload(request: ChargeRequest, details: BankTransferDetails): Record<string, unknown> {
    return {
      reference: request.paymentId,
      amount: request.amount,
      currency: request.currency,
      description: request.description,
      bankAccount: details.bankAccount,
      bankCode: details.bankCode,
    };
  }
}
