import { Logger, Module, OnModuleInit } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { HttpService } from '../common/utils/http-service';
import { Payment } from './entities/payment.entity';
import { PaymentTransaction } from './entities/payment-transaction.entity';
import { PaymentMethod } from './enums/payment.enums';
import { PAYMENT_GATEWAYS, PaymentGatewayRegistry } from './interfaces/payment-gateway.interface';
import { StripeCardGateway } from './gateways/stripe-card.gateway';
import { PaypalGateway } from './gateways/paypal.gateway';
import { BankTransferGateway } from './gateways/bank-transfer.gateway';
import { PaymentGatewayAdapter } from './services/payment-gateway.adapter';
import { PaymentRecordService } from './services/payment-record.service';

export function buildGatewayRegistry(
  stripe: StripeCardGateway,
  paypal: PaypalGateway,
  bankTransfer: BankTransferGateway,
): PaymentGatewayRegistry {
  const registry: PaymentGatewayRegistry = {};
  if (stripe.isConfigured()) {
    registry[PaymentMethod.CREDIT_CARD] = stripe;
  }
  if (paypal.isConfigured()) {
    registry[PaymentMethod.PAYPAL] = paypal;
  }
  if (bankTransfer.isConfigured()) {
    registry[PaymentMethod.BANK_TRANSFER] = bankTransfer;
  }
  return registry;
}

/**
 * Payment attempts, their ledger and the gateways that settle them.
 * Gateways without credentials are left out of the registry, and charges for
 * their method are refused up front.
 */
@Module({
  imports: [TypeOrmModule.forFeature([Payment, PaymentTransaction])],
  providers: [
    HttpService,
    StripeCardGateway,
    PaypalGateway,
    BankTransferGateway,
    {
      provide: PAYMENT_GATEWAYS,
      useFactory: buildGatewayRegistry,
      inject: [StripeCardGateway, PaypalGateway, BankTransferGateway],
    },
    PaymentGatewayAdapter,
    PaymentRecordService,
  ],
  exports: [PaymentGatewayAdapter, PaymentRecordService],
})
export class PaymentsModule implements OnModuleInit {
  private readonly logger = new Logger(PaymentsModule.name);

  constructor(private readonly gatewayAdapter: PaymentGatewayAdapter) {}

  onModuleInit() {
    const enabled = Object.values(PaymentMethod).filter((method) =>
      this.gatewayAdapter.isSupported(method),
    );
    this.logger.log(`Payment methods enabled: ${enabled.length ? enabled.join(', ') : 'none'}`);
  }
}
