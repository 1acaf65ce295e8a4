import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Stripe from 'stripe';
import { ENROLLMENT_CONFIG, EnrollmentConfig } from '../../config/enrollment.config';
import { PaymentMethod } from '../enums/payment.enums';
import {
  ChargeRequest,
  ChargeResult,
  CreditCardDetails,
  PaymentGateway,
} from '../interfaces/payment-gateway.interface';

interface StripeLikeError {
  type: string;
  code?: string;
  decline_code?: string;
  message: string;
}

const isStripeError = (error: unknown): error is StripeLikeError =>
  error instanceof Error && 'type' in error && typeof error.type === 'string';

/**
 * Card payments through Stripe: a PaymentMethod is created from the card and
 * a PaymentIntent is confirmed against it in the same call.
 */
@Injectable()
export class StripeCardGateway implements PaymentGateway<PaymentMethod.CREDIT_CARD> {
  readonly method = PaymentMethod.CREDIT_CARD;
  private readonly logger = new Logger(StripeCardGateway.name);
  private readonly stripe: Stripe | null;

  // Zero-decimal currencies (no decimal places)
  private readonly zeroDecimalCurrencies = new Set([
    'bif', 'clp', 'djf', 'gnf', 'jpy', 'kmf', 'krw', 'mga', 'pyg', 'rwf', 'ugx', 'vnd', 'vuv', 'xaf', 'xof', 'xpf',
  ]);

  private readonly threeDecimalCurrencies = new Set(['bhd', 'jod', 'kwd', 'omr', 'tnd']);

  constructor(
    private readonly configService: ConfigService,
    @Inject(ENROLLMENT_CONFIG) config: EnrollmentConfig,
  ) {
    const stripeSecretKey = this.configService.get<string>('STRIPE_SECRET_KEY');
    this.stripe = stripeSecretKey
      ? new Stripe(stripeSecretKey, { apiVersion: '2023-10-16', timeout: config.gateway.timeoutMs })
      : null;
  }

  isConfigured(): boolean {
    return this.stripe !== null;
  }

  getCurrencyExponent(currency: string): number {
    const normalizedCurrency = currency.toLowerCase();
    if (this.zeroDecimalCurrencies.has(normalizedCurrency)) {
      return 0;
    }
    if (this.threeDecimalCurrencies.has(normalizedCurrency)) {
      return 3;
    }
    return 2;
  }

  /**
   * Amount in the smallest currency unit, as Stripe expects it.
   */
  toUnitAmount(amount: number, currency: string): number {
    return Math.round(amount * Math.pow(10, this.getCurrencyExponent(currency)));
  }

  async charge(request: ChargeRequest, details: CreditCardDetails): Promise<ChargeResult> {
    if (!this.stripe) {
      throw new Error('STRIPE_SECRET_KEY is not configured');
    }

    const [expMonth, expYear] = details.cardExpiry.split('/').map((part) => Number.parseInt(part, 10));
    const currency = request.currency.toLowerCase();

    try {
      const paymentMethod = await this.stripe.paymentMethods.create({
        type: 'card',
        card: {
          number: details.cardNumber,
          exp_month: expMonth,
          exp_year: 2000 + expYear,
          cvc: details.cardCvv,
        },
        billing_details: { name: details.cardHolderName },
      });

      const intent = await this.stripe.paymentIntents.create(
        {
          amount: this.toUnitAmount(request.amount, currency),
          currency,
          payment_method: paymentMethod.id,
          payment_method_types: ['card'],
          confirm: true,
          description: request.description,
          metadata: {
            paymentId: request.paymentId,
            enrollmentId: request.enrollmentId,
            userId: request.userId,
          },
        },
        { idempotencyKey: request.paymentId },
      );

      this.logger.log(`Stripe payment intent ${intent.id} is ${intent.status}`);

      const rawResponse = { id: intent.id, status: intent.status, amount: intent.amount };
      if (intent.status === 'succeeded') {
        return { success: true, transactionId: intent.id, rawResponse };
      }
      return {
        success: false,
        errorCode: 'PAYMENT_NOT_COMPLETED',
        errorMessage: `Payment intent ended in status ${intent.status}`,
        rawResponse,
      };
    } catch (error) {
      if (isStripeError(error) && error.type === 'StripeCardError') {
        return {
          success: false,
          errorCode: error.code ?? 'card_declined',
          errorMessage: error.message,
          rawResponse: { type: error.type, declineCode: error.decline_code ?? null },
        };
      }
      throw error;
    }
  }
}
