import { PaymentMethod } from '../enums/payment.enums';

export const PAYMENT_GATEWAYS = 'PAYMENT_GATEWAYS';

export interface CreditCardDetails {
  method: PaymentMethod.CREDIT_CARD;
  cardNumber: string;
  cardExpiry: string;
  cardCvv: string;
  cardHolderName: string;
}

export interface PaypalDetails {
  method: PaymentMethod.PAYPAL;
  paypalEmail: string;
}

export interface BankTransferDetails {
  method: PaymentMethod.BANK_TRANSFER;
  bankAccount: string;
  bankCode: string;
}

/**
 * Method-specific details, discriminated on `method`.
 */
export type PaymentDetails = CreditCardDetails | PaypalDetails | BankTransferDetails;

export type DetailsFor<M extends PaymentMethod> = Extract<PaymentDetails, { method: M }>;

/**
 * The subset of the details that may be persisted on a payment row.
 */
export interface MaskedPaymentDetails {
  lastFourDigits: string | null;
  cardHolderName: string | null;
  paypalEmail: string | null;
  bankAccountLastFour: string | null;
  bankCode: string | null;
}

export interface ChargeRequest {
  paymentId: string;
  enrollmentId: string;
  userId: string;
  amount: number;
  currency: string;
  description?: string;
}

export interface ChargeResult {
  success: boolean;
  transactionId?: string;
  errorCode?: string;
  errorMessage?: string;
  rawResponse?: Record<string, unknown>;
}

/**
 * A gateway charges one payment method. Declined charges resolve with
 * `success: false`; thrown errors are treated as gateway errors by the adapter.
 */
export interface PaymentGateway<M extends PaymentMethod> {
  readonly method: M;
  isConfigured(): boolean;
  charge(request: ChargeRequest, details: DetailsFor<M>): Promise<ChargeResult>;
}

export type PaymentGatewayRegistry = {
  [M in PaymentMethod]?: PaymentGateway<M>;
};
