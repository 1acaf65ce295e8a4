import { PaymentMethod } from '../enums/payment.enums';
import {
  ChargeRequest,
  ChargeResult,
  DetailsFor,
  PaymentGateway,
  PaymentGatewayRegistry,
} from '../interfaces/payment-gateway.interface';

type Outcome = { kind: 'result'; result: ChargeResult } | { kind: 'error'; error: Error } | { kind: 'hang' };

/**
 * Scripted gateway for specs. Outcomes are consumed in order; with none
 * queued a charge succeeds.
 */
export class FakePaymentGateway<M extends PaymentMethod> implements PaymentGateway<M> {
  readonly charges: Array<{ request: ChargeRequest; details: DetailsFor<M> }> = [];
  private readonly outcomes: Outcome[] = [];

  constructor(readonly method: M) {}

  isConfigured(): boolean {
    return true;
  }

  willSucceed(transactionId: string): this {
    this.outcomes.push({
      kind: 'result',
      result: { success: true, transactionId, rawResponse: { id: transactionId, status: 'succeeded' } },
    });
    return this;
  }

  willDecline(errorCode: string, errorMessage: string): this {
    this.outcomes.push({
      kind: 'result',
      result: { success: false, errorCode, errorMessage, rawResponse: { status: 'declined', errorCode } },
    });
    return this;
  }

  willThrow(error: Error): this {
    this.outcomes.push({ kind: 'error', error });
    return this;
  }

  willHang(): this {
    this.outcomes.push({ kind: 'hang' });
    return this;
  }

  async charge(request: ChargeRequest, details: DetailsFor<M>): Promise<ChargeResult> {
    this.charges.push({ request, details });
    const outcome = this.outcomes.shift();
    if (!outcome) {
      const transactionId = `fake-txn-${this.charges.length}`;
      return { success: true, transactionId, rawResponse: { id: transactionId, status: 'succeeded' } };
    }
    switch (outcome.kind) {
      case 'result':
        return outcome.result;
      case 'error':
        throw outcome.error;
      case 'hang':
        return new Promise<ChargeResult>(() => undefined);
    }
  }
}

export interface FakeGateways {
  card: FakePaymentGateway<PaymentMethod.CREDIT_CARD>;
  paypal: FakePaymentGateway<PaymentMethod.PAYPAL>;
  bankTransfer: FakePaymentGateway<PaymentMethod.BANK_TRANSFER>;
  registry: PaymentGatewayRegistry;
}

export function createFakeGateways(): FakeGateways {
  const card = new FakePaymentGateway(PaymentMethod.CREDIT_CARD);
  const paypal = new FakePaymentGateway(PaymentMethod.PAYPAL);
  const bankTransfer = new FakePaymentGateway(PaymentMethod.BANK_TRANSFER);
  return {
    card,
    paypal,
    bankTransfer,
    registry: {
      [PaymentMethod.CREDIT_CARD]: card,
      [PaymentMethod.PAYPAL]: paypal,
      [PaymentMethod.BANK_TRANSFER]: bankTransfer,
    },
  };
}
