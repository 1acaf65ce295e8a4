import { Inject, Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { COMMON_ERROR, DomainError, PAYMENT_ERROR } from '../../common/errors/domain-error';
import { LoggerUtil } from '../../common/logger/LoggerUtil';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { ENROLLMENT_CONFIG, EnrollmentConfig } from '../../config/enrollment.config';
import {
  BankTransferDetailsDto,
  CreditCardDetailsDto,
  PaypalDetailsDto,
} from '../dtos/payment-details.dto';
import { PaymentMethod } from '../enums/payment.enums';
import {
  ChargeRequest,
  ChargeResult,
  MaskedPaymentDetails,
  PAYMENT_GATEWAYS,
  PaymentDetails,
  PaymentGatewayRegistry,
} from '../interfaces/payment-gateway.interface';

const REQUIRED_FIELDS: Record<PaymentMethod, readonly string[]> = {
  [PaymentMethod.CREDIT_CARD]: ['cardNumber', 'cardExpiry', 'cardCvv', 'cardHolderName'],
  [PaymentMethod.PAYPAL]: ['paypalEmail'],
  [PaymentMethod.BANK_TRANSFER]: ['bankAccount', 'bankCode'],
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === 'string' && value.trim() === '');

const lastFour = (value: string): string => value.slice(-4);

/**
 * Single entry point to the payment gateways. Details are checked before any
 * network call; every charge outcome, including timeouts and thrown errors,
 * comes back as a ChargeResult.
 */
@Injectable()
export class PaymentGatewayAdapter {
  private readonly context = PaymentGatewayAdapter.name;

  constructor(
    @Inject(PAYMENT_GATEWAYS)
    private readonly gateways: PaymentGatewayRegistry,
    @Inject(ENROLLMENT_CONFIG)
    private readonly config: EnrollmentConfig,
  ) {}

  /**
   * @throws DomainError MISSING_PAYMENT_DATA when a required field is absent
   * @throws DomainError VALIDATION_ERROR when a field is malformed
   */
  parseDetails(method: PaymentMethod, raw: unknown): PaymentDetails {
    if (!isRecord(raw)) {
      throw new DomainError(
        PAYMENT_ERROR.MISSING_PAYMENT_DATA,
        'Payment details are required',
        { field: 'paymentDetails' },
      );
    }

    const missing = REQUIRED_FIELDS[method].find((field) => isBlank(raw[field]));
    if (missing) {
      throw new DomainError(
        PAYMENT_ERROR.MISSING_PAYMENT_DATA,
        `Missing required payment field: ${missing}`,
        { field: missing },
      );
    }

    switch (method) {
      case PaymentMethod.CREDIT_CARD: {
        const dto = this.validated(CreditCardDetailsDto, raw);
        return {
          method,
          cardNumber: dto.cardNumber,
          cardExpiry: dto.cardExpiry,
          cardCvv: dto.cardCvv,
          cardHolderName: dto.cardHolderName,
        };
      }
      case PaymentMethod.PAYPAL: {
        const dto = this.validated(PaypalDetailsDto, raw);
        return { method, paypalEmail: dto.paypalEmail };
      }
      case PaymentMethod.BANK_TRANSFER: {
        const dto = this.validated(BankTransferDetailsDto, raw);
        return { method, bankAccount: dto.bankAccount, bankCode: dto.bankCode };
      }
    }
  }

  maskDetails(details: PaymentDetails): MaskedPaymentDetails {
    const masked: MaskedPaymentDetails = {
      lastFourDigits: null,
      cardHolderName: null,
      paypalEmail: null,
      bankAccountLastFour: null,
      bankCode: null,
    };
    switch (details.method) {
      case PaymentMethod.CREDIT_CARD:
        masked.lastFourDigits = lastFour(details.cardNumber);
        masked.cardHolderName = details.cardHolderName;
        break;
      case PaymentMethod.PAYPAL:
        masked.paypalEmail = details.paypalEmail;
        break;
      case PaymentMethod.BANK_TRANSFER:
        masked.bankAccountLastFour = lastFour(details.bankAccount);
        masked.bankCode = details.bankCode;
        break;
    }
    return masked;
  }

  isSupported(method: PaymentMethod): boolean {
    const gateway = this.gateways[method];
    return gateway !== undefined && gateway.isConfigured();
  }

  assertSupported(method: PaymentMethod): void {
    if (!this.isSupported(method)) {
      throw new DomainError(
        PAYMENT_ERROR.GATEWAY_NOT_CONFIGURED,
        `${API_RESPONSES.PAYMENT_GATEWAY_NOT_CONFIGURED}: ${method}`,
      );
    }
  }

  async charge(request: ChargeRequest, details: PaymentDetails): Promise<ChargeResult> {
    const timeoutMs = this.config.gateway.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<ChargeResult>((resolve) => {
      timer = setTimeout(
        () =>
          resolve({
            success: false,
            errorCode: PAYMENT_ERROR.GATEWAY_TIMEOUT,
            errorMessage: `${API_RESPONSES.PAYMENT_GATEWAY_TIMEOUT} (${timeoutMs} ms)`,
          }),
        timeoutMs,
      );
    });

    try {
      const result = await Promise.race([this.dispatch(request, details), timeout]);
      if (result.errorCode === PAYMENT_ERROR.GATEWAY_TIMEOUT) {
        LoggerUtil.warn(`Gateway timed out for payment ${request.paymentId}`, this.context, {
          paymentId: request.paymentId,
          enrollmentId: request.enrollmentId,
        });
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      LoggerUtil.error(
        `Gateway error for payment ${request.paymentId}: ${message}`,
        error instanceof Error ? error.stack : undefined,
        this.context,
        { paymentId: request.paymentId, enrollmentId: request.enrollmentId },
      );
      return {
        success: false,
        errorCode: PAYMENT_ERROR.GATEWAY_ERROR,
        errorMessage: message,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private dispatch(request: ChargeRequest, details: PaymentDetails): Promise<ChargeResult> {
    switch (details.method) {
      case PaymentMethod.CREDIT_CARD:
        return this.require(this.gateways[PaymentMethod.CREDIT_CARD]).charge(request, details);
      case PaymentMethod.PAYPAL:
        return this.require(this.gateways[PaymentMethod.PAYPAL]).charge(request, details);
      case PaymentMethod.BANK_TRANSFER:
        return this.require(this.gateways[PaymentMethod.BANK_TRANSFER]).charge(request, details);
    }
  }

  private require<G>(gateway: G | undefined): G {
    if (gateway === undefined) {
      throw new DomainError(
        PAYMENT_ERROR.GATEWAY_NOT_CONFIGURED,
        API_RESPONSES.PAYMENT_GATEWAY_NOT_CONFIGURED,
      );
    }
    return gateway;
  }

  private validated<T extends object>(cls: new () => T, raw: Record<string, unknown>): T {
    const dto = plainToInstance(cls, raw);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const fieldErrors = this.collectErrors(errors);
      const [firstField] = Object.keys(fieldErrors);
      throw new DomainError(
        COMMON_ERROR.VALIDATION_ERROR,
        fieldErrors[firstField][0],
        { errors: fieldErrors },
      );
    }
    return dto;
  }

  private collectErrors(errors: ValidationError[]): Record<string, string[]> {
    const fieldErrors: Record<string, string[]> = {};
    for (const error of errors) {
      fieldErrors[error.property] = Object.values(error.constraints ?? {});
    }
    return fieldErrors;
  }
}
