import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosResponse } from 'axios';
import { PAYMENT_ERROR } from '../../common/errors/domain-error';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { HttpService } from '../../common/utils/http-service';
import { EnrollmentConfig } from '../../config/enrollment.config';
import { PaymentMethod } from '../enums/payment.enums';
import {
  ChargeRequest,
  ChargeResult,
  DetailsFor,
  PaymentGateway,
} from '../interfaces/payment-gateway.interface';

export interface GatewayServiceResponse {
  status?: string;
  transactionId?: string;
  errorCode?: string;
  message?: string;
}

const APPROVED_STATUSES = new Set(['approved', 'succeeded', 'completed']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Base for methods settled by the payment gateway service over HTTP.
 * 4xx answers are declines and a request that outlives
 * PAYMENT_GATEWAY_TIMEOUT_MS is a timeout. Network errors and 5xx answers
 * are thrown.
 */
export abstract class HttpPaymentGateway<M extends PaymentMethod> implements PaymentGateway<M> {
  abstract readonly method: M;
  protected abstract readonly path: string;
  protected readonly logger = new Logger(this.constructor.name);
  private readonly baseUrl: string | undefined;

  constructor(
    private readonly httpService: HttpService,
    configService: ConfigService,
    private readonly config: EnrollmentConfig,
  ) {
    this.baseUrl = configService.get<string>('PAYMENT_GATEWAY_URL');
  }

  isConfigured(): boolean {
    return Boolean(this.baseUrl);
  }

  protected abstract buildPayload(request: ChargeRequest, details: DetailsFor<M>): Record<string, unknown>;

  async charge(request: ChargeRequest, details: DetailsFor<M>): Promise<ChargeResult> {
    if (!this.baseUrl) {
      throw new Error('PAYMENT_GATEWAY_URL is not configured');
    }

    const timeoutMs = this.config.gateway.timeoutMs;
    let response: AxiosResponse<GatewayServiceResponse>;
    try {
      response = await this.httpService.post<GatewayServiceResponse>(
        `${this.baseUrl}${this.path}`,
        this.buildPayload(request, details),
        { headers: { 'Idempotency-Key': request.paymentId }, timeout: timeoutMs },
      );
    } catch (error) {
      if (axios.isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
        this.logger.warn(`Charge ${request.paymentId} timed out after ${timeoutMs} ms`);
        return {
          success: false,
          errorCode: PAYMENT_ERROR.GATEWAY_TIMEOUT,
          errorMessage: `${API_RESPONSES.PAYMENT_GATEWAY_TIMEOUT} (${timeoutMs} ms)`,
        };
      }
      throw error;
    }
    if (response.status >= 500) {
      throw new Error(`Payment gateway answered ${response.status} for charge ${request.paymentId}`);
    }
    const body = response.data ?? {};
    const rawResponse: Record<string, unknown> = { httpStatus: response.status, ...body };

    if (response.status < 300 && body.status && APPROVED_STATUSES.has(body.status.toLowerCase())) {
      return { success: true, transactionId: body.transactionId, rawResponse };
    }

    this.logger.warn(`Charge ${request.paymentId} declined with status ${response.status}`);
    return {
      success: false,
      errorCode: body.errorCode ?? 'PAYMENT_DECLINED',
      errorMessage: body.message ?? 'Payment was declined by the gateway',
      rawResponse,
    };
  }
}
