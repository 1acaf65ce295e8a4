import { createServer, Server } from 'http';
import { AddressInfo } from 'net';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AxiosError } from 'axios';
import { DEFAULT_ENROLLMENT_CONFIG, ENROLLMENT_CONFIG, EnrollmentConfig } from '../../config/enrollment.config';
import { PaypalGateway } from './paypal.gateway';
import { BankTransferGateway } from './bank-transfer.gateway';
import { HttpService } from '../../common/utils/http-service';
import { PaymentMethod } from '../enums/payment.enums';
import { ChargeRequest } from '../interfaces/payment-gateway.interface';

describe('HTTP payment gateways', () => {
  let paypal: PaypalGateway;
  let bankTransfer: BankTransferGateway;

  const mockHttpService = {
    post: jest.fn(),
  };

  const config: EnrollmentConfig = { ...DEFAULT_ENROLLMENT_CONFIG, gateway: { timeoutMs: 2500 } };

  const request: ChargeRequest = {
    paymentId: 'payment-1',
    enrollmentId: 'enrollment-1',
    userId: 'user-1',
    amount: 400000,
    currency: 'VND',
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PaypalGateway,
        BankTransferGateway,
        { provide: HttpService, useValue: mockHttpService },
        {
          provide: ConfigService,
          useValue: new ConfigService({ PAYMENT_GATEWAY_URL: 'http://gateway.test' }),
        },
        { provide: ENROLLMENT_CONFIG, useValue: config },
      ],
    }).compile();

    paypal = module.get<PaypalGateway>(PaypalGateway);
    bankTransfer = module.get<BankTransferGateway>(BankTransferGateway);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('posts the PayPal charge with the payment id as idempotency key', async () => {
    mockHttpService.post.mockResolvedValue({
      status: 200,
      data: { status: 'approved', transactionId: 'pp-42' },
    });

    const result = await paypal.charge(request, {
      method: PaymentMethod.PAYPAL,
      paypalEmail: 'student@example.com',
    });

    expect(mockHttpService.post).toHaveBeenCalledWith(
      'http://gateway.test/paypal/charges',
      {
        reference: 'payment-1',
        amount: 400000,
        currency: 'VND',
        description: undefined,
        payerEmail: 'student@example.com',
      },
      { headers: { 'Idempotency-Key': 'payment-1' }, timeout: 2500 },
    );
    expect(result).toEqual({
      success: true,
      transactionId: 'pp-42',
      rawResponse: { httpStatus: 200, status: 'approved', transactionId: 'pp-42' },
    });
  });

  it('reports a 4xx answer as a decline', async () => {
    mockHttpService.post.mockResolvedValue({
      status: 402,
      data: { status: 'declined', errorCode: 'INSUFFICIENT_FUNDS', message: 'Insufficient funds' },
    });

    const result = await bankTransfer.charge(request, {
      method: PaymentMethod.BANK_TRANSFER,
      bankAccount: '0123456789',
      bankCode: 'VCB',
    });

    expect(result.success).toBe(false);
    expect(result.errorCode).toBe('INSUFFICIENT_FUNDS');
    expect(result.errorMessage).toBe('Insufficient funds');
    expect(mockHttpService.post.mock.calls[0][0]).toBe('http://gateway.test/bank-transfers');
  });

  it('lets network errors propagate', async () => {
    mockHttpService.post.mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(
      paypal.charge(request, { method: PaymentMethod.PAYPAL, paypalEmail: 'student@example.com' }),
    ).rejects.toThrow('ECONNREFUSED');
  });

  it('reports a request that outlives the configured timeout as a gateway timeout', async () => {
    mockHttpService.post.mockRejectedValue(new AxiosError('timeout of 2500ms exceeded', 'ECONNABORTED'));

    const result = await paypal.charge(request, {
      method: PaymentMethod.PAYPAL,
      paypalEmail: 'student@example.com',
    });

    expect(result).toEqual({
      success: false,
      errorCode: 'GATEWAY_TIMEOUT',
      errorMessage: 'Payment gateway did not respond in time (2500 ms)',
    });
  });

  it('throws on a 5xx answer instead of treating it as a decline', async () => {
    mockHttpService.post.mockResolvedValue({ status: 503, data: { message: 'Service unavailable' } });

    await expect(
      bankTransfer.charge(request, {
        method: PaymentMethod.BANK_TRANSFER,
        bankAccount: '0123456789',
        bankCode: 'VCB',
      }),
    ).rejects.toThrow('Payment gateway answered 503 for charge payment-1');
  });

  it('is configured only with a gateway url', () => {
    expect(paypal.isConfigured()).toBe(true);
    expect(new PaypalGateway(new HttpService(), new ConfigService({}), config).isConfigured()).toBe(false);
  });

  describe('with the real HTTP client', () => {
    let server: Server;
    let baseUrl: string;

    beforeEach(async () => {
      // accepts connections and never answers
      server = createServer(() => undefined);
      await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
      const { port } = server.address() as AddressInfo;
      baseUrl = `http://127.0.0.1:${port}`;
    });

    afterEach(async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('gives up after PAYMENT_GATEWAY_TIMEOUT_MS', async () => {
      const gateway = new PaypalGateway(
        new HttpService(),
        new ConfigService({ PAYMENT_GATEWAY_URL: baseUrl }),
        { ...DEFAULT_ENROLLMENT_CONFIG, gateway: { timeoutMs: 100 } },
      );

      const startedAt = Date.now();
      const result = await gateway.charge(request, {
        method: PaymentMethod.PAYPAL,
        paypalEmail: 'student@example.com',
      });

      expect(result.errorCode).toBe('GATEWAY_TIMEOUT');
      expect(Date.now() - startedAt).toBeLessThan(5000);
    });
  });
});
