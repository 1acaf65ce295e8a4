import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { DomainError, PAYMENT_ERROR } from '../../common/errors/domain-error';
import { LoggerUtil } from '../../common/logger/LoggerUtil';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { Payment } from '../entities/payment.entity';
import { PaymentTransaction } from '../entities/payment-transaction.entity';
import {
  PaymentMethod,
  PaymentStatus,
  TransactionStatus,
  TransactionType,
} from '../enums/payment.enums';
import { ChargeResult, MaskedPaymentDetails } from '../interfaces/payment-gateway.interface';

export interface NewPayment {
  enrollmentId: string;
  userId: string;
  method: PaymentMethod;
  amount: number;
  currency: string;
}

export function assertPending(payment: Payment): void {
  if (payment.status !== PaymentStatus.PENDING) {
    throw new DomainError(
      PAYMENT_ERROR.PAYMENT_ALREADY_FINALIZED,
      `${API_RESPONSES.PAYMENT_ALREADY_FINALIZED}: ${payment.id} is ${payment.status}`,
    );
  }
}

/**
 * Payment rows and their transaction ledger. Every write takes the caller's
 * EntityManager so it commits or rolls back with the enrollment change.
 */
@Injectable()
export class PaymentRecordService {
  private readonly context = PaymentRecordService.name;

  constructor(
    @InjectRepository(Payment)
    private readonly paymentRepository: Repository<Payment>,
  ) {}

  async create(manager: EntityManager, input: NewPayment): Promise<Payment> {
    const repository = manager.getRepository(Payment);
    const payment = repository.create({
      ...input,
      status: PaymentStatus.PENDING,
      gatewayTransactionId: null,
      gatewayResponse: null,
      errorCode: null,
      errorMessage: null,
      processedAt: null,
    });
    const saved = await repository.save(payment);
    LoggerUtil.log(`Payment ${saved.id} created`, this.context, {
      paymentId: saved.id,
      enrollmentId: saved.enrollmentId,
      userId: saved.userId,
    });
    return saved;
  }

  async findById(manager: EntityManager, id: string): Promise<Payment> {
    const payment = await manager.getRepository(Payment).findOne({ where: { id } });
    if (!payment) {
      throw new DomainError(PAYMENT_ERROR.PAYMENT_NOT_FOUND, `Payment ${id} not found`);
    }
    return payment;
  }

  async findPendingForEnrollment(
    manager: EntityManager,
    enrollmentId: string,
  ): Promise<Payment | null> {
    return manager.getRepository(Payment).findOne({
      where: { enrollmentId, status: PaymentStatus.PENDING },
    });
  }

  async listByStatus(
    manager: EntityManager,
    enrollmentId: string,
    status: PaymentStatus,
  ): Promise<Payment[]> {
    return manager.getRepository(Payment).find({ where: { enrollmentId, status } });
  }

  async listForEnrollment(enrollmentId: string): Promise<Payment[]> {
    return this.paymentRepository.find({
      where: { enrollmentId },
      order: { createdAt: 'DESC' },
    });
  }

  async markCompleted(
    manager: EntityManager,
    payment: Payment,
    result: ChargeResult,
    masked: MaskedPaymentDetails,
  ): Promise<Payment> {
    assertPending(payment);
    Object.assign(payment, masked, {
      status: PaymentStatus.COMPLETED,
      gatewayTransactionId: result.transactionId ?? null,
      gatewayResponse: result.rawResponse ?? null,
      errorCode: null,
      errorMessage: null,
      processedAt: new Date(),
    });
    const saved = await manager.getRepository(Payment).save(payment);
    await this.recordTransaction(manager, saved, TransactionType.CHARGE, TransactionStatus.SUCCESS, result);
    return saved;
  }

  async markFailed(
    manager: EntityManager,
    payment: Payment,
    result: ChargeResult,
    masked: MaskedPaymentDetails,
  ): Promise<Payment> {
    assertPending(payment);
    Object.assign(payment, masked, {
      status: PaymentStatus.FAILED,
      gatewayResponse: result.rawResponse ?? null,
      errorCode: result.errorCode ?? PAYMENT_ERROR.PAYMENT_FAILED,
      errorMessage: result.errorMessage ?? API_RESPONSES.PAYMENT_FAILED,
      processedAt: new Date(),
    });
    const saved = await manager.getRepository(Payment).save(payment);
    await this.recordTransaction(manager, saved, TransactionType.CHARGE, TransactionStatus.FAILED, result);
    LoggerUtil.warn(`Payment ${saved.id} failed: ${saved.errorCode}`, this.context, {
      paymentId: saved.id,
      enrollmentId: saved.enrollmentId,
    });
    return saved;
  }

  async markCancelled(manager: EntityManager, payment: Payment, reason: string): Promise<Payment> {
    assertPending(payment);
    payment.status = PaymentStatus.CANCELLED;
    payment.errorMessage = reason;
    payment.processedAt = new Date();
    return manager.getRepository(Payment).save(payment);
  }

  /**
   * Appends a refund request for operators to reconcile. No refund is issued.
   */
  async requestRefund(
    manager: EntityManager,
    payment: Payment,
    reason: string,
    transactionId?: string,
  ): Promise<PaymentTransaction> {
    LoggerUtil.warn(`Refund requested for payment ${payment.id}: ${reason}`, this.context, {
      paymentId: payment.id,
      enrollmentId: payment.enrollmentId,
    });
    return this.recordTransaction(
      manager,
      payment,
      TransactionType.REFUND_REQUESTED,
      TransactionStatus.PENDING,
      {
        success: true,
        transactionId: transactionId ?? payment.gatewayTransactionId ?? undefined,
        rawResponse: { reason },
      },
    );
  }

  async recordTransaction(
    manager: EntityManager,
    payment: Payment,
    type: TransactionType,
    status: TransactionStatus,
    result?: ChargeResult,
  ): Promise<PaymentTransaction> {
    const repository = manager.getRepository(PaymentTransaction);
    const transaction = repository.create({
      paymentId: payment.id,
      type,
      status,
      amount: payment.amount,
      externalTransactionId: result?.transactionId ?? null,
      gatewayResponse: result?.rawResponse ?? null,
    });
    return repository.save(transaction);
  }
}
