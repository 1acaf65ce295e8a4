import { Inject, Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { DomainError, ENROLLMENT_ERROR, PAYMENT_ERROR } from '../../common/errors/domain-error';
import { LoggerUtil } from '../../common/logger/LoggerUtil';
import { LMSCourse, LMSProgressSummary, LMSService } from '../../common/services/lms.service';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { ENROLLMENT_CONFIG, EnrollmentConfig } from '../../config/enrollment.config';
import { Payment } from '../../payments/entities/payment.entity';
import { PaymentMethod, PaymentStatus, TransactionStatus, TransactionType } from '../../payments/enums/payment.enums';
import { ChargeResult, MaskedPaymentDetails } from '../../payments/interfaces/payment-gateway.interface';
import { PaymentGatewayAdapter } from '../../payments/services/payment-gateway.adapter';
import { PaymentRecordService } from '../../payments/services/payment-record.service';
import { EnrollmentCreatedDto } from '../dtos/create-enrollment.dto';
import { clampLimit, clampPage, EnrollmentListResponseDto } from '../dtos/enrollment-list.dto';
import { Enrollment } from '../entities/enrollment.entity';
import { AccessReasonCode, EnrollmentPaymentStatus, EnrollmentStatus } from '../enums/enrollment.enums';
import { ActivationResult, ActivationRetrierService } from './activation-retrier.service';
import { EnrollmentRegistryService } from './enrollment-registry.service';
import { EnrollmentStateMachineService, RegistrationInput } from './enrollment-state-machine.service';

export interface EnrollmentDetails {
  enrollment: Enrollment;
  course: LMSCourse | null;
  progress: LMSProgressSummary;
  payments: Payment[];
}

export interface CourseAccess {
  hasAccess: boolean;
  enrollmentId?: string;
  enrollmentStatus?: EnrollmentStatus;
  reasonCode?: AccessReasonCode;
  message?: string;
}

const ACCESS_STATUSES: ReadonlySet<EnrollmentStatus> = new Set([
  EnrollmentStatus.ENROLLED,
  EnrollmentStatus.ACTIVATING,
  EnrollmentStatus.ACTIVE,
]);

const LATE_CHARGE_REASON = 'Enrollment cancelled while the charge was in flight';
const SETTLEMENT_ATTEMPTS = 3;

/**
 * Caller-facing enrollment operations. Ownership is checked here; the state
 * machine and retrier work on enrollment ids alone.
 */
@Injectable()
export class EnrollmentService {
  private readonly context = EnrollmentService.name;

  constructor(
    private readonly dataSource: DataSource,
    private readonly registry: EnrollmentRegistryService,
    private readonly stateMachine: EnrollmentStateMachineService,
    private readonly retrier: ActivationRetrierService,
    private readonly gatewayAdapter: PaymentGatewayAdapter,
    private readonly paymentRecords: PaymentRecordService,
    private readonly lmsService: LMSService,
    @Inject(ENROLLMENT_CONFIG)
    private readonly config: EnrollmentConfig,
  ) {}

  async register(input: RegistrationInput): Promise<EnrollmentCreatedDto> {
    const enrollment = await this.stateMachine.register(input);
    const paymentRequired = enrollment.status === EnrollmentStatus.PAYMENT_PENDING;
    return {
      enrollment,
      paymentRequired,
      paymentUrl: paymentRequired ? `${this.config.paymentUrlBase}/${enrollment.id}` : undefined,
      accessImmediate: enrollment.accessGranted,
    };
  }

  /**
   * Charges the enrollment's final amount. The gateway call happens between
   * two transactions so no row lock is held while waiting on the network.
   *
   * @throws DomainError PAYMENT_FAILED with the gateway's answer in details
   */
  async processPayment(
    enrollmentId: string,
    userId: string,
    method: PaymentMethod,
    rawDetails: unknown,
  ): Promise<Enrollment> {
    this.gatewayAdapter.assertSupported(method);
    const details = this.gatewayAdapter.parseDetails(method, rawDetails);

    const { enrollment, payment } = await this.dataSource.transaction(async (manager) => {
      const locked = await this.registry.lockById(manager, enrollmentId);
      this.assertOwner(locked, userId);
      if (locked.status !== EnrollmentStatus.PAYMENT_PENDING) {
        throw new DomainError(ENROLLMENT_ERROR.PAYMENT_NOT_ALLOWED, API_RESPONSES.ENROLLMENT_NOT_PAYABLE, {
          status: locked.status,
        });
      }
      const inFlight = await this.paymentRecords.findPendingForEnrollment(manager, locked.id);
      if (inFlight) {
        throw new DomainError(PAYMENT_ERROR.PAYMENT_IN_PROGRESS, API_RESPONSES.PAYMENT_IN_PROGRESS, {
          paymentId: inFlight.id,
        });
      }
      const created = await this.paymentRecords.create(manager, {
        enrollmentId: locked.id,
        userId: locked.userId,
        method,
        amount: locked.finalAmount,
        currency: locked.currency,
      });
      return { enrollment: locked, payment: created };
    });

    const result = await this.gatewayAdapter.charge(
      {
        paymentId: payment.id,
        enrollmentId: enrollment.id,
        userId: enrollment.userId,
        amount: payment.amount,
        currency: payment.currency,
        description: `Enrollment in course ${enrollment.courseId}`,
      },
      details,
    );
    const masked = this.gatewayAdapter.maskDetails(details);

    const settled = await this.settleWithRetry(enrollmentId, payment.id, result, masked);

    if (!result.success) {
      throw this.paymentFailed(result);
    }
    LoggerUtil.log(`Payment ${payment.id} settled for enrollment ${settled.id}`, this.context, {
      enrollmentId: settled.id,
      paymentId: payment.id,
      status: settled.status,
    });
    return settled;
  }

  /**
   * Records a gateway answer. The charge has already happened, so a failed
   * write is tried again in a fresh transaction before giving up; the
   * payment would otherwise stay PENDING and block every later attempt.
   */
  private async settleWithRetry(
    enrollmentId: string,
    paymentId: string,
    result: ChargeResult,
    masked: MaskedPaymentDetails,
  ): Promise<Enrollment> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.settle(enrollmentId, paymentId, result, masked);
      } catch (error) {
        if (error instanceof DomainError || attempt >= SETTLEMENT_ATTEMPTS) {
          LoggerUtil.error(
            `Gateway answer for payment ${paymentId} not recorded: ${error instanceof Error ? error.message : String(error)}`,
            error instanceof Error ? error.stack : undefined,
            this.context,
            { enrollmentId, paymentId, transactionId: result.transactionId, success: result.success },
          );
          throw error;
        }
        LoggerUtil.warn(`Settling payment ${paymentId} failed (attempt ${attempt}), retrying`, this.context, {
          enrollmentId,
          paymentId,
          transactionId: result.transactionId,
        });
      }
    }
  }

  private async settle(
    enrollmentId: string,
    paymentId: string,
    result: ChargeResult,
    masked: MaskedPaymentDetails,
  ): Promise<Enrollment> {
    return this.dataSource.transaction(async (manager) => {
      const current = await this.registry.lockById(manager, enrollmentId);
      const stored = await this.paymentRecords.findById(manager, paymentId);

      if (stored.status !== PaymentStatus.PENDING) {
        // cancelled mid-flight: the payment row stays as cancel left it
        await this.paymentRecords.recordTransaction(
          manager,
          stored,
          TransactionType.CHARGE,
          result.success ? TransactionStatus.SUCCESS : TransactionStatus.FAILED,
          result,
        );
        if (result.success) {
          await this.paymentRecords.requestRefund(manager, stored, LATE_CHARGE_REASON, result.transactionId);
        }
        return current;
      }

      if (result.success) {
        await this.paymentRecords.markCompleted(manager, stored, result, masked);
        if (current.status === EnrollmentStatus.CANCELLED) {
          await this.paymentRecords.requestRefund(manager, stored, LATE_CHARGE_REASON);
          return current;
        }
        return this.stateMachine.transition(
          manager,
          current,
          EnrollmentStatus.ENROLLED,
          EnrollmentPaymentStatus.COMPLETED,
        );
      }

      await this.paymentRecords.markFailed(manager, stored, result, masked);
      if (current.status === EnrollmentStatus.PAYMENT_PENDING) {
        return this.stateMachine.transition(
          manager,
          current,
          EnrollmentStatus.PAYMENT_PENDING,
          EnrollmentPaymentStatus.FAILED,
        );
      }
      return current;
    });
  }

  async activate(enrollmentId: string, userId: string): Promise<ActivationResult> {
    this.assertOwner(await this.registry.getById(enrollmentId), userId);
    return this.retrier.activate(enrollmentId);
  }

  async retryActivation(enrollmentId: string, userId: string): Promise<ActivationResult> {
    this.assertOwner(await this.registry.getById(enrollmentId), userId);
    return this.retrier.retryActivation(enrollmentId);
  }

  async cancel(enrollmentId: string, userId: string, reason?: string): Promise<Enrollment> {
    this.assertOwner(await this.registry.getById(enrollmentId), userId);
    return this.stateMachine.cancel(enrollmentId, reason);
  }

  async getEnrollmentStatus(enrollmentId: string, userId: string): Promise<EnrollmentDetails> {
    const enrollment = await this.registry.getById(enrollmentId);
    this.assertOwner(enrollment, userId);

    const [course, progress, payments] = await Promise.all([
      this.lmsService.getCourse(enrollment.courseId),
      this.lmsService.getProgressSummary(enrollment.userId, enrollment.courseId),
      this.paymentRecords.listForEnrollment(enrollment.id),
    ]);
    return { enrollment, course, progress, payments };
  }

  /**
   * Pages through the caller's own enrollments. Another user's list is
   * answered as not found, like any enrollment the caller does not own.
   */
  async listUserEnrollments(
    callerId: string,
    userId: string,
    status: EnrollmentStatus | undefined,
    page?: number,
    limit?: number,
  ): Promise<EnrollmentListResponseDto> {
    if (callerId !== userId) {
      throw new DomainError(ENROLLMENT_ERROR.ENROLLMENT_NOT_FOUND, API_RESPONSES.ENROLLMENT_NOT_FOUND);
    }
    const currentPage = clampPage(page);
    const perPage = clampLimit(limit);
    const { data, total } = await this.registry.listForUser(userId, status, currentPage, perPage);
    const totalPages = Math.ceil(total / perPage);
    return {
      data,
      pagination: {
        currentPage,
        totalPages,
        totalItems: total,
        perPage,
        hasNext: currentPage < totalPages,
        hasPrev: currentPage > 1,
      },
    };
  }

  async checkCourseAccess(userId: string, courseId: string): Promise<CourseAccess> {
    const enrollment = await this.registry.findByUserAndCourse(userId, courseId);
    if (!enrollment) {
      return {
        hasAccess: false,
        reasonCode: AccessReasonCode.NOT_ENROLLED,
        message: API_RESPONSES.ACCESS_NOT_ENROLLED,
      };
    }

    if (enrollment.accessGranted && ACCESS_STATUSES.has(enrollment.status)) {
      return { hasAccess: true, enrollmentId: enrollment.id, enrollmentStatus: enrollment.status };
    }

    const pendingPayment =
      enrollment.status === EnrollmentStatus.PENDING ||
      enrollment.status === EnrollmentStatus.PAYMENT_PENDING;
    return {
      hasAccess: false,
      enrollmentId: enrollment.id,
      enrollmentStatus: enrollment.status,
      reasonCode: pendingPayment ? AccessReasonCode.PAYMENT_PENDING : AccessReasonCode.ENROLLMENT_EXPIRED,
      message: pendingPayment ? API_RESPONSES.ACCESS_PAYMENT_PENDING : API_RESPONSES.ACCESS_ENROLLMENT_EXPIRED,
    };
  }

  // foreign enrollments look the same as missing ones
  private assertOwner(enrollment: Enrollment, userId: string): void {
    if (enrollment.userId !== userId) {
      throw new DomainError(ENROLLMENT_ERROR.ENROLLMENT_NOT_FOUND, API_RESPONSES.ENROLLMENT_NOT_FOUND);
    }
  }

  private paymentFailed(result: ChargeResult): DomainError {
    const paymentError = result.errorMessage ?? API_RESPONSES.PAYMENT_FAILED;
    return new DomainError(PAYMENT_ERROR.PAYMENT_FAILED, paymentError, {
      paymentError,
      errorCode: result.errorCode ?? PAYMENT_ERROR.PAYMENT_FAILED,
      gatewayResponse: result.rawResponse ?? null,
    });
  }
}
