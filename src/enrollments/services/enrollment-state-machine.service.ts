import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { COMMON_ERROR, DomainError, ENROLLMENT_ERROR } from '../../common/errors/domain-error';
import { LoggerUtil } from '../../common/logger/LoggerUtil';
import { LMSService } from '../../common/services/lms.service';
import { roundMoney } from '../../common/utils/decimal.transformer';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { ENROLLMENT_CONFIG, EnrollmentConfig } from '../../config/enrollment.config';
import { Coupon } from '../../coupons/entities/coupon.entity';
import { CouponService } from '../../coupons/services/coupon.service';
import { PaymentStatus } from '../../payments/enums/payment.enums';
import { PaymentRecordService } from '../../payments/services/payment-record.service';
import { Enrollment } from '../entities/enrollment.entity';
import { EnrollmentPaymentStatus, EnrollmentStatus } from '../enums/enrollment.enums';
import { EnrollmentRegistryService } from './enrollment-registry.service';

export const ALLOWED_TRANSITIONS: Readonly<Record<EnrollmentStatus, readonly EnrollmentStatus[]>> = {
  [EnrollmentStatus.PENDING]: [
    EnrollmentStatus.PAYMENT_PENDING,
    EnrollmentStatus.ENROLLED,
    EnrollmentStatus.CANCELLED,
  ],
  [EnrollmentStatus.PAYMENT_PENDING]: [
    EnrollmentStatus.ENROLLED,
    EnrollmentStatus.PAYMENT_PENDING,
    EnrollmentStatus.CANCELLED,
  ],
  [EnrollmentStatus.ENROLLED]: [EnrollmentStatus.ACTIVATING, EnrollmentStatus.CANCELLED],
  [EnrollmentStatus.ACTIVATING]: [
    EnrollmentStatus.ACTIVE,
    EnrollmentStatus.ACTIVATING,
    EnrollmentStatus.CANCELLED,
  ],
  [EnrollmentStatus.ACTIVE]: [],
  [EnrollmentStatus.CANCELLED]: [],
};

const NAME_PATTERN = /^[\p{L}\s\-']+$/u;
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export interface RegistrationInput {
  userId: string;
  courseId: string;
  fullName: string;
  email: string;
  discountCode?: string;
}

export function canTransition(from: EnrollmentStatus, to: EnrollmentStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Moves an enrollment along one edge and keeps the access flag and
 * timestamps in step with the new status. Mutates and returns the entity.
 *
 * @throws DomainError INVALID_TRANSITION for an edge not in ALLOWED_TRANSITIONS
 */
export function applyTransition(
  enrollment: Enrollment,
  to: EnrollmentStatus,
  paymentStatus?: EnrollmentPaymentStatus,
  now: Date = new Date(),
): Enrollment {
  const from = enrollment.status;
  if (!canTransition(from, to)) {
    throw new DomainError(
      ENROLLMENT_ERROR.INVALID_TRANSITION,
      `Cannot move enrollment from ${from} to ${to}`,
      { from, to },
    );
  }

  enrollment.status = to;
  if (paymentStatus !== undefined) {
    enrollment.paymentStatus = paymentStatus;
  }

  switch (to) {
    case EnrollmentStatus.ENROLLED:
    case EnrollmentStatus.ACTIVE:
      enrollment.accessGranted = true;
      enrollment.activationDate = enrollment.activationDate ?? now;
      break;
    case EnrollmentStatus.CANCELLED:
      enrollment.accessGranted = false;
      enrollment.cancelledAt = now;
      enrollment.nextRetryAt = null;
      break;
    case EnrollmentStatus.PENDING:
    case EnrollmentStatus.PAYMENT_PENDING:
      enrollment.accessGranted = false;
      break;
    case EnrollmentStatus.ACTIVATING:
      break;
  }
  return enrollment;
}

/**
 * @throws DomainError VALIDATION_ERROR listing every invalid field
 */
export function validateRegistration(input: RegistrationInput): { fullName: string; email: string } {
  const errors: Record<string, string[]> = {};
  const fullName = input.fullName.trim();
  const email = input.email.trim().toLowerCase();

  if (fullName.length < 2 || fullName.length > 100) {
    errors.fullName = ['Full name must be between 2 and 100 characters'];
  } else if (!NAME_PATTERN.test(fullName)) {
    errors.fullName = ['Full name can only contain letters, spaces, hyphens and apostrophes'];
  }

  if (email.length > 255 || !EMAIL_PATTERN.test(email)) {
    errors.email = ['Please enter a valid email address'];
  }

  const fields = Object.keys(errors);
  if (fields.length > 0) {
    throw new DomainError(COMMON_ERROR.VALIDATION_ERROR, errors[fields[0]][0], { errors });
  }
  return { fullName, email };
}

@Injectable()
export class EnrollmentStateMachineService {
  private readonly context = EnrollmentStateMachineService.name;

  constructor(
    private readonly dataSource: DataSource,
    private readonly registry: EnrollmentRegistryService,
    private readonly couponService: CouponService,
    private readonly paymentRecords: PaymentRecordService,
    private readonly lmsService: LMSService,
    @Inject(ENROLLMENT_CONFIG)
    private readonly config: EnrollmentConfig,
  ) {}

  /**
   * Validates and redeems the coupon and creates the enrollment in one
   * transaction. Free orders land in ENROLLED; everything else waits in
   * PAYMENT_PENDING.
   */
  async register(input: RegistrationInput): Promise<Enrollment> {
    const { fullName, email } = validateRegistration(input);

    const course = await this.lmsService.getCourse(input.courseId);
    if (!course) {
      throw new DomainError(ENROLLMENT_ERROR.COURSE_NOT_FOUND, API_RESPONSES.COURSE_NOT_FOUND, {
        courseId: input.courseId,
      });
    }

    const existing = await this.registry.findByUserAndCourse(input.userId, input.courseId);
    if (existing) {
      throw new DomainError(ENROLLMENT_ERROR.DUPLICATE_ENROLLMENT, API_RESPONSES.ENROLLMENT_DUPLICATE, {
        enrollmentId: existing.id,
      });
    }

    const paymentAmount = roundMoney(course.price);

    return this.dataSource.transaction(async (manager) => {
      // the coupon row stays locked until commit, so concurrent redemptions
      // see each other's usage
      let coupon: Coupon | undefined;
      if (input.discountCode) {
        const validation = await this.couponService.validate(
          input.discountCode,
          input.userId,
          paymentAmount,
          manager,
        );
        if (!validation.valid || !validation.coupon) {
          throw new DomainError(ENROLLMENT_ERROR.INVALID_DISCOUNT, validation.message, {
            discountCode: input.discountCode,
          });
        }
        coupon = validation.coupon;
      }
      const discount = coupon ? this.couponService.calculateDiscount(coupon, paymentAmount) : 0;
      const finalAmount = roundMoney(Math.max(0, paymentAmount - discount));

      const enrollment = manager.getRepository(Enrollment).create({
        userId: input.userId,
        courseId: input.courseId,
        fullName,
        email,
        paymentAmount,
        discountCode: coupon ? coupon.code : null,
        discountApplied: discount,
        finalAmount,
        currency: course.currency || this.config.currency,
        status: EnrollmentStatus.PENDING,
        paymentStatus: EnrollmentPaymentStatus.PENDING,
        accessGranted: false,
        enrollmentDate: new Date(),
        activationDate: null,
        activationAttempts: 0,
        maxRetries: this.config.activation.maxRetries,
        nextRetryAt: null,
        cancelledAt: null,
        cancellationReason: null,
      });

      if (finalAmount <= 0) {
        applyTransition(enrollment, EnrollmentStatus.ENROLLED, EnrollmentPaymentStatus.COMPLETED);
      } else {
        applyTransition(enrollment, EnrollmentStatus.PAYMENT_PENDING, EnrollmentPaymentStatus.PENDING);
      }

      const saved = await this.registry.insert(manager, enrollment);
      if (coupon) {
        await this.couponService.apply(manager, coupon, input.userId, paymentAmount, saved.id);
      }

      LoggerUtil.log(`Enrollment ${saved.id} created as ${saved.status}`, this.context, {
        enrollmentId: saved.id,
        userId: saved.userId,
        courseId: saved.courseId,
      });
      return saved;
    });
  }

  async transition(
    manager: EntityManager,
    enrollment: Enrollment,
    to: EnrollmentStatus,
    paymentStatus?: EnrollmentPaymentStatus,
  ): Promise<Enrollment> {
    const from = enrollment.status;
    applyTransition(enrollment, to, paymentStatus);
    const saved = await this.registry.save(manager, enrollment);
    if (from !== to) {
      LoggerUtil.log(`Enrollment ${saved.id}: ${from} -> ${to}`, this.context, {
        enrollmentId: saved.id,
      });
    }
    return saved;
  }

  /**
   * Cancels the enrollment. Pending payments are cancelled and completed ones
   * get a refund request on the ledger.
   */
  async cancel(enrollmentId: string, reason?: string): Promise<Enrollment> {
    return this.dataSource.transaction(async (manager) => {
      const enrollment = await this.registry.lockById(manager, enrollmentId);
      const cancellationReason = reason?.trim() || 'Cancelled by user';

      const paymentStatus =
        enrollment.paymentStatus === EnrollmentPaymentStatus.COMPLETED
          ? EnrollmentPaymentStatus.COMPLETED
          : EnrollmentPaymentStatus.CANCELLED;
      applyTransition(enrollment, EnrollmentStatus.CANCELLED, paymentStatus);
      enrollment.cancellationReason = cancellationReason;

      const pending = await this.paymentRecords.listByStatus(manager, enrollment.id, PaymentStatus.PENDING);
      for (const payment of pending) {
        await this.paymentRecords.markCancelled(manager, payment, cancellationReason);
      }
      const completed = await this.paymentRecords.listByStatus(
        manager,
        enrollment.id,
        PaymentStatus.COMPLETED,
      );
      for (const payment of completed) {
        await this.paymentRecords.requestRefund(manager, payment, cancellationReason);
      }

      const saved = await this.registry.save(manager, enrollment);
      LoggerUtil.log(`Enrollment ${saved.id} cancelled`, this.context, {
        enrollmentId: saved.id,
        userId: saved.userId,
      });
      return saved;
    });
  }
}
