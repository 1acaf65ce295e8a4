import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { DomainError, ENROLLMENT_ERROR } from '../../common/errors/domain-error';
import { LoggerUtil } from '../../common/logger/LoggerUtil';
import { firstLessonUrl, LMSService } from '../../common/services/lms.service';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { ENROLLMENT_CONFIG, EnrollmentConfig } from '../../config/enrollment.config';
import { Enrollment } from '../entities/enrollment.entity';
import { EnrollmentPaymentStatus, EnrollmentStatus } from '../enums/enrollment.enums';
import { EnrollmentRegistryService } from './enrollment-registry.service';
import { applyTransition } from './enrollment-state-machine.service';

export interface ActivationResult {
  enrollmentId: string;
  status: EnrollmentStatus;
  granted: boolean;
  firstLessonUrl?: string;
  retryAvailable: boolean;
  activationAttempts: number;
  estimatedCompletion?: string;
}

/** Seconds to wait after the given number of failed attempts. */
export function computeRetryDelaySeconds(attempts: number, baseSeconds: number, capSeconds: number): number {
  const exponent = Math.max(0, attempts - 1);
  return Math.min(baseSeconds * 2 ** exponent, capSeconds);
}

export function canRetryActivation(enrollment: Enrollment, now: Date = new Date()): boolean {
  return (
    enrollment.status === EnrollmentStatus.ACTIVATING &&
    enrollment.activationAttempts < enrollment.maxRetries &&
    (enrollment.nextRetryAt === null || enrollment.nextRetryAt.getTime() <= now.getTime())
  );
}

/**
 * Grants course access through the LMS once payment is complete. Failed
 * attempts leave the enrollment in ACTIVATING with a backoff deadline for
 * the next try.
 */
@Injectable()
export class ActivationRetrierService {
  private readonly context = ActivationRetrierService.name;

  constructor(
    private readonly dataSource: DataSource,
    private readonly registry: EnrollmentRegistryService,
    private readonly lmsService: LMSService,
    @Inject(ENROLLMENT_CONFIG)
    private readonly config: EnrollmentConfig,
  ) {}

  async activate(enrollmentId: string): Promise<ActivationResult> {
    return this.dataSource.transaction(async (manager) => {
      const enrollment = await this.registry.lockById(manager, enrollmentId);
      return this.activateWithin(manager, enrollment);
    });
  }

  /**
   * @throws DomainError NO_RETRIES_AVAILABLE when attempts are exhausted or
   * the backoff deadline has not passed
   */
  async retryActivation(enrollmentId: string): Promise<ActivationResult> {
    return this.dataSource.transaction(async (manager) => {
      const enrollment = await this.registry.lockById(manager, enrollmentId);
      const now = new Date();
      if (!canRetryActivation(enrollment, now)) {
        throw new DomainError(ENROLLMENT_ERROR.NO_RETRIES_AVAILABLE, API_RESPONSES.ENROLLMENT_NO_RETRIES, {
          activationAttempts: enrollment.activationAttempts,
          maxRetries: enrollment.maxRetries,
          nextRetryAt: enrollment.nextRetryAt ? enrollment.nextRetryAt.toISOString() : null,
        });
      }
      return this.activateWithin(manager, enrollment, now);
    });
  }

  /**
   * One activation attempt on an enrollment the caller has already locked.
   */
  async activateWithin(
    manager: EntityManager,
    enrollment: Enrollment,
    now: Date = new Date(),
  ): Promise<ActivationResult> {
    if (enrollment.status === EnrollmentStatus.ACTIVE) {
      return this.result(enrollment, true, firstLessonUrl(enrollment.courseId));
    }

    if (
      enrollment.status !== EnrollmentStatus.ENROLLED &&
      enrollment.status !== EnrollmentStatus.ACTIVATING
    ) {
      throw new DomainError(
        ENROLLMENT_ERROR.NOT_ELIGIBLE_FOR_ACTIVATION,
        API_RESPONSES.ENROLLMENT_NOT_ELIGIBLE,
        { status: enrollment.status },
      );
    }
    if (enrollment.paymentStatus !== EnrollmentPaymentStatus.COMPLETED) {
      throw new DomainError(
        ENROLLMENT_ERROR.NOT_ELIGIBLE_FOR_ACTIVATION,
        API_RESPONSES.ENROLLMENT_PAYMENT_INCOMPLETE,
        { paymentStatus: enrollment.paymentStatus },
      );
    }

    // ACTIVATING -> ACTIVATING records the retry as a transition of its own
    applyTransition(enrollment, EnrollmentStatus.ACTIVATING, undefined, now);

    let lessonUrl: string | undefined;
    try {
      const provision = await this.lmsService.provisionAccess({
        enrollmentId: enrollment.id,
        userId: enrollment.userId,
        courseId: enrollment.courseId,
      });
      if (provision.provisioned) {
        lessonUrl = provision.firstLessonUrl ?? firstLessonUrl(enrollment.courseId);
      } else {
        LoggerUtil.warn(`LMS refused to provision enrollment ${enrollment.id}`, this.context);
      }
    } catch (error) {
      LoggerUtil.error(
        `Provisioning failed for enrollment ${enrollment.id}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
        this.context,
        { enrollmentId: enrollment.id },
      );
    }

    if (lessonUrl !== undefined) {
      applyTransition(enrollment, EnrollmentStatus.ACTIVE, undefined, now);
      enrollment.nextRetryAt = null;
      const saved = await this.registry.save(manager, enrollment);
      LoggerUtil.log(`Course access activated for enrollment ${saved.id}`, this.context, {
        enrollmentId: saved.id,
        userId: saved.userId,
        courseId: saved.courseId,
      });
      return this.result(saved, true, lessonUrl);
    }

    enrollment.activationAttempts += 1;
    const retryAvailable = enrollment.activationAttempts < enrollment.maxRetries;
    if (retryAvailable) {
      const delaySeconds = computeRetryDelaySeconds(
        enrollment.activationAttempts,
        this.config.activation.backoffBaseSeconds,
        this.config.activation.backoffCapSeconds,
      );
      enrollment.nextRetryAt = new Date(now.getTime() + delaySeconds * 1000);
    } else {
      enrollment.nextRetryAt = null;
      LoggerUtil.error(
        `Activation for enrollment ${enrollment.id} exhausted ${enrollment.maxRetries} attempts`,
        undefined,
        this.context,
        { enrollmentId: enrollment.id },
      );
    }

    const saved = await this.registry.save(manager, enrollment);
    return this.result(saved, false);
  }

  private result(enrollment: Enrollment, granted: boolean, lessonUrl?: string): ActivationResult {
    const retryAvailable = !granted && enrollment.activationAttempts < enrollment.maxRetries;
    return {
      enrollmentId: enrollment.id,
      status: enrollment.status,
      granted,
      firstLessonUrl: lessonUrl,
      retryAvailable,
      activationAttempts: enrollment.activationAttempts,
      estimatedCompletion:
        retryAvailable && enrollment.nextRetryAt ? enrollment.nextRetryAt.toISOString() : undefined,
    };
  }
}
