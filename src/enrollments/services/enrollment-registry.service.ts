import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, QueryFailedError, Repository } from 'typeorm';
import { DomainError, ENROLLMENT_ERROR } from '../../common/errors/domain-error';
import { LoggerUtil } from '../../common/logger/LoggerUtil';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { Enrollment } from '../entities/enrollment.entity';
import { EnrollmentStatus } from '../enums/enrollment.enums';

const UNIQUE_VIOLATION = '23505';

export interface EnrollmentPage {
  data: Enrollment[];
  total: number;
}

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}

/**
 * Persistence for enrollments. Methods taking an EntityManager run inside
 * the caller's transaction; the rest use the default connection.
 */
@Injectable()
export class EnrollmentRegistryService {
  private readonly context = EnrollmentRegistryService.name;

  constructor(
    @InjectRepository(Enrollment)
    private readonly enrollmentRepository: Repository<Enrollment>,
  ) {}

  async findById(id: string): Promise<Enrollment | null> {
    return this.enrollmentRepository.findOne({ where: { id } });
  }

  async getById(id: string): Promise<Enrollment> {
    const enrollment = await this.findById(id);
    if (!enrollment) {
      throw new DomainError(ENROLLMENT_ERROR.ENROLLMENT_NOT_FOUND, API_RESPONSES.ENROLLMENT_NOT_FOUND);
    }
    return enrollment;
  }

  async findByUserAndCourse(userId: string, courseId: string): Promise<Enrollment | null> {
    return this.enrollmentRepository.findOne({ where: { userId, courseId } });
  }

  /** Row lock held until the surrounding transaction ends. */
  async lockById(manager: EntityManager, id: string): Promise<Enrollment> {
    const enrollment = await manager.getRepository(Enrollment).findOne({
      where: { id },
      lock: { mode: 'pessimistic_write' },
    });
    if (!enrollment) {
      throw new DomainError(ENROLLMENT_ERROR.ENROLLMENT_NOT_FOUND, API_RESPONSES.ENROLLMENT_NOT_FOUND);
    }
    return enrollment;
  }

  /**
   * @throws DomainError DUPLICATE_ENROLLMENT when the user already holds an
   * enrollment for the course
   */
  async insert(manager: EntityManager, enrollment: Enrollment): Promise<Enrollment> {
    try {
      return await manager.getRepository(Enrollment).save(enrollment);
    } catch (error) {
      if (isUniqueViolation(error)) {
        LoggerUtil.warn(
          `Duplicate enrollment for user ${enrollment.userId} in course ${enrollment.courseId}`,
          this.context,
        );
        throw new DomainError(ENROLLMENT_ERROR.DUPLICATE_ENROLLMENT, API_RESPONSES.ENROLLMENT_DUPLICATE, {
          userId: enrollment.userId,
          courseId: enrollment.courseId,
        });
      }
      throw error;
    }
  }

  async save(manager: EntityManager, enrollment: Enrollment): Promise<Enrollment> {
    return manager.getRepository(Enrollment).save(enrollment);
  }

  async listForUser(
    userId: string,
    status: EnrollmentStatus | undefined,
    page: number,
    limit: number,
  ): Promise<EnrollmentPage> {
    const [data, total] = await this.enrollmentRepository.findAndCount({
      where: status ? { userId, status } : { userId },
      order: { enrollmentDate: 'DESC' },
      skip: (page - 1) * limit,
      take: limit,
    });
    return { data, total };
  }

  /**
   * Claims one activation that is due for a retry. Rows locked by another
   * worker are skipped, so concurrent pollers never process the same row.
   */
  async claimNextDueActivation(manager: EntityManager, now: Date): Promise<Enrollment | null> {
    return manager
      .getRepository(Enrollment)
      .createQueryBuilder('enrollment')
      .where('enrollment.status = :status', { status: EnrollmentStatus.ACTIVATING })
      .andWhere('enrollment.activationAttempts < enrollment.maxRetries')
      .andWhere('(enrollment.nextRetryAt IS NULL OR enrollment.nextRetryAt <= :now)', { now })
      .orderBy('enrollment.nextRetryAt', 'ASC', 'NULLS FIRST')
      .setLock('pessimistic_write')
      .setOnLocked('skip_locked')
      .getOne();
  }
}
