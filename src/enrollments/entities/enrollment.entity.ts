import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  Unique,
} from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { decimalTransformer } from '../../common/utils/decimal.transformer';
import { EnrollmentPaymentStatus, EnrollmentStatus } from '../enums/enrollment.enums';

/**
 * A user's registration for a course. User, course and amount columns are
 * written once; everything else changes only through state transitions.
 */
@Entity({ name: 'enrollments' })
@Unique('uq_enrollments_user_course', ['userId', 'courseId'])
@Index(['status', 'nextRetryAt'])
export class Enrollment {
  @ApiProperty()
  @PrimaryGeneratedColumn('uuid')
  id: string;

  @ApiProperty()
  @Column({ type: 'varchar', length: 100, name: 'user_id' })
  userId: string;

  @ApiProperty()
  @Column({ type: 'varchar', length: 100, name: 'course_id' })
  courseId: string;

  @ApiProperty()
  @Column({ type: 'varchar', length: 100, name: 'full_name' })
  fullName: string;

  @ApiProperty()
  @Column({ type: 'varchar', length: 255 })
  email: string;

  @ApiProperty()
  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    name: 'payment_amount',
    transformer: decimalTransformer,
  })
  paymentAmount: number;

  @ApiProperty({ required: false })
  @Column({ type: 'varchar', length: 50, nullable: true, name: 'discount_code' })
  discountCode: string | null;

  @ApiProperty()
  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    default: 0,
    name: 'discount_applied',
    transformer: decimalTransformer,
  })
  discountApplied: number;

  @ApiProperty()
  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    name: 'final_amount',
    transformer: decimalTransformer,
  })
  finalAmount: number;

  @ApiProperty()
  @Column({ type: 'varchar', length: 10 })
  currency: string;

  @ApiProperty({ enum: EnrollmentStatus })
  @Column({ type: 'enum', enum: EnrollmentStatus, default: EnrollmentStatus.PENDING })
  status: EnrollmentStatus;

  @ApiProperty({ enum: EnrollmentPaymentStatus })
  @Column({
    type: 'enum',
    enum: EnrollmentPaymentStatus,
    default: EnrollmentPaymentStatus.PENDING,
    name: 'payment_status',
  })
  paymentStatus: EnrollmentPaymentStatus;

  @ApiProperty()
  @Column({ type: 'boolean', default: false, name: 'access_granted' })
  accessGranted: boolean;

  @ApiProperty()
  @Column({
    type: 'timestamp with time zone',
    name: 'enrollment_date',
    default: () => 'CURRENT_TIMESTAMP',
  })
  enrollmentDate: Date;

  @ApiProperty({ required: false })
  @Column({ type: 'timestamp with time zone', nullable: true, name: 'activation_date' })
  activationDate: Date | null;

  @ApiProperty()
  @Column({ type: 'integer', default: 0, name: 'activation_attempts' })
  activationAttempts: number;

  @ApiProperty()
  @Column({ type: 'integer', default: 3, name: 'max_retries' })
  maxRetries: number;

  @ApiProperty({ required: false })
  @Column({ type: 'timestamp with time zone', nullable: true, name: 'next_retry_at' })
  nextRetryAt: Date | null;

  @ApiProperty({ required: false })
  @Column({ type: 'timestamp with time zone', nullable: true, name: 'cancelled_at' })
  cancelledAt: Date | null;

  @ApiProperty({ required: false })
  @Column({ type: 'text', nullable: true, name: 'cancellation_reason' })
  cancellationReason: string | null;

  @CreateDateColumn({
    type: 'timestamp with time zone',
    name: 'created_at',
    default: () => 'CURRENT_TIMESTAMP',
  })
  createdAt: Date;

  @UpdateDateColumn({
    type: 'timestamp with time zone',
    name: 'updated_at',
    default: () => 'CURRENT_TIMESTAMP',
  })
  updatedAt: Date;
}
