import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { decimalTransformer } from '../../common/utils/decimal.transformer';
import { PaymentMethod, PaymentStatus } from '../enums/payment.enums';
import { PaymentTransaction } from './payment-transaction.entity';

/**
 * One charge attempt for an enrollment. Only the masked method details are
 * stored; card number and CVV never reach the database.
 */
@Entity({ name: 'payments' })
@Index(['enrollmentId', 'status'])
export class Payment {
  @PrimaryGeneratedColumn('uuid')
  id: string;

  @Column({ type: 'uuid', name: 'enrollment_id' })
  enrollmentId: string;

  @Column({ type: 'varchar', length: 100, name: 'user_id' })
  userId: string;

  @Column({ type: 'enum', enum: PaymentMethod })
  method: PaymentMethod;

  @Column({ type: 'enum', enum: PaymentStatus, default: PaymentStatus.PENDING })
  status: PaymentStatus;

  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    transformer: decimalTransformer,
  })
  amount: number;

  @Column({ type: 'varchar', length: 10 })
  currency: string;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'gateway_transaction_id' })
  gatewayTransactionId: string | null;

  @Column({ type: 'jsonb', nullable: true, name: 'gateway_response' })
  gatewayResponse: Record<string, unknown> | null;

  @Column({ type: 'varchar', length: 100, nullable: true, name: 'error_code' })
  errorCode: string | null;

  @Column({ type: 'text', nullable: true, name: 'error_message' })
  errorMessage: string | null;

  @Column({ type: 'varchar', length: 4, nullable: true, name: 'last_four_digits' })
  lastFourDigits: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true, name: 'card_holder_name' })
  cardHolderName: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'paypal_email' })
  paypalEmail: string | null;

  @Column({ type: 'varchar', length: 4, nullable: true, name: 'bank_account_last_four' })
  bankAccountLastFour: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true, name: 'bank_code' })
  bankCode: string | null;

  @Column({ type: 'timestamp with time zone', nullable: true, name: 'processed_at' })
  processedAt: Date | null;

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

  @OneToMany(() => PaymentTransaction, (transaction) => transaction.payment)
  transactions: PaymentTransaction[];
}
