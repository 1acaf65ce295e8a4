import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { decimalTransformer } from '../../common/utils/decimal.transformer';
import { TransactionStatus, TransactionType } from '../enums/payment.enums';
import { Payment } from './payment.entity';

/**
 * Append-only ledger of gateway interactions (one payment, many rows).
 */
@Entity({ name: 'payment_transactions' })
export class PaymentTransaction {
  @PrimaryGeneratedColumn('uuid')
  id: string;

  @Column({ type: 'uuid', name: 'payment_id' })
  paymentId: string;

  @ManyToOne(() => Payment, (payment) => payment.transactions)
  @JoinColumn({ name: 'payment_id' })
  payment: Payment;

  @Column({ type: 'enum', enum: TransactionType })
  type: TransactionType;

  @Column({ type: 'enum', enum: TransactionStatus })
  status: TransactionStatus;

  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    transformer: decimalTransformer,
  })
  amount: number;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'external_transaction_id' })
  externalTransactionId: string | null;

  @Column({ type: 'jsonb', nullable: true, name: 'gateway_response' })
  gatewayResponse: Record<string, unknown> | null;

  @CreateDateColumn({
    type: 'timestamp with time zone',
    name: 'created_at',
    default: () => 'CURRENT_TIMESTAMP',
  })
  createdAt: Date;
}
