import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { decimalTransformer } from '../../common/utils/decimal.transformer';
import { Coupon } from './coupon.entity';

/**
 * One redemption of a coupon. Rows are only ever inserted.
 */
@Entity({ name: 'coupon_usages' })
@Index(['couponId', 'userId'])
export class CouponUsage {
  @PrimaryGeneratedColumn('uuid')
  id: string;

  @Column({ type: 'uuid', name: 'coupon_id' })
  couponId: string;

  @ManyToOne(() => Coupon, (coupon) => coupon.usages)
  @JoinColumn({ name: 'coupon_id' })
  coupon: Coupon;

  @Column({ type: 'varchar', length: 100, name: 'user_id' })
  userId: string;

  @Column({ type: 'uuid', nullable: true, name: 'enrollment_id' })
  enrollmentId: string | null;

  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    name: 'order_amount',
    transformer: decimalTransformer,
  })
  orderAmount: number;

  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    name: 'discount_amount',
    transformer: decimalTransformer,
  })
  discountAmount: number;

  @CreateDateColumn({
    type: 'timestamp with time zone',
    name: 'used_at',
    default: () => 'CURRENT_TIMESTAMP',
  })
  usedAt: Date;
}
