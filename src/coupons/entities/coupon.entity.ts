import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
} from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { decimalTransformer } from '../../common/utils/decimal.transformer';
import { CouponUsage } from './coupon-usage.entity';

export enum DiscountType {
  PERCENTAGE = 'PERCENTAGE',
  FIXED_AMOUNT = 'FIXED_AMOUNT',
}

/**
 * Discount code that can be redeemed at enrollment time.
 * `code` is stored trimmed and upper-cased.
 */
@Entity({ name: 'coupons' })
export class Coupon {
  @ApiProperty()
  @PrimaryGeneratedColumn('uuid')
  id: string;

  @ApiProperty({ example: 'SAVE20' })
  @Column({ type: 'varchar', length: 50, unique: true })
  code: string;

  @ApiProperty()
  @Column({ type: 'varchar', length: 200 })
  name: string;

  @ApiProperty({ required: false })
  @Column({ type: 'text', nullable: true })
  description: string | null;

  @ApiProperty({ enum: DiscountType })
  @Column({ type: 'enum', enum: DiscountType, name: 'discount_type' })
  discountType: DiscountType;

  @ApiProperty()
  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    name: 'discount_value',
    transformer: decimalTransformer,
  })
  discountValue: number;

  @ApiProperty()
  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    default: 0,
    name: 'minimum_order_amount',
    transformer: decimalTransformer,
  })
  minimumOrderAmount: number;

  @ApiProperty({ required: false })
  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    nullable: true,
    name: 'maximum_discount_amount',
    transformer: decimalTransformer,
  })
  maximumDiscountAmount: number | null;

  @ApiProperty({ required: false })
  @Column({ type: 'integer', nullable: true, name: 'usage_limit' })
  usageLimit: number | null;

  @ApiProperty()
  @Column({ type: 'integer', default: 1, name: 'usage_limit_per_user' })
  usageLimitPerUser: number;

  @ApiProperty()
  @Column({ type: 'timestamp with time zone', name: 'valid_from' })
  validFrom: Date;

  @ApiProperty()
  @Column({ type: 'timestamp with time zone', name: 'valid_until' })
  validUntil: Date;

  @ApiProperty()
  @Column({ type: 'boolean', default: true, name: 'is_active' })
  isActive: boolean;

  @ApiProperty()
  @Column({ type: 'integer', default: 0, name: 'total_used' })
  totalUsed: number;

  @ApiProperty()
  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    default: 0,
    name: 'total_discount_given',
    transformer: decimalTransformer,
  })
  totalDiscountGiven: number;

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

  @OneToMany(() => CouponUsage, (usage) => usage.coupon)
  usages: CouponUsage[];
}
