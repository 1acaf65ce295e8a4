import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Coupon, DiscountType } from '../entities/coupon.entity';
import { CouponUsage } from '../entities/coupon-usage.entity';
import { CreateCouponDto } from '../dtos/create-coupon.dto';
import {
  COMMON_ERROR,
  COUPON_ERROR,
  DomainError,
} from '../../common/errors/domain-error';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { roundMoney } from '../../common/utils/decimal.transformer';

export interface CouponValidation {
  valid: boolean;
  coupon?: Coupon;
  message: string;
}

export interface CouponListFilters {
  isActive?: boolean;
}

export const normalizeCouponCode = (code: string): string => code.trim().toUpperCase();

/**
 * Discount amount for an order. Percentage discounts honour the coupon's cap;
 * no discount ever exceeds the order amount.
 */
export function calculateDiscount(coupon: Coupon, orderAmount: number): number {
  if (orderAmount <= 0 || orderAmount < coupon.minimumOrderAmount) {
    return 0;
  }

  let discount: number;
  if (coupon.discountType === DiscountType.PERCENTAGE) {
    discount = (coupon.discountValue / 100) * orderAmount;
    if (coupon.maximumDiscountAmount !== null && coupon.maximumDiscountAmount !== undefined) {
      discount = Math.min(discount, coupon.maximumDiscountAmount);
    }
  } else {
    discount = coupon.discountValue;
  }

  return roundMoney(Math.min(discount, orderAmount));
}

export function isCouponUsable(coupon: Coupon, now: Date = new Date()): boolean {
  return (
    coupon.isActive &&
    coupon.validFrom.getTime() <= now.getTime() &&
    now.getTime() <= coupon.validUntil.getTime() &&
    (coupon.usageLimit === null || coupon.totalUsed < coupon.usageLimit)
  );
}

@Injectable()
export class CouponService {
  private readonly logger = new Logger(CouponService.name);

  constructor(
    @InjectRepository(Coupon)
    private readonly couponRepository: Repository<Coupon>,
    @InjectRepository(CouponUsage)
    private readonly usageRepository: Repository<CouponUsage>,
  ) {}

  /**
   * Checks a code for a user and order amount. Returns the first failing
   * reason as the message; nothing is written. Given a manager, the coupon
   * row stays locked until that transaction ends, so the limits read here
   * still hold when `apply` writes.
   */
  async validate(
    code: string,
    userId: string,
    orderAmount: number,
    manager?: EntityManager,
  ): Promise<CouponValidation> {
    const couponRepository = manager ? manager.getRepository(Coupon) : this.couponRepository;
    const usageRepository = manager ? manager.getRepository(CouponUsage) : this.usageRepository;

    const coupon = await couponRepository.findOne({
      where: { code: normalizeCouponCode(code) },
      ...(manager ? { lock: { mode: 'pessimistic_write' as const } } : {}),
    });
    if (!coupon) {
      return { valid: false, message: API_RESPONSES.COUPON_INVALID_CODE };
    }

    if (coupon.usageLimit !== null && coupon.totalUsed >= coupon.usageLimit) {
      return { valid: false, coupon, message: API_RESPONSES.COUPON_USAGE_EXHAUSTED };
    }
    if (!isCouponUsable(coupon)) {
      return { valid: false, coupon, message: API_RESPONSES.COUPON_EXPIRED };
    }

    if (orderAmount < coupon.minimumOrderAmount) {
      return {
        valid: false,
        coupon,
        message: API_RESPONSES.COUPON_MINIMUM_ORDER(coupon.minimumOrderAmount),
      };
    }

    const usedByUser = await usageRepository.count({
      where: { couponId: coupon.id, userId },
    });
    if (usedByUser >= coupon.usageLimitPerUser) {
      return { valid: false, coupon, message: API_RESPONSES.COUPON_USAGE_LIMIT };
    }

    return { valid: true, coupon, message: API_RESPONSES.COUPON_VALID };
  }

  calculateDiscount(coupon: Coupon, orderAmount: number): number {
    return calculateDiscount(coupon, orderAmount);
  }

  /**
   * Records a redemption inside the caller's transaction. A zero discount
   * leaves no trace.
   */
  async apply(
    manager: EntityManager,
    coupon: Coupon,
    userId: string,
    orderAmount: number,
    enrollmentId?: string,
  ): Promise<number> {
    const discountAmount = calculateDiscount(coupon, orderAmount);
    if (discountAmount <= 0) {
      return 0;
    }

    const usage = manager.create(CouponUsage, {
      couponId: coupon.id,
      userId,
      enrollmentId: enrollmentId ?? null,
      orderAmount,
      discountAmount,
    });
    await manager.save(CouponUsage, usage);
    await manager.increment(Coupon, { id: coupon.id }, 'totalUsed', 1);
    await manager.increment(Coupon, { id: coupon.id }, 'totalDiscountGiven', discountAmount);

    this.logger.log(`Applied coupon ${coupon.code} for user ${userId}: -${discountAmount}`);
    return discountAmount;
  }

  async createCoupon(dto: CreateCouponDto): Promise<Coupon> {
    const code = normalizeCouponCode(dto.code);
    const validFrom = new Date(dto.validFrom);
    const validUntil = new Date(dto.validUntil);

    if (dto.discountType === DiscountType.PERCENTAGE && dto.discountValue > 100) {
      throw new DomainError(
        COMMON_ERROR.VALIDATION_ERROR,
        'Percentage discount must be between 0 and 100',
      );
    }
    if (validUntil.getTime() <= validFrom.getTime()) {
      throw new DomainError(COMMON_ERROR.VALIDATION_ERROR, 'validUntil must be after validFrom');
    }

    const existing = await this.couponRepository.findOne({ where: { code } });
    if (existing) {
      throw new DomainError(
        COUPON_ERROR.COUPON_ALREADY_EXISTS,
        `Coupon code ${code} already exists`,
      );
    }

    const coupon = this.couponRepository.create({
      code,
      name: dto.name.trim(),
      description: dto.description ?? null,
      discountType: dto.discountType,
      discountValue: dto.discountValue,
      minimumOrderAmount: dto.minimumOrderAmount ?? 0,
      maximumDiscountAmount: dto.maximumDiscountAmount ?? null,
      usageLimit: dto.usageLimit ?? null,
      usageLimitPerUser: dto.usageLimitPerUser ?? 1,
      validFrom,
      validUntil,
      isActive: dto.isActive ?? true,
      totalUsed: 0,
      totalDiscountGiven: 0,
    });

    const saved = await this.couponRepository.save(coupon);
    this.logger.log(`Created coupon: ${saved.code} (${saved.id})`);
    return saved;
  }

  async getCouponByCode(code: string): Promise<Coupon> {
    const coupon = await this.couponRepository.findOne({
      where: { code: normalizeCouponCode(code) },
    });
    if (!coupon) {
      throw new DomainError(COUPON_ERROR.COUPON_NOT_FOUND, API_RESPONSES.COUPON_NOT_FOUND);
    }
    return coupon;
  }

  async listCoupons(
    filters: CouponListFilters,
    limit: number,
    offset: number,
  ): Promise<{ data: Coupon[]; totalCount: number }> {
    const [data, totalCount] = await this.couponRepository.findAndCount({
      where: filters.isActive === undefined ? {} : { isActive: filters.isActive },
      order: { createdAt: 'DESC' },
      take: limit,
      skip: offset,
    });
    return { data, totalCount };
  }

  async deactivateCoupon(id: string): Promise<Coupon> {
    const coupon = await this.couponRepository.findOne({ where: { id } });
    if (!coupon) {
      throw new DomainError(COUPON_ERROR.COUPON_NOT_FOUND, API_RESPONSES.COUPON_NOT_FOUND);
    }
    if (!coupon.isActive) {
      return coupon;
    }
    coupon.isActive = false;
    const saved = await this.couponRepository.save(coupon);
    this.logger.log(`Deactivated coupon: ${saved.code} (${saved.id})`);
    return saved;
  }
}
