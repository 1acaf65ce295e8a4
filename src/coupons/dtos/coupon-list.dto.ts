import { ApiProperty } from '@nestjs/swagger';
import { IsOptional, IsBoolean, IsInt, Min, Max } from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { Coupon } from '../entities/coupon.entity';

export class CouponListQueryDto {
  @ApiProperty({ type: Boolean, required: false, description: 'Filter by active status' })
  @IsOptional()
  @Transform(({ value }) => (value === 'true' ? true : value === 'false' ? false : value))
  @IsBoolean()
  isActive?: boolean;

  @ApiProperty({ type: Number, required: false, default: 10, minimum: 1, maximum: 100 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;

  @ApiProperty({ type: Number, required: false, default: 0, minimum: 0 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;
}

export class CouponListResponseDto {
  @ApiProperty({ type: [Coupon] })
  data: Coupon[];

  @ApiProperty({ type: 'number' })
  totalCount: number;

  @ApiProperty({ type: 'number' })
  limit: number;

  @ApiProperty({ type: 'number' })
  offset: number;

  @ApiProperty({ type: 'boolean' })
  hasMore: boolean;
}
