import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, IsNumber, Min } from 'class-validator';
import { DiscountType } from '../entities/coupon.entity';

export class ValidateCouponDto {
  @ApiProperty({ description: 'Coupon code to validate', example: 'SAVE20' })
  @IsNotEmpty()
  @IsString()
  code: string;

  @ApiProperty({ description: 'User applying the coupon' })
  @IsNotEmpty()
  @IsString()
  userId: string;

  @ApiProperty({ type: 'number', description: 'Order amount before discount', example: 500000 })
  @IsNumber()
  @Min(0)
  orderAmount: number;
}

export class ValidateCouponResponseDto {
  @ApiProperty()
  valid: boolean;

  @ApiProperty()
  message: string;

  @ApiProperty({ required: false })
  coupon?: {
    id: string;
    code: string;
    discountType: DiscountType;
    discountValue: number;
  };

  @ApiProperty({ required: false })
  discountAmount?: number;

  @ApiProperty({ required: false })
  finalAmount?: number;
}
