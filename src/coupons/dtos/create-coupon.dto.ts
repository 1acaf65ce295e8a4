import { ApiProperty } from '@nestjs/swagger';
import {
  IsNotEmpty,
  IsString,
  IsEnum,
  IsOptional,
  IsNumber,
  IsBoolean,
  IsInt,
  Min,
  MaxLength,
  IsDateString,
  registerDecorator,
  ValidationOptions,
  ValidationArguments,
} from 'class-validator';
import { DiscountType } from '../entities/coupon.entity';

/**
 * Caps the value at 100 when the sibling `discountType` is PERCENTAGE.
 */
function MaxPercentDiscount(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'maxPercentDiscount',
      target: object.constructor,
      propertyName: propertyName,
      options: validationOptions,
      constraints: [],
      validator: {
        validate(value: unknown, args: ValidationArguments) {
          const owner = args.object;
          if ('discountType' in owner && owner.discountType === DiscountType.PERCENTAGE) {
            return typeof value === 'number' && value <= 100;
          }
          return true;
        },
        defaultMessage() {
          return 'Percentage discount must be between 0 and 100';
        },
      },
    });
  };
}

export class CreateCouponDto {
  @ApiProperty({ description: 'Coupon code', example: 'SAVE20' })
  @IsNotEmpty()
  @IsString()
  @MaxLength(50)
  code: string;

  @ApiProperty({ description: 'Display name', example: 'Save 20%' })
  @IsNotEmpty()
  @IsString()
  @MaxLength(200)
  name: string;

  @ApiProperty({ required: false })
  @IsOptional()
  @IsString()
  description?: string;

  @ApiProperty({ enum: DiscountType })
  @IsNotEmpty()
  @IsEnum(DiscountType)
  discountType: DiscountType;

  @ApiProperty({
    description: 'Percentage (0-100] for PERCENTAGE, amount for FIXED_AMOUNT',
    example: 20,
  })
  @IsNumber()
  @Min(0.01)
  @MaxPercentDiscount()
  discountValue: number;

  @ApiProperty({ required: false, default: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  minimumOrderAmount?: number;

  @ApiProperty({ required: false, description: 'Upper bound for percentage discounts' })
  @IsOptional()
  @IsNumber()
  @Min(0)
  maximumDiscountAmount?: number;

  @ApiProperty({ required: false, description: 'Total redemptions allowed (unlimited when absent)' })
  @IsOptional()
  @IsInt()
  @Min(1)
  usageLimit?: number;

  @ApiProperty({ required: false, default: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  usageLimitPerUser?: number;

  @ApiProperty({ description: 'ISO date', example: '2024-01-01T00:00:00Z' })
  @IsDateString()
  validFrom: string;

  @ApiProperty({ description: 'ISO date', example: '2024-12-31T23:59:59Z' })
  @IsDateString()
  validUntil: string;

  @ApiProperty({ required: false, default: true })
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}
