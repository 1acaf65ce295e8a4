import {
  Controller,
  Post,
  Get,
  Patch,
  Body,
  Param,
  Query,
  Res,
  HttpStatus,
  ParseUUIDPipe,
  UseFilters,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiCreatedResponse,
  ApiOkResponse,
  ApiBadRequestResponse,
  ApiNotFoundResponse,
} from '@nestjs/swagger';
import { Response } from 'express';
import { CouponService } from '../services/coupon.service';
import { CreateCouponDto } from '../dtos/create-coupon.dto';
import { ValidateCouponDto, ValidateCouponResponseDto } from '../dtos/validate-coupon.dto';
import { CouponListQueryDto, CouponListResponseDto } from '../dtos/coupon-list.dto';
import { Coupon } from '../entities/coupon.entity';
import { AllExceptionsFilter } from '../../common/filters/exception.filter';
import APIResponse from '../../common/responses/response';
import { APIID } from '../../common/utils/api-id.config';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { roundMoney } from '../../common/utils/decimal.transformer';

@ApiTags('Coupons')
@Controller('coupons')
export class CouponController {
  constructor(private readonly couponService: CouponService) {}

  @UseFilters(new AllExceptionsFilter(APIID.COUPON_CREATE))
  @Post()
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
  @ApiOperation({ summary: 'Create a new discount coupon' })
  @ApiCreatedResponse({ description: 'Coupon created successfully', type: Coupon })
  @ApiBadRequestResponse({ description: 'Invalid input or coupon already exists' })
  async createCoupon(@Body() dto: CreateCouponDto, @Res() response: Response) {
    const coupon = await this.couponService.createCoupon(dto);
    return APIResponse.success(
      response,
      APIID.COUPON_CREATE,
      coupon,
      HttpStatus.CREATED,
      API_RESPONSES.COUPON_CREATED,
    );
  }

  @UseFilters(new AllExceptionsFilter(APIID.COUPON_VALIDATE))
  @Post('validate')
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
  @ApiOperation({ summary: 'Validate a coupon code against an order amount' })
  @ApiOkResponse({ description: 'Coupon validation result', type: ValidateCouponResponseDto })
  async validateCoupon(@Body() dto: ValidateCouponDto, @Res() response: Response) {
    const validation = await this.couponService.validate(dto.code, dto.userId, dto.orderAmount);

    const result: ValidateCouponResponseDto = {
      valid: validation.valid,
      message: validation.message,
    };
    if (validation.valid && validation.coupon) {
      const discountAmount = this.couponService.calculateDiscount(validation.coupon, dto.orderAmount);
      result.coupon = {
        id: validation.coupon.id,
        code: validation.coupon.code,
        discountType: validation.coupon.discountType,
        discountValue: validation.coupon.discountValue,
      };
      result.discountAmount = discountAmount;
      result.finalAmount = roundMoney(Math.max(0, dto.orderAmount - discountAmount));
    }

    return APIResponse.success(
      response,
      APIID.COUPON_VALIDATE,
      result,
      HttpStatus.OK,
      API_RESPONSES.COUPON_VALIDATED,
    );
  }

  @UseFilters(new AllExceptionsFilter(APIID.COUPON_LIST))
  @Get()
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
  @ApiOperation({ summary: 'List coupons with pagination' })
  @ApiOkResponse({ description: 'List of coupons', type: CouponListResponseDto })
  async listCoupons(@Query() query: CouponListQueryDto, @Res() response: Response) {
    const limit = query.limit ?? 10;
    const offset = query.offset ?? 0;

    const { data, totalCount } = await this.couponService.listCoupons(
      { isActive: query.isActive },
      limit,
      offset,
    );

    const result: CouponListResponseDto = {
      data,
      totalCount,
      limit,
      offset,
      hasMore: offset + data.length < totalCount,
    };
    return APIResponse.success(
      response,
      APIID.COUPON_LIST,
      result,
      HttpStatus.OK,
      API_RESPONSES.COUPON_LIST_FETCHED,
    );
  }

  @UseFilters(new AllExceptionsFilter(APIID.COUPON_GET))
  @Get('code/:code')
  @ApiOperation({ summary: 'Get coupon by code' })
  @ApiOkResponse({ description: 'Coupon details', type: Coupon })
  @ApiNotFoundResponse({ description: 'Coupon not found' })
  async getCouponByCode(@Param('code') code: string, @Res() response: Response) {
    const coupon = await this.couponService.getCouponByCode(code);
    return APIResponse.success(
      response,
      APIID.COUPON_GET,
      coupon,
      HttpStatus.OK,
      API_RESPONSES.COUPON_FETCHED,
    );
  }

  @UseFilters(new AllExceptionsFilter(APIID.COUPON_DEACTIVATE))
  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate a coupon' })
  @ApiOkResponse({ description: 'Coupon deactivated', type: Coupon })
  @ApiNotFoundResponse({ description: 'Coupon not found' })
  async deactivateCoupon(
    @Param('id', ParseUUIDPipe) id: string,
    @Res() response: Response,
  ) {
    const coupon = await this.couponService.deactivateCoupon(id);
    return APIResponse.success(
      response,
      APIID.COUPON_DEACTIVATE,
      coupon,
      HttpStatus.OK,
      API_RESPONSES.COUPON_DEACTIVATED,
    );
  }
}
