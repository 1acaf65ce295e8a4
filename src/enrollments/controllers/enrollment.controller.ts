import {
  Body,
  Controller,
  Get,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Res,
  UseFilters,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiHeader,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { Response } from 'express';
import { GetUserId } from '../../common/decorators/getUserId.decorator';
import { AllExceptionsFilter } from '../../common/filters/exception.filter';
import APIResponse from '../../common/responses/response';
import { APIID } from '../../common/utils/api-id.config';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { CancelEnrollmentDto } from '../dtos/cancel-enrollment.dto';
import { CreateEnrollmentDto, EnrollmentCreatedDto } from '../dtos/create-enrollment.dto';
import { ProcessPaymentDto } from '../dtos/process-payment.dto';
import { Enrollment } from '../entities/enrollment.entity';
import { EnrollmentService } from '../services/enrollment.service';

@ApiTags('Enrollments')
@ApiBearerAuth('access-token')
@ApiHeader({ name: 'Authorization', required: true })
@Controller('enrollments')
export class EnrollmentController {
  constructor(private readonly enrollmentService: EnrollmentService) {}

  @UseFilters(new AllExceptionsFilter(APIID.ENROLLMENT_CREATE))
  @Post()
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
  @ApiOperation({ summary: 'Enroll the caller in a course' })
  @ApiCreatedResponse({ description: API_RESPONSES.ENROLLMENT_CREATED, type: EnrollmentCreatedDto })
  @ApiBadRequestResponse({ description: 'Invalid input, duplicate enrollment or invalid discount code' })
  @ApiNotFoundResponse({ description: API_RESPONSES.COURSE_NOT_FOUND })
  async createEnrollment(
    @GetUserId() userId: string,
    @Body() dto: CreateEnrollmentDto,
    @Res() response: Response,
  ) {
    const result = await this.enrollmentService.register({ userId, ...dto });
    return APIResponse.success(
      response,
      APIID.ENROLLMENT_CREATE,
      result,
      HttpStatus.CREATED,
      API_RESPONSES.ENROLLMENT_CREATED,
    );
  }

  @UseFilters(new AllExceptionsFilter(APIID.ENROLLMENT_PAYMENT))
  @Post(':id/payments')
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
  @ApiOperation({ summary: 'Pay for a pending enrollment' })
  @ApiOkResponse({ description: API_RESPONSES.ENROLLMENT_PAYMENT_SUCCESS, type: Enrollment })
  @ApiBadRequestResponse({ description: 'Payment declined, missing details or enrollment not payable' })
  async processPayment(
    @GetUserId() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ProcessPaymentDto,
    @Res() response: Response,
  ) {
    const enrollment = await this.enrollmentService.processPayment(
      id,
      userId,
      dto.paymentMethod,
      dto.paymentDetails,
    );
    return APIResponse.success(
      response,
      APIID.ENROLLMENT_PAYMENT,
      enrollment,
      HttpStatus.OK,
      API_RESPONSES.ENROLLMENT_PAYMENT_SUCCESS,
    );
  }

  @UseFilters(new AllExceptionsFilter(APIID.ENROLLMENT_ACTIVATE))
  @Post(':id/activate')
  @ApiOperation({ summary: 'Grant course access for a paid enrollment' })
  @ApiOkResponse({ description: 'Activation result' })
  @ApiBadRequestResponse({ description: API_RESPONSES.ENROLLMENT_NOT_ELIGIBLE })
  async activate(
    @GetUserId() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Res() response: Response,
  ) {
    const result = await this.enrollmentService.activate(id, userId);
    return APIResponse.success(
      response,
      APIID.ENROLLMENT_ACTIVATE,
      result,
      HttpStatus.OK,
      result.granted ? API_RESPONSES.ENROLLMENT_ACTIVATED : API_RESPONSES.ENROLLMENT_ACTIVATION_PENDING,
    );
  }

  @UseFilters(new AllExceptionsFilter(APIID.ENROLLMENT_ACTIVATE_RETRY))
  @Post(':id/activate/retry')
  @ApiOperation({ summary: 'Retry a failed activation once its backoff has passed' })
  @ApiOkResponse({ description: 'Activation result' })
  @ApiBadRequestResponse({ description: API_RESPONSES.ENROLLMENT_NO_RETRIES })
  async retryActivation(
    @GetUserId() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Res() response: Response,
  ) {
    const result = await this.enrollmentService.retryActivation(id, userId);
    return APIResponse.success(
      response,
      APIID.ENROLLMENT_ACTIVATE_RETRY,
      result,
      HttpStatus.OK,
      result.granted ? API_RESPONSES.ENROLLMENT_ACTIVATED : API_RESPONSES.ENROLLMENT_ACTIVATION_PENDING,
    );
  }

  @UseFilters(new AllExceptionsFilter(APIID.ENROLLMENT_CANCEL))
  @Post(':id/cancel')
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
  @ApiOperation({ summary: 'Cancel an enrollment' })
  @ApiOkResponse({ description: API_RESPONSES.ENROLLMENT_CANCELLED, type: Enrollment })
  async cancel(
    @GetUserId() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: CancelEnrollmentDto,
    @Res() response: Response,
  ) {
    const enrollment = await this.enrollmentService.cancel(id, userId, dto.reason);
    return APIResponse.success(
      response,
      APIID.ENROLLMENT_CANCEL,
      enrollment,
      HttpStatus.OK,
      API_RESPONSES.ENROLLMENT_CANCELLED,
    );
  }

  @UseFilters(new AllExceptionsFilter(APIID.ENROLLMENT_GET))
  @Get(':id')
  @ApiOperation({ summary: 'Enrollment with course, progress and payment history' })
  @ApiOkResponse({ description: API_RESPONSES.ENROLLMENT_FETCHED })
  @ApiNotFoundResponse({ description: API_RESPONSES.ENROLLMENT_NOT_FOUND })
  async getEnrollment(
    @GetUserId() userId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Res() response: Response,
  ) {
    const details = await this.enrollmentService.getEnrollmentStatus(id, userId);
    return APIResponse.success(
      response,
      APIID.ENROLLMENT_GET,
      details,
      HttpStatus.OK,
      API_RESPONSES.ENROLLMENT_FETCHED,
    );
  }
}
