import {
  Controller,
  Get,
  HttpStatus,
  Param,
  Query,
  Res,
  UseFilters,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Response } from 'express';
import { GetUserId } from '../../common/decorators/getUserId.decorator';
import { AllExceptionsFilter } from '../../common/filters/exception.filter';
import APIResponse from '../../common/responses/response';
import { APIID } from '../../common/utils/api-id.config';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { EnrollmentListQueryDto, EnrollmentListResponseDto } from '../dtos/enrollment-list.dto';
import { EnrollmentService } from '../services/enrollment.service';

@ApiTags('Enrollments')
@ApiBearerAuth('access-token')
@Controller('users')
export class UserEnrollmentController {
  constructor(private readonly enrollmentService: EnrollmentService) {}

  @UseFilters(new AllExceptionsFilter(APIID.ENROLLMENT_USER_LIST))
  @Get(':userId/enrollments')
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
  @ApiOperation({ summary: "List a user's enrollments" })
  @ApiOkResponse({ description: API_RESPONSES.ENROLLMENT_LIST_FETCHED, type: EnrollmentListResponseDto })
  @ApiUnauthorizedResponse({ description: 'Invalid or missing token' })
  @ApiNotFoundResponse({ description: API_RESPONSES.ENROLLMENT_NOT_FOUND })
  async listUserEnrollments(
    @GetUserId() callerId: string,
    @Param('userId') userId: string,
    @Query() query: EnrollmentListQueryDto,
    @Res() response: Response,
  ) {
    const result = await this.enrollmentService.listUserEnrollments(
      callerId,
      userId,
      query.status,
      query.page,
      query.limit,
    );
    return APIResponse.success(
      response,
      APIID.ENROLLMENT_USER_LIST,
      result,
      HttpStatus.OK,
      API_RESPONSES.ENROLLMENT_LIST_FETCHED,
    );
  }
}
