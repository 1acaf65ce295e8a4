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
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { AllExceptionsFilter } from '../../common/filters/exception.filter';
import APIResponse from '../../common/responses/response';
import { APIID } from '../../common/utils/api-id.config';
import { API_RESPONSES } from '../../common/utils/response.messages';
import { CourseAccessQueryDto } from '../dtos/enrollment-list.dto';
import { EnrollmentService } from '../services/enrollment.service';

@ApiTags('Course Access')
@Controller('courses')
export class CourseAccessController {
  constructor(private readonly enrollmentService: EnrollmentService) {}

  @UseFilters(new AllExceptionsFilter(APIID.COURSE_ACCESS_CHECK))
  @Get(':courseId/access')
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
  @ApiOperation({ summary: 'Check whether a user may open a course' })
  @ApiOkResponse({ description: API_RESPONSES.COURSE_ACCESS_CHECKED })
  async checkAccess(
    @Param('courseId') courseId: string,
    @Query() query: CourseAccessQueryDto,
    @Res() response: Response,
  ) {
    const access = await this.enrollmentService.checkCourseAccess(query.userId, courseId);
    return APIResponse.success(
      response,
      APIID.COURSE_ACCESS_CHECK,
      access,
      HttpStatus.OK,
      API_RESPONSES.COURSE_ACCESS_CHECKED,
    );
  }
}
