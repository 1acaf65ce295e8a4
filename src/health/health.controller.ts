import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import { ApiOkResponse, ApiServiceUnavailableResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import APIResponse from '../common/responses/response';
import { APIID } from '../common/utils/api-id.config';
import { API_RESPONSES } from '../common/utils/response.messages';
import { HealthService } from './health.service';

@ApiTags('Health')
@Controller()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get('health')
  @ApiOkResponse({ description: API_RESPONSES.HEALTH_OK })
  @ApiServiceUnavailableResponse({ description: 'Database unreachable' })
  async checkHealth(@Res() res: Response) {
    const report = await this.healthService.report();

    if (report.healthy) {
      return APIResponse.success(res, APIID.HEALTH, report, HttpStatus.OK, API_RESPONSES.HEALTH_OK);
    }

    const database = report.checks.find((check) => check.name === 'postgres db');
    const status = HttpStatus.SERVICE_UNAVAILABLE;
    return res.status(status).json(
      APIResponse.build(APIID.HEALTH, report, status, {
        status: 'failed',
        err: 'DATABASE_CONNECTION_ERROR',
        errmsg: database?.message ?? 'Database connection failed',
      }),
    );
  }
}
