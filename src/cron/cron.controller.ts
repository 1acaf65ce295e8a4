import { Controller, HttpStatus, Post, Res, UseFilters } from '@nestjs/common';
import { ApiInternalServerErrorResponse, ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { AllExceptionsFilter } from '../common/filters/exception.filter';
import APIResponse from '../common/responses/response';
import { APIID } from '../common/utils/api-id.config';
import { API_RESPONSES } from '../common/utils/response.messages';
import { CronService } from './cron.service';

@ApiTags('Cron')
@Controller('cron')
export class CronController {
  constructor(private readonly cronService: CronService) {}

  @UseFilters(new AllExceptionsFilter(APIID.CRON_ACTIVATION_RETRY))
  @Post('activations/retry')
  @ApiOperation({ summary: 'Run one activation retry pass now' })
  @ApiOkResponse({ description: API_RESPONSES.CRON_ACTIVATION_RETRY_DONE })
  @ApiInternalServerErrorResponse({ description: 'Internal server error' })
  async triggerActivationRetries(@Res() response: Response) {
    const summary = await this.cronService.runActivationRetries();
    return APIResponse.success(
      response,
      APIID.CRON_ACTIVATION_RETRY,
      summary,
      HttpStatus.OK,
      API_RESPONSES.CRON_ACTIVATION_RETRY_DONE,
    );
  }
}
