import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ENROLLMENT_CONFIG, EnrollmentConfig } from '../config/enrollment.config';
import {
  ActivationPollerService,
  ActivationPollSummary,
} from '../enrollments/services/activation-poller.service';

@Injectable()
export class CronService {
  private readonly logger = new Logger(CronService.name);

  constructor(
    private readonly activationPoller: ActivationPollerService,
    @Inject(ENROLLMENT_CONFIG)
    private readonly config: EnrollmentConfig,
  ) {}

  @Cron(CronExpression.EVERY_MINUTE)
  async retryDueActivations(): Promise<void> {
    if (!this.config.poller.enabled) {
      return;
    }
    await this.activationPoller.runOnce();
  }

  /** Manual trigger; runs regardless of ACTIVATION_POLLER_ENABLED. */
  async runActivationRetries(): Promise<ActivationPollSummary> {
    this.logger.log('Activation retry pass triggered manually');
    return this.activationPoller.runOnce();
  }
}
