import { Inject, Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { LoggerUtil } from '../../common/logger/LoggerUtil';
import { ENROLLMENT_CONFIG, EnrollmentConfig } from '../../config/enrollment.config';
import { ActivationResult, ActivationRetrierService } from './activation-retrier.service';
import { EnrollmentRegistryService } from './enrollment-registry.service';

export interface ActivationPollSummary {
  skipped: boolean;
  processed: number;
  activated: number;
  failed: number;
}

/**
 * Picks up activations whose backoff has elapsed. Scheduled from CronService. Each claim is its own
 * transaction so a crash mid-batch only loses the row in flight.
 */
@Injectable()
export class ActivationPollerService {
  private readonly context = ActivationPollerService.name;
  private running = false;

  constructor(
    private readonly dataSource: DataSource,
    private readonly registry: EnrollmentRegistryService,
    private readonly retrier: ActivationRetrierService,
    @Inject(ENROLLMENT_CONFIG)
    private readonly config: EnrollmentConfig,
  ) {}

  async runOnce(): Promise<ActivationPollSummary> {
    const summary: ActivationPollSummary = { skipped: false, processed: 0, activated: 0, failed: 0 };
    if (this.running) {
      LoggerUtil.warn('Previous activation poll still running, skipping', this.context);
      return { ...summary, skipped: true };
    }

    this.running = true;
    try {
      while (summary.processed < this.config.poller.batchSize) {
        const outcome = await this.claimAndActivate();
        if (!outcome) {
          break;
        }
        summary.processed += 1;
        if (outcome.granted) {
          summary.activated += 1;
        } else {
          summary.failed += 1;
        }
      }
    } catch (error) {
      // the failing row rolled back and stays due; leave it for the next tick
      LoggerUtil.error(
        `Activation poll stopped: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
        this.context,
      );
    } finally {
      this.running = false;
    }

    if (summary.processed > 0) {
      LoggerUtil.log(
        `Activation poll processed ${summary.processed} (activated ${summary.activated}, failed ${summary.failed})`,
        this.context,
      );
    }
    return summary;
  }

  private claimAndActivate(): Promise<ActivationResult | null> {
    return this.dataSource.transaction(async (manager) => {
      const enrollment = await this.registry.claimNextDueActivation(manager, new Date());
      if (!enrollment) {
        return null;
      }
      return this.retrier.activateWithin(manager, enrollment);
    });
  }
}
