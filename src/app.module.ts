import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { DatabaseModule } from './common/database.module';
import { EnrollmentConfigModule } from './config/enrollment-config.module';
import { CouponsModule } from './coupons/coupons.module';
import { CronModule } from './cron/cron.module';
import { EnrollmentsModule } from './enrollments/enrollments.module';
import { HealthModule } from './health/health.module';
import { PaymentsModule } from './payments/payments.module';

/**
 * Root module. Configuration and the enrollment settings are global; the
 * activation poller runs through ScheduleModule.
 */
@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    ScheduleModule.forRoot(),
    DatabaseModule,
    EnrollmentConfigModule,
    CouponsModule,
    PaymentsModule,
    EnrollmentsModule,
    CronModule,
    HealthModule,
  ],
})
export class AppModule {}
