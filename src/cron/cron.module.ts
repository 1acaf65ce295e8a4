import { Module } from '@nestjs/common';
import { EnrollmentsModule } from '../enrollments/enrollments.module';
import { CronService } from './cron.service';
import { CronController } from './cron.controller';

@Module({
  imports: [EnrollmentsModule],
  controllers: [CronController],
  providers: [CronService],
  exports: [CronService],
})
export class CronModule {}
