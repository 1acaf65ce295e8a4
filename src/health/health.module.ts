import { Module } from '@nestjs/common';
import { LmsModule } from '../common/lms.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [LmsModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
