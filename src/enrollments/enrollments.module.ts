import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LmsModule } from '../common/lms.module';
import { CouponsModule } from '../coupons/coupons.module';
import { PaymentsModule } from '../payments/payments.module';
import { CourseAccessController } from './controllers/course-access.controller';
import { EnrollmentController } from './controllers/enrollment.controller';
import { UserEnrollmentController } from './controllers/user-enrollment.controller';
import { Enrollment } from './entities/enrollment.entity';
import { ActivationPollerService } from './services/activation-poller.service';
import { ActivationRetrierService } from './services/activation-retrier.service';
import { EnrollmentRegistryService } from './services/enrollment-registry.service';
import { EnrollmentStateMachineService } from './services/enrollment-state-machine.service';
import { EnrollmentService } from './services/enrollment.service';

@Module({
  imports: [TypeOrmModule.forFeature([Enrollment]), CouponsModule, PaymentsModule, LmsModule],
  controllers: [EnrollmentController, UserEnrollmentController, CourseAccessController],
  providers: [
    EnrollmentRegistryService,
    EnrollmentStateMachineService,
    ActivationRetrierService,
    ActivationPollerService,
    EnrollmentService,
  ],
  exports: [EnrollmentService, ActivationPollerService],
})
export class EnrollmentsModule {}
