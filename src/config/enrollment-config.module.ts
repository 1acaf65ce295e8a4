import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ENROLLMENT_CONFIG, loadEnrollmentConfig } from './enrollment.config';

@Global()
@Module({
  providers: [
    {
      provide: ENROLLMENT_CONFIG,
      useFactory: loadEnrollmentConfig,
      inject: [ConfigService],
    },
  ],
  exports: [ENROLLMENT_CONFIG],
})
export class EnrollmentConfigModule {}
