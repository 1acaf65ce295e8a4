import { Module } from '@nestjs/common';
import { LMSService } from './services/lms.service';
import { HttpService } from './utils/http-service';

@Module({
  providers: [HttpService, LMSService],
  exports: [LMSService],
})
export class LmsModule {}
