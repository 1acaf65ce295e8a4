import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { LMSService } from '../common/services/lms.service';

export interface ServiceHealth {
  name: string;
  status: 'up' | 'down';
  message?: string;
  responseTime?: number;
}

export interface HealthReport {
  healthy: boolean;
  checks: ServiceHealth[];
}

const DATABASE_TIMEOUT_MS = 5000;

@Injectable()
export class HealthService {
  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly lmsService: LMSService,
  ) {}

  async checkDatabase(): Promise<ServiceHealth> {
    const startTime = Date.now();
    if (!this.dataSource.isInitialized) {
      return { name: 'postgres db', status: 'down', message: 'Database connection not initialized' };
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Database query timeout after ${DATABASE_TIMEOUT_MS} ms`)),
        DATABASE_TIMEOUT_MS,
      );
    });

    try {
      await Promise.race([this.dataSource.query('SELECT 1'), timeout]);
      return { name: 'postgres db', status: 'up', responseTime: Date.now() - startTime };
    } catch (error) {
      return {
        name: 'postgres db',
        status: 'down',
        message: error instanceof Error ? error.message : 'Database connection failed',
        responseTime: Date.now() - startTime,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  async checkLms(): Promise<ServiceHealth> {
    const startTime = Date.now();
    const reachable = await this.lmsService.healthCheck();
    return {
      name: 'lms-service',
      status: reachable ? 'up' : 'down',
      message: reachable ? undefined : 'LMS unreachable',
      responseTime: Date.now() - startTime,
    };
  }

  /** Only the database decides overall health; the LMS is reported for operators. */
  async report(): Promise<HealthReport> {
    const [database, lms] = await Promise.all([this.checkDatabase(), this.checkLms()]);
    return { healthy: database.status === 'up', checks: [database, lms] };
  }
}
