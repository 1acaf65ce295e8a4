import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '../utils/http-service';

export interface LMSCourse {
  courseId: string;
  title: string;
  price: number;
  currency: string;
  totalLessons: number;
}

export interface LMSProgressSummary {
  completedLessons: number;
  totalLessons: number;
  progressPercentage: number;
  lastAccessedAt: string | null;
}

export interface ProvisionRequest {
  enrollmentId: string;
  userId: string;
  courseId: string;
}

export interface ProvisionResult {
  provisioned: boolean;
  firstLessonUrl?: string;
}

interface RawCourse {
  id?: string;
  courseId?: string;
  title?: string;
  name?: string;
  price?: number | string;
  currency?: string;
  totalLessons?: number;
}

interface RawProgress {
  completedLessons?: number;
  totalLessons?: number;
  progressPercentage?: number;
  lastAccessedAt?: string | null;
}

interface RawProvision {
  provisioned?: boolean;
  firstLessonUrl?: string;
}

export const firstLessonUrl = (courseId: string): string => `/courses/${courseId}/lessons/1`;

const EMPTY_PROGRESS: LMSProgressSummary = {
  completedLessons: 0,
  totalLessons: 0,
  progressPercentage: 0,
  lastAccessedAt: null,
};

/**
 * Client for the learning platform that owns courses, lessons and progress.
 * The enrollment service only reads from it, apart from the provisioning call
 * made during activation.
 */
@Injectable()
export class LMSService {
  private readonly logger = new Logger(LMSService.name);
  private readonly lmsBaseUrl: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.lmsBaseUrl = this.configService.get<string>('LMS_SERVICE_URL', 'http://localhost:4002');
  }

  /**
   * Resolves a course by id. Returns null when the LMS answers 404.
   */
  async getCourse(courseId: string): Promise<LMSCourse | null> {
    const response = await this.httpService.get<RawCourse>(
      `${this.lmsBaseUrl}/courses/${encodeURIComponent(courseId)}`,
    );
    if (response.status === 404) {
      return null;
    }
    if (response.status !== 200) {
      throw new Error(`LMS course lookup failed with status ${response.status}`);
    }

    const raw = response.data;
    return {
      courseId: raw.id ?? raw.courseId ?? courseId,
      title: raw.title ?? raw.name ?? 'Untitled Course',
      price: Number(raw.price ?? 0),
      currency: raw.currency ?? 'VND',
      totalLessons: raw.totalLessons ?? 0,
    };
  }

  async getProgressSummary(userId: string, courseId: string): Promise<LMSProgressSummary> {
    try {
      const response = await this.httpService.get<RawProgress>(
        `${this.lmsBaseUrl}/progress/${encodeURIComponent(userId)}/${encodeURIComponent(courseId)}`,
      );
      if (response.status !== 200) {
        return { ...EMPTY_PROGRESS };
      }
      return {
        completedLessons: response.data.completedLessons ?? 0,
        totalLessons: response.data.totalLessons ?? 0,
        progressPercentage: response.data.progressPercentage ?? 0,
        lastAccessedAt: response.data.lastAccessedAt ?? null,
      };
    } catch (error) {
      this.logger.warn(`Progress lookup failed for user ${userId}, course ${courseId}: ${String(error)}`);
      return { ...EMPTY_PROGRESS };
    }
  }

  /**
   * Asks the LMS to open the course for the learner. Errors propagate; the
   * activation retrier counts them as a failed attempt.
   */
  async provisionAccess(request: ProvisionRequest): Promise<ProvisionResult> {
    const response = await this.httpService.post<RawProvision>(
      `${this.lmsBaseUrl}/enrollments/provision`,
      request,
    );
    if (response.status !== 200 && response.status !== 201) {
      return { provisioned: false };
    }
    return {
      provisioned: response.data.provisioned ?? true,
      firstLessonUrl:
        response.data.firstLessonUrl ?? firstLessonUrl(request.courseId),
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.httpService.get(`${this.lmsBaseUrl}/health`);
      return response.status === 200;
    } catch (error) {
      this.logger.warn(`LMS service health check failed: ${String(error)}`);
      return false;
    }
  }
}
