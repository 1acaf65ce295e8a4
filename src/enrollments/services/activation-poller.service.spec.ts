import { DEFAULT_ENROLLMENT_CONFIG } from '../../config/enrollment.config';
import { Enrollment } from '../entities/enrollment.entity';
import { EnrollmentStatus } from '../enums/enrollment.enums';
import {
  createEnrollmentTestingModule,
  EnrollmentTestContext,
  seedEnrollment,
} from '../testing/enrollment-testing.module';
import { ActivationPollerService } from './activation-poller.service';
import { EnrollmentRegistryService } from './enrollment-registry.service';

describe('ActivationPollerService', () => {
  let context: EnrollmentTestContext;
  let poller: ActivationPollerService;
  let registry: EnrollmentRegistryService;

  const past = () => new Date(Date.now() - 60_000);
  const future = () => new Date(Date.now() + 600_000);

  const setup = async (batchSize = 20) => {
    context = await createEnrollmentTestingModule({
      ...DEFAULT_ENROLLMENT_CONFIG,
      poller: { enabled: true, batchSize },
    });
    poller = context.module.get(ActivationPollerService);
    registry = context.module.get(EnrollmentRegistryService);

    // same predicate as the SQL claim, evaluated against the in-memory rows
    jest.spyOn(registry, 'claimNextDueActivation').mockImplementation(async (_manager, now) => {
      const due = context.store
        .repository(Enrollment)
        .rows.find(
          (row) =>
            row.status === EnrollmentStatus.ACTIVATING &&
            row.activationAttempts < row.maxRetries &&
            (row.nextRetryAt === null || row.nextRetryAt.getTime() <= now.getTime()),
        );
      return due ? Object.assign(new Enrollment(), due) : null;
    });
  };

  const seedActivating = (courseId: string, nextRetryAt: Date | null) =>
    seedEnrollment(context.store, {
      courseId,
      status: EnrollmentStatus.ACTIVATING,
      activationAttempts: 1,
      nextRetryAt,
    });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('retries every due activation and leaves the rest alone', async () => {
    await setup();
    const first = await seedActivating('course-1', past());
    const second = await seedActivating('course-2', null);
    const later = await seedActivating('course-3', future());
    context.lms.willProvision('granted', 'refused');

    const summary = await poller.runOnce();

    expect(summary).toEqual({ skipped: false, processed: 2, activated: 1, failed: 1 });
    const rows = context.store.repository(Enrollment).rows;
    const byId = (id: string) => rows.find((row) => row.id === id);
    expect(byId(first.id)?.status).toBe(EnrollmentStatus.ACTIVE);
    expect(byId(second.id)?.activationAttempts).toBe(2);
    expect(byId(second.id)?.nextRetryAt?.getTime()).toBeGreaterThan(Date.now());
    expect(byId(later.id)?.activationAttempts).toBe(1);
    expect(context.lms.provisionCalls.map((call) => call.courseId)).toEqual(['course-1', 'course-2']);
  });

  it('stops at the batch size', async () => {
    await setup(1);
    await seedActivating('course-1', null);
    await seedActivating('course-2', null);

    const summary = await poller.runOnce();

    expect(summary.processed).toBe(1);
    expect(context.lms.provisionCalls).toHaveLength(1);
  });

  it('skips a tick while the previous run is still going', async () => {
    await setup();
    await seedActivating('course-1', null);

    const [firstRun, secondRun] = await Promise.all([poller.runOnce(), poller.runOnce()]);

    expect(firstRun.processed).toBe(1);
    expect(secondRun).toEqual({ skipped: true, processed: 0, activated: 0, failed: 0 });
  });

  it('logs a failed claim and runs again on the next tick', async () => {
    await setup();
    await seedActivating('course-1', null);
    jest.spyOn(registry, 'claimNextDueActivation').mockRejectedValueOnce(new Error('deadlock detected'));

    await expect(poller.runOnce()).resolves.toEqual({
      skipped: false,
      processed: 0,
      activated: 0,
      failed: 0,
    });
    await expect(poller.runOnce()).resolves.toMatchObject({ processed: 1, activated: 1 });
  });
});
