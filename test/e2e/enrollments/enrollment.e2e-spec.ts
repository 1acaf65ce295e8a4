import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { CourseAccessController } from '../../../src/enrollments/controllers/course-access.controller';
import { EnrollmentController } from '../../../src/enrollments/controllers/enrollment.controller';
import { UserEnrollmentController } from '../../../src/enrollments/controllers/user-enrollment.controller';
import {
  createEnrollmentTestingModule,
  EnrollmentTestContext,
  seedCoupon,
  seedEnrollment,
} from '../../../src/enrollments/testing/enrollment-testing.module';
import { DEFAULT_ENROLLMENT_CONFIG } from '../../../src/config/enrollment.config';
import { EnrollmentPaymentStatus, EnrollmentStatus } from '../../../src/enrollments/enums/enrollment.enums';

const encode = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');
const bearer = (sub: string) =>
  `Bearer ${encode({ alg: 'HS256', typ: 'JWT' })}.${encode({ sub })}.signature`;

describe('Enrollment API (e2e)', () => {
  let app: INestApplication;
  let context: EnrollmentTestContext;

  beforeEach(async () => {
    context = await createEnrollmentTestingModule(
      { ...DEFAULT_ENROLLMENT_CONFIG, gateway: { timeoutMs: 50 } },
      [EnrollmentController, UserEnrollmentController, CourseAccessController],
    );
    context.lms.addCourse('course-500k', 500000);
    app = context.module.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  const server = () => app.getHttpServer();

  it('enrolls with a discount, takes payment and activates access', async () => {
    await seedCoupon(context.store);

    const created = await request(server())
      .post('/enrollments')
      .set('Authorization', bearer('user-1'))
      .send({
        courseId: 'course-500k',
        fullName: ' Le Van Cuong ',
        email: 'Cuong@Example.com',
        discountCode: 'save20',
      })
      .expect(201);

    const enrollment = created.body.result.enrollment;
    expect(created.body.id).toBe('api.enrollment.create');
    expect(created.body.result.paymentRequired).toBe(true);
    expect(created.body.result.accessImmediate).toBe(false);
    expect(created.body.result.paymentUrl).toBe(`/payment/process/${enrollment.id}`);
    expect(enrollment).toMatchObject({
      userId: 'user-1',
      fullName: 'Le Van Cuong',
      email: 'cuong@example.com',
      discountCode: 'SAVE20',
      paymentAmount: 500000,
      discountApplied: 100000,
      finalAmount: 400000,
      status: 'PAYMENT_PENDING',
      paymentStatus: 'PENDING',
      accessGranted: false,
    });

    const paid = await request(server())
      .post(`/enrollments/${enrollment.id}/payments`)
      .set('Authorization', bearer('user-1'))
      .send({ paymentMethod: 'paypal', paymentDetails: { paypalEmail: 'payer@example.com' } })
      .expect(200);

    expect(paid.body.result).toMatchObject({
      status: 'ENROLLED',
      paymentStatus: 'COMPLETED',
      accessGranted: true,
    });
    expect(context.gateways.paypal.charges[0].request.amount).toBe(400000);

    const activated = await request(server())
      .post(`/enrollments/${enrollment.id}/activate`)
      .set('Authorization', bearer('user-1'))
      .expect(200);

    expect(activated.body.params.successmessage).toBe('Course access activated');
    expect(activated.body.result).toMatchObject({
      status: 'ACTIVE',
      granted: true,
      firstLessonUrl: '/courses/course-500k/lessons/1',
      retryAvailable: false,
    });

    const access = await request(server())
      .get('/courses/course-500k/access')
      .query({ userId: 'user-1' })
      .expect(200);

    expect(access.body.result).toEqual({
      hasAccess: true,
      enrollmentId: enrollment.id,
      enrollmentStatus: 'ACTIVE',
    });
  });

  it('returns the decline details when the charge fails', async () => {
    const enrollment = await seedEnrollment(context.store, {
      courseId: 'course-500k',
      status: EnrollmentStatus.PAYMENT_PENDING,
      paymentStatus: EnrollmentPaymentStatus.PENDING,
      accessGranted: false,
      activationDate: null,
    });
    context.gateways.paypal.willDecline('INSUFFICIENT_FUNDS', 'Insufficient funds');

    const response = await request(server())
      .post(`/enrollments/${enrollment.id}/payments`)
      .set('Authorization', bearer('user-1'))
      .send({ paymentMethod: 'paypal', paymentDetails: { paypalEmail: 'payer@example.com' } })
      .expect(400);

    expect(response.body.params).toMatchObject({
      status: 'failed',
      err: 'PAYMENT_FAILED',
      errmsg: 'Insufficient funds',
    });
    expect(response.body.result).toEqual({
      paymentError: 'Insufficient funds',
      errorCode: 'INSUFFICIENT_FUNDS',
      gatewayResponse: { status: 'declined', errorCode: 'INSUFFICIENT_FUNDS' },
    });
  });

  it('rejects a request without a bearer token', async () => {
    const response = await request(server())
      .post('/enrollments')
      .send({ courseId: 'course-500k', fullName: 'Le Van Cuong', email: 'cuong@example.com' })
      .expect(401);

    expect(response.body.params.err).toBe('UNAUTHORIZED');
    expect(response.body.params.errmsg).toBe('Invalid or missing token');
  });

  it('rejects a body that fails validation', async () => {
    const response = await request(server())
      .post('/enrollments')
      .set('Authorization', bearer('user-1'))
      .send({ courseId: 'course-500k', fullName: 'Le Van Cuong' })
      .expect(400);

    expect(response.body.params.err).toBe('BAD_REQUEST');
    expect(response.body.params.errmsg).toContain('Email is required');
  });

  it("answers 404 for another user's enrollment", async () => {
    const enrollment = await seedEnrollment(context.store, { courseId: 'course-500k' });

    const response = await request(server())
      .get(`/enrollments/${enrollment.id}`)
      .set('Authorization', bearer('user-2'))
      .expect(404);

    expect(response.body.params.err).toBe('ENROLLMENT_NOT_FOUND');
  });

  it('clamps the page size of the enrollment list', async () => {
    await seedEnrollment(context.store, { courseId: 'course-500k' });

    const response = await request(server())
      .get('/users/user-1/enrollments')
      .set('Authorization', bearer('user-1'))
      .query({ limit: 500 })
      .expect(200);

    expect(response.body.result.data).toHaveLength(1);
    expect(response.body.result.pagination).toEqual({
      currentPage: 1,
      totalPages: 1,
      totalItems: 1,
      perPage: 100,
      hasNext: false,
      hasPrev: false,
    });
  });

  it("refuses to list another user's enrollments", async () => {
    await seedEnrollment(context.store, { courseId: 'course-500k' });

    const response = await request(server())
      .get('/users/user-1/enrollments')
      .set('Authorization', bearer('user-2'))
      .expect(404);

    expect(response.body.params.err).toBe('ENROLLMENT_NOT_FOUND');
    expect(response.body.result).toEqual({});
  });

  it('asks for a bearer token before listing enrollments', async () => {
    const response = await request(server()).get('/users/user-1/enrollments').expect(401);

    expect(response.body.params.errmsg).toBe('Invalid or missing token');
  });
});
