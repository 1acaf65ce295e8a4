import { HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { Response } from 'express';
import { PaymentMethod } from '../../payments/enums/payment.enums';
import { EnrollmentStatus } from '../enums/enrollment.enums';
import { EnrollmentService } from '../services/enrollment.service';
import { EnrollmentController } from './enrollment.controller';

describe('EnrollmentController', () => {
  let controller: EnrollmentController;
  let service: {
    register: jest.Mock;
    processPayment: jest.Mock;
    activate: jest.Mock;
    cancel: jest.Mock;
  };
  let response: { status: jest.Mock; json: jest.Mock };

  beforeEach(async () => {
    service = {
      register: jest.fn(),
      processPayment: jest.fn(),
      activate: jest.fn(),
      cancel: jest.fn(),
    };
    const module: TestingModule = await Test.createTestingModule({
      controllers: [EnrollmentController],
      providers: [{ provide: EnrollmentService, useValue: service }],
    }).compile();

    controller = module.get<EnrollmentController>(EnrollmentController);
    response = { status: jest.fn(), json: jest.fn() };
    response.status.mockReturnValue(response);
  });

  const res = () => response as unknown as Response;
  const body = () => response.json.mock.calls[0][0];

  it('creates an enrollment for the caller with a 201', async () => {
    const created = {
      enrollment: { id: 'enr-1', status: EnrollmentStatus.PAYMENT_PENDING },
      paymentRequired: true,
      paymentUrl: '/payment/process/enr-1',
      accessImmediate: false,
    };
    service.register.mockResolvedValue(created);

    await controller.createEnrollment(
      'user-1',
      { courseId: 'course-1', fullName: 'Tran Thi Binh', email: 'binh@example.com' },
      res(),
    );

    expect(service.register).toHaveBeenCalledWith({
      userId: 'user-1',
      courseId: 'course-1',
      fullName: 'Tran Thi Binh',
      email: 'binh@example.com',
    });
    expect(response.status).toHaveBeenCalledWith(HttpStatus.CREATED);
    expect(body().id).toBe('api.enrollment.create');
    expect(body().params.successmessage).toBe('Enrollment created successfully');
    expect(body().result).toEqual(created);
  });

  it('passes the payment method and details through', async () => {
    service.processPayment.mockResolvedValue({ id: 'enr-1', status: EnrollmentStatus.ENROLLED });

    await controller.processPayment(
      'user-1',
      'enr-1',
      { paymentMethod: PaymentMethod.PAYPAL, paymentDetails: { paypalEmail: 'payer@example.com' } },
      res(),
    );

    expect(service.processPayment).toHaveBeenCalledWith('enr-1', 'user-1', PaymentMethod.PAYPAL, {
      paypalEmail: 'payer@example.com',
    });
    expect(response.status).toHaveBeenCalledWith(HttpStatus.OK);
  });

  it('reports a pending activation when access was not granted', async () => {
    service.activate.mockResolvedValue({
      enrollmentId: 'enr-1',
      status: EnrollmentStatus.ACTIVATING,
      granted: false,
      retryAvailable: true,
      activationAttempts: 1,
    });

    await controller.activate('user-1', 'enr-1', res());

    expect(body().params.successmessage).toBe('Course activation is in progress');
  });

  it('reports an activated course', async () => {
    service.activate.mockResolvedValue({
      enrollmentId: 'enr-1',
      status: EnrollmentStatus.ACTIVE,
      granted: true,
      firstLessonUrl: '/courses/course-1/lessons/1',
      retryAvailable: false,
      activationAttempts: 0,
    });

    await controller.activate('user-1', 'enr-1', res());

    expect(body().params.successmessage).toBe('Course access activated');
    expect(body().result.firstLessonUrl).toBe('/courses/course-1/lessons/1');
  });

  it('cancels with the given reason', async () => {
    service.cancel.mockResolvedValue({ id: 'enr-1', status: EnrollmentStatus.CANCELLED });

    await controller.cancel('user-1', 'enr-1', { reason: 'Changed my mind' }, res());

    expect(service.cancel).toHaveBeenCalledWith('enr-1', 'user-1', 'Changed my mind');
  });
});
