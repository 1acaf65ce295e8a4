import { HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken } from '@nestjs/typeorm';
import { Response } from 'express';
import { LMSService } from '../common/services/lms.service';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

describe('HealthController', () => {
  let controller: HealthController;

  const mockDataSource = {
    isInitialized: true,
    query: jest.fn(),
  };
  const mockLMSService = {
    healthCheck: jest.fn(),
  };
  const mockResponse = {
    status: jest.fn().mockReturnThis(),
    json: jest.fn().mockReturnThis(),
  };
  const response = mockResponse as unknown as Response;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        HealthService,
        { provide: getDataSourceToken(), useValue: mockDataSource },
        { provide: LMSService, useValue: mockLMSService },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  afterEach(() => {
    jest.clearAllMocks();
    mockDataSource.isInitialized = true;
  });

  it('reports healthy when the database answers', async () => {
    mockDataSource.query.mockResolvedValue([{ '?column?': 1 }]);
    mockLMSService.healthCheck.mockResolvedValue(true);

    await controller.checkHealth(response);

    expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.OK);
    const [body] = mockResponse.json.mock.calls[0];
    expect(body.id).toBe('api.enrollment.health');
    expect(body.ver).toBe('1.0');
    expect(body.params.status).toBe('successful');
    expect(body.result.healthy).toBe(true);
    expect(body.result.checks.map((check: { name: string; status: string }) => [check.name, check.status])).toEqual([
      ['postgres db', 'up'],
      ['lms-service', 'up'],
    ]);
  });

  it('stays healthy when only the LMS is down', async () => {
    mockDataSource.query.mockResolvedValue([]);
    mockLMSService.healthCheck.mockResolvedValue(false);

    await controller.checkHealth(response);

    expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.OK);
    const [body] = mockResponse.json.mock.calls[0];
    expect(body.result.checks[1]).toMatchObject({ name: 'lms-service', status: 'down', message: 'LMS unreachable' });
  });

  it('answers 503 when the database query fails', async () => {
    mockDataSource.query.mockRejectedValue(new Error('Connection failed'));
    mockLMSService.healthCheck.mockResolvedValue(true);

    await controller.checkHealth(response);

    expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.SERVICE_UNAVAILABLE);
    const [body] = mockResponse.json.mock.calls[0];
    expect(body.params).toMatchObject({
      status: 'failed',
      err: 'DATABASE_CONNECTION_ERROR',
      errmsg: 'Connection failed',
    });
    expect(body.result.healthy).toBe(false);
  });

  it('answers 503 before the connection is initialised', async () => {
    mockDataSource.isInitialized = false;
    mockLMSService.healthCheck.mockResolvedValue(true);

    await controller.checkHealth(response);

    expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.SERVICE_UNAVAILABLE);
    expect(mockDataSource.query).not.toHaveBeenCalled();
  });
});
