import { HttpStatus } from '@nestjs/common';
import { Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

export interface Params {
  resmsgid: string;
  status: 'successful' | 'failed';
  err: string | null;
  errmsg: string | null;
  successmessage?: string;
}

export interface ServerResponse<T = unknown> {
  id: string;
  ver: string;
  ts: string;
  params: Params;
  responseCode: number;
  result: T;
}

export default class APIResponse {
  private static readonly API_VERSION = '1.0';

  public static build<T>(
    apiId: string,
    result: T,
    statusCode: HttpStatus,
    params: Omit<Params, 'resmsgid'>,
  ): ServerResponse<T> {
    return {
      id: apiId,
      ver: APIResponse.API_VERSION,
      ts: new Date().toISOString(),
      params: { resmsgid: uuidv4(), ...params },
      responseCode: statusCode,
      result,
    };
  }

  public static success<T>(
    response: Response,
    apiId: string,
    result: T,
    statusCode: HttpStatus,
    successmessage: string,
  ) {
    return response.status(statusCode).json(
      APIResponse.build(apiId, result, statusCode, {
        status: 'successful',
        err: null,
        errmsg: null,
        successmessage,
      }),
    );
  }

  /**
   * @param errmsg human readable message
   * @param error machine readable code
   * @param result extra payload for the caller, e.g. gateway decline details
   */
  public static error(
    response: Response,
    apiId: string,
    errmsg: string,
    error: string,
    statusCode: HttpStatus,
    result: Record<string, unknown> = {},
  ) {
    return response.status(statusCode).json(
      APIResponse.build(apiId, result, statusCode, {
        status: 'failed',
        err: error,
        errmsg,
      }),
    );
  }
}
