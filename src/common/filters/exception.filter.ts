import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Response } from 'express';
import { httpStatusForDomainError, isDomainError } from '../errors/domain-error';
import { LoggerUtil } from '../logger/LoggerUtil';
import APIResponse from '../responses/response';
import { API_RESPONSES } from '../utils/response.messages';

/**
 * Turns anything thrown by a route into the standard response envelope.
 * The api id passed at construction becomes the envelope id and log context.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  constructor(private readonly apiId: string) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    if (isDomainError(exception)) {
      const status = httpStatusForDomainError(exception);
      LoggerUtil.warn(`${exception.code}: ${exception.message}`, this.apiId);
      return APIResponse.error(
        response,
        this.apiId,
        exception.message,
        exception.code,
        status,
        exception.details ?? {},
      );
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return APIResponse.error(
        response,
        this.apiId,
        this.extractMessage(exception),
        HttpStatus[status] ?? API_RESPONSES.BAD_REQUEST,
        status,
      );
    }

    const error = exception instanceof Error ? exception : new Error(String(exception));
    LoggerUtil.error(error.message, error.stack, this.apiId);
    return APIResponse.error(
      response,
      this.apiId,
      API_RESPONSES.INTERNAL_SERVER_ERROR,
      HttpStatus[HttpStatus.INTERNAL_SERVER_ERROR],
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }

  // ValidationPipe puts its messages in an array on the response body
  private extractMessage(exception: HttpException): string {
    const body = exception.getResponse();
    if (typeof body === 'string') {
      return body;
    }
    const message = 'message' in body ? body.message : undefined;
    if (Array.isArray(message)) {
      return message.join(', ');
    }
    return typeof message === 'string' ? message : exception.message;
  }
}
