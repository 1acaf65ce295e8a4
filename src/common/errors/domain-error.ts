import { HttpStatus } from '@nestjs/common';

/**
 * Business error raised by services and mapped to an HTTP response by
 * AllExceptionsFilter. `details` is returned to the caller as the result body.
 */
export class DomainError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;

    // keep instanceof working when compiled to ES5-style classes
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

export const COMMON_ERROR = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
} as const;
Object.freeze(COMMON_ERROR);

export const ENROLLMENT_ERROR = {
  DUPLICATE_ENROLLMENT: 'DUPLICATE_ENROLLMENT',
  INVALID_DISCOUNT: 'INVALID_DISCOUNT',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  ENROLLMENT_NOT_FOUND: 'ENROLLMENT_NOT_FOUND',
  COURSE_NOT_FOUND: 'COURSE_NOT_FOUND',
  NOT_ELIGIBLE_FOR_ACTIVATION: 'NOT_ELIGIBLE_FOR_ACTIVATION',
  NO_RETRIES_AVAILABLE: 'NO_RETRIES_AVAILABLE',
  PAYMENT_NOT_ALLOWED: 'PAYMENT_NOT_ALLOWED',
} as const;
Object.freeze(ENROLLMENT_ERROR);

export const PAYMENT_ERROR = {
  MISSING_PAYMENT_DATA: 'MISSING_PAYMENT_DATA',
  PAYMENT_FAILED: 'PAYMENT_FAILED',
  PAYMENT_IN_PROGRESS: 'PAYMENT_IN_PROGRESS',
  PAYMENT_ALREADY_FINALIZED: 'PAYMENT_ALREADY_FINALIZED',
  PAYMENT_NOT_FOUND: 'PAYMENT_NOT_FOUND',
  GATEWAY_TIMEOUT: 'GATEWAY_TIMEOUT',
  GATEWAY_ERROR: 'GATEWAY_ERROR',
  GATEWAY_NOT_CONFIGURED: 'GATEWAY_NOT_CONFIGURED',
} as const;
Object.freeze(PAYMENT_ERROR);

export const COUPON_ERROR = {
  COUPON_NOT_FOUND: 'COUPON_NOT_FOUND',
  COUPON_ALREADY_EXISTS: 'COUPON_ALREADY_EXISTS',
} as const;
Object.freeze(COUPON_ERROR);

export type CommonErrorCode = (typeof COMMON_ERROR)[keyof typeof COMMON_ERROR];
export type EnrollmentErrorCode = (typeof ENROLLMENT_ERROR)[keyof typeof ENROLLMENT_ERROR];
export type PaymentErrorCode = (typeof PAYMENT_ERROR)[keyof typeof PAYMENT_ERROR];
export type CouponErrorCode = (typeof COUPON_ERROR)[keyof typeof COUPON_ERROR];

const NOT_FOUND_CODES: ReadonlySet<string> = new Set([
  ENROLLMENT_ERROR.ENROLLMENT_NOT_FOUND,
  ENROLLMENT_ERROR.COURSE_NOT_FOUND,
  PAYMENT_ERROR.PAYMENT_NOT_FOUND,
  COUPON_ERROR.COUPON_NOT_FOUND,
]);

/**
 * Every domain error is a client error except lookups of unknown ids.
 */
export function httpStatusForDomainError(error: DomainError): HttpStatus {
  return NOT_FOUND_CODES.has(error.code) ? HttpStatus.NOT_FOUND : HttpStatus.BAD_REQUEST;
}

export const isDomainError = (error: unknown): error is DomainError => {
  if (error instanceof DomainError) return true;
  if (!error || typeof error !== 'object') return false;
  return (
    'name' in error &&
    error.name === 'DomainError' &&
    'code' in error &&
    typeof error.code === 'string'
  );
};
