export enum EnrollmentStatus {
  PENDING = 'PENDING',
  PAYMENT_PENDING = 'PAYMENT_PENDING',
  ENROLLED = 'ENROLLED',
  ACTIVATING = 'ACTIVATING',
  ACTIVE = 'ACTIVE',
  CANCELLED = 'CANCELLED',
}

export enum EnrollmentPaymentStatus {
  PENDING = 'PENDING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
}

export enum AccessReasonCode {
  NOT_ENROLLED = 'NOT_ENROLLED',
  PAYMENT_PENDING = 'PAYMENT_PENDING',
  ENROLLMENT_EXPIRED = 'ENROLLMENT_EXPIRED',
}
