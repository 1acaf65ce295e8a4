export const API_RESPONSES = {
  NOT_FOUND: 'Not Found',
  BAD_REQUEST: 'Bad Request',
  INTERNAL_SERVER_ERROR: 'Internal Server Error',
  UNEXPECTED_ERROR: 'An unexpected error occurred',
  UNAUTHORIZED: 'Invalid or missing token',

  ENROLLMENT_CREATED: 'Enrollment created successfully',
  ENROLLMENT_PAYMENT_SUCCESS: 'Payment completed successfully',
  ENROLLMENT_ACTIVATED: 'Course access activated',
  ENROLLMENT_ACTIVATION_PENDING: 'Course activation is in progress',
  ENROLLMENT_CANCELLED: 'Enrollment cancelled successfully',
  ENROLLMENT_FETCHED: 'Enrollment fetched successfully',
  ENROLLMENT_LIST_FETCHED: 'Enrollments fetched successfully',
  ENROLLMENT_NOT_FOUND: 'Enrollment not found',
  ENROLLMENT_DUPLICATE: 'This user is already enrolled in this course',
  ENROLLMENT_NOT_PAYABLE: 'Enrollment is not pending payment',
  ENROLLMENT_NOT_ELIGIBLE: 'Enrollment is not eligible for activation',
  ENROLLMENT_PAYMENT_INCOMPLETE: 'Payment must be completed before activation',
  ENROLLMENT_NO_RETRIES: 'No retries available for this enrollment',
  COURSE_NOT_FOUND: 'Course not found or not available for enrollment',
  COURSE_ACCESS_CHECKED: 'Course access checked',

  ACCESS_NOT_ENROLLED: 'You need to enroll in this course to access the content',
  ACCESS_PAYMENT_PENDING: 'Payment is required to access this course',
  ACCESS_ENROLLMENT_EXPIRED: 'Your enrollment has expired or been cancelled',

  PAYMENT_FAILED: 'Payment processing failed',
  PAYMENT_IN_PROGRESS: 'A payment for this enrollment is already being processed',
  PAYMENT_ALREADY_FINALIZED: 'Payment has already been finalized',
  PAYMENT_GATEWAY_TIMEOUT: 'Payment gateway did not respond in time',
  PAYMENT_GATEWAY_ERROR: 'Payment gateway error',
  PAYMENT_GATEWAY_NOT_CONFIGURED: 'Payment gateway is not configured',

  COUPON_CREATED: 'Coupon created successfully',
  COUPON_VALIDATED: 'Coupon validation completed',
  COUPON_FETCHED: 'Coupon fetched successfully',
  COUPON_LIST_FETCHED: 'Coupons fetched successfully',
  COUPON_DEACTIVATED: 'Coupon deactivated successfully',
  COUPON_NOT_FOUND: 'Coupon not found',
  COUPON_EXISTS: 'Coupon code already exists',
  COUPON_INVALID_CODE: 'Invalid discount code',
  COUPON_EXPIRED: 'Discount code has expired or is not active',
  COUPON_USAGE_LIMIT: 'You have reached the usage limit for this coupon',
  COUPON_USAGE_EXHAUSTED: 'This discount code has reached its usage limit',
  COUPON_VALID: 'Valid discount code',
  COUPON_MINIMUM_ORDER: (minimum: number) => `Minimum order amount is ${minimum}`,

  CRON_ACTIVATION_RETRY_DONE: 'Activation retry pass completed',
  HEALTH_OK: 'Service is healthy',
};
