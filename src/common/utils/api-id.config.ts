/**
 * API ID Configuration
 *
 * Unique identifiers for every endpoint. They are echoed in the `id` field of
 * the response envelope and used as logging context.
 *
 * Naming Convention:
 * - Format: 'api.{module}.{action}'
 * - All IDs are lowercase with dots as separators
 */
export const APIID = {
  // Enrollment workflow
  ENROLLMENT_CREATE: 'api.enrollment.create',
  ENROLLMENT_PAYMENT: 'api.enrollment.payment',
  ENROLLMENT_ACTIVATE: 'api.enrollment.activate',
  ENROLLMENT_ACTIVATE_RETRY: 'api.enrollment.activate.retry',
  ENROLLMENT_CANCEL: 'api.enrollment.cancel',
  ENROLLMENT_GET: 'api.enrollment.get',
  ENROLLMENT_USER_LIST: 'api.enrollment.user.list',
  COURSE_ACCESS_CHECK: 'api.course.access',

  // Coupons
  COUPON_CREATE: 'api.coupon.create',
  COUPON_VALIDATE: 'api.coupon.validate',
  COUPON_GET: 'api.coupon.get',
  COUPON_LIST: 'api.coupon.list',
  COUPON_DEACTIVATE: 'api.coupon.deactivate',

  // Scheduled jobs
  CRON_ACTIVATION_RETRY: 'api.cron.activation.retry',

  HEALTH: 'api.enrollment.health',
} as const;
