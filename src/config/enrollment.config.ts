import { ConfigService } from '@nestjs/config';

export const ENROLLMENT_CONFIG = 'ENROLLMENT_CONFIG';

export interface EnrollmentConfig {
  currency: string;
  paymentUrlBase: string;
  activation: {
    maxRetries: number;
    backoffBaseSeconds: number;
    backoffCapSeconds: number;
  };
  poller: {
    enabled: boolean;
    batchSize: number;
  };
  gateway: {
    timeoutMs: number;
  };
}

export const DEFAULT_ENROLLMENT_CONFIG: EnrollmentConfig = {
  currency: 'VND',
  paymentUrlBase: '/payment/process',
  activation: {
    maxRetries: 3,
    backoffBaseSeconds: 300,
    backoffCapSeconds: 900,
  },
  poller: {
    enabled: false,
    batchSize: 20,
  },
  gateway: {
    timeoutMs: 30000,
  },
};

function readPositiveInt(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return fallback;
  }
  const value = typeof raw === 'number' ? raw : Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Builds the workflow settings from the environment. Values that are present
 * but malformed stop the application at startup.
 */
export function loadEnrollmentConfig(configService: ConfigService): EnrollmentConfig {
  const defaults = DEFAULT_ENROLLMENT_CONFIG;
  const config: EnrollmentConfig = {
    currency: configService.get<string>('ENROLLMENT_CURRENCY', defaults.currency).toUpperCase(),
    paymentUrlBase: configService.get<string>('PAYMENT_URL_BASE', defaults.paymentUrlBase),
    activation: {
      maxRetries: readPositiveInt(
        configService,
        'ACTIVATION_MAX_RETRIES',
        defaults.activation.maxRetries,
      ),
      backoffBaseSeconds: readPositiveInt(
        configService,
        'ACTIVATION_BACKOFF_BASE_SECONDS',
        defaults.activation.backoffBaseSeconds,
      ),
      backoffCapSeconds: readPositiveInt(
        configService,
        'ACTIVATION_BACKOFF_CAP_SECONDS',
        defaults.activation.backoffCapSeconds,
      ),
    },
    poller: {
      enabled: configService.get<string>('ACTIVATION_POLLER_ENABLED', 'false') === 'true',
      batchSize: readPositiveInt(
        configService,
        'ACTIVATION_POLLER_BATCH_SIZE',
        defaults.poller.batchSize,
      ),
    },
    gateway: {
      timeoutMs: readPositiveInt(
        configService,
        'PAYMENT_GATEWAY_TIMEOUT_MS',
        defaults.gateway.timeoutMs,
      ),
    },
  };

  if (config.activation.backoffCapSeconds < config.activation.backoffBaseSeconds) {
    throw new Error('ACTIVATION_BACKOFF_CAP_SECONDS must not be lower than ACTIVATION_BACKOFF_BASE_SECONDS');
  }
  return config;
}
