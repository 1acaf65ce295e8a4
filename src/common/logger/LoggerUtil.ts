import * as winston from 'winston';

/**
 * Identifiers attached to a log line so one enrollment can be followed
 * through registration, payment and activation.
 */
export interface LogMeta {
  userId?: string;
  enrollmentId?: string;
  paymentId?: string;
  courseId?: string;
  [key: string]: unknown;
}

export class LoggerUtil {
  private static logger: winston.Logger | null = null;

  static getLogger(): winston.Logger {
    if (!this.logger) {
      const jsonLine = winston.format.printf(
        ({ timestamp, level, message, context, meta, error }) =>
          JSON.stringify({ timestamp, level, context, message, meta, error }),
      );

      this.logger = winston.createLogger({
        level: process.env.LOG_LEVEL || 'info',
        silent: process.env.LOG_SILENT === 'true',
        format: winston.format.combine(winston.format.timestamp(), jsonLine),
        transports: [new winston.transports.Console()],
      });
    }
    return this.logger;
  }

  static resetLogger() {
    this.logger = null;
  }

  static log(message: string, context?: string, meta?: LogMeta, level = 'info') {
    this.getLogger().log({ level, message, context, meta });
  }

  static error(message: string, error?: string, context?: string, meta?: LogMeta) {
    this.getLogger().error({ message, error, context, meta });
  }

  static warn(message: string, context?: string, meta?: LogMeta) {
    this.getLogger().warn({ message, context, meta });
  }

  static debug(message: string, context?: string, meta?: LogMeta) {
    this.getLogger().debug({ message, context, meta });
  }
}
