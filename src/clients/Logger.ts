import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';

const LEVELS: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.SUCCESS]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
};

const COLORS: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'red',
  [LogLevel.WARN]: 'yellow',
  [LogLevel.SUCCESS]: 'green',
  [LogLevel.INFO]: 'cyan',
  [LogLevel.DEBUG]: 'blue',
};

const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'credential',
  'apikey',
  'api_key',
  'accesskey',
  'access_key',
  'authorization',
];

/**
 * winston threshold for a configured level. Errors and warnings always
 * print, info and success are hidden only at ERROR, debug needs DEBUG.
 */
export function thresholdFor(logLevel: LogLevel): LogLevel {
  switch (logLevel) {
    case LogLevel.DEBUG:
      return LogLevel.DEBUG;
    case LogLevel.ERROR:
      return LogLevel.WARN;
    default:
      return LogLevel.INFO;
  }
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    winston.addColors(COLORS);

    this.winston = winston.createLogger({
      levels: LEVELS,
      level: thresholdFor(logLevel),
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true })
      ),
      transports: [
        new winston.transports.Console({
          stderrLevels: [LogLevel.ERROR, LogLevel.WARN],
          format: winston.format.combine(
            winston.format(info => {
              info.level = info.level.toUpperCase();
              return info;
            })(),
            winston.format.colorize(),
            winston.format.printf(info => {
              const { timestamp, level, message, ...meta } = info;
              const metaKeys = Object.keys(meta);
              const suffix = metaKeys.length > 0 ? ` ${JSON.stringify(meta)}` : '';
              return `[${String(timestamp)}] [${level}] ${String(message)}${suffix}`;
            })
          ),
        }),
      ],
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  private sanitizeMeta(meta: LogMeta): LogMeta {
    const sanitized: LogMeta = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = value === undefined ? undefined : '[REDACTED]';
      } else if (this.isPlainObject(value)) {
        sanitized[key] = this.sanitizeMeta(value);
      }
    }

    return sanitized;
  }

  private isPlainObject(value: unknown): value is LogMeta {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  private write(level: LogLevel, message: string, meta?: LogMeta): void {
    if (meta) {
      this.winston.log(level, message, this.sanitizeMeta(meta));
    } else {
      this.winston.log(level, message);
    }
  }

  info(message: string, meta?: LogMeta): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    if (!error) {
      this.write(LogLevel.ERROR, message, meta);
      return;
    }

    this.write(LogLevel.ERROR, message, {
      ...meta,
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
    });
  }

  debug(message: string, meta?: LogMeta): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  success(message: string, meta?: LogMeta): void {
    this.write(LogLevel.SUCCESS, message, meta);
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config,
    });
  }

  logPairComplete(language: string, namespace: string, location: string): void {
    this.success(`Successfully backed up: ${language}/${namespace} -> ${location}`, {
      operation: 'pair_complete',
      language,
      namespace,
      location,
    });
  }

  logPairFailure(language: string, namespace: string, reason: string): void {
    this.error(`Failed to back up: ${language}/${namespace}`, undefined, {
      operation: 'pair_failure',
      language,
      namespace,
      reason,
    });
  }

  logRunSummary(
    total: number,
    successful: number,
    failed: number,
    failedCombinations: string[]
  ): void {
    this.info(`Total: ${total}, Successful: ${successful}, Failed: ${failed}`, {
      operation: 'run_summary',
      total,
      successful,
      failed,
      ...(failedCombinations.length > 0 ? { failedCombinations } : {}),
    });
  }
}
