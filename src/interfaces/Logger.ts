export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  success(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup operations
  logConfigurationStart(config: LogMeta): void;
  logPairComplete(language: string, namespace: string, location: string): void;
  logPairFailure(language: string, namespace: string, reason: string): void;
  logRunSummary(total: number, successful: number, failed: number, failedCombinations: string[]): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  SUCCESS = 'success',
  INFO = 'info',
  DEBUG = 'debug',
}
