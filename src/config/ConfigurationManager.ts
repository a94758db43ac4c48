import { BackupConfig } from '../interfaces/BackupConfig';
import { LogLevel } from '../interfaces/Logger';
import { EnvironmentConfig } from '../types/EnvironmentConfig';

export class ConfigurationError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const DEFAULTS = {
  languages: 'en',
  namespaces: 'translation',
  version: 'latest',
  locizeApiUrl: 'https://api.locize.app',
  awsRegion: 'us-east-1',
  backupDir: '/app/backup/data',
  maxRetries: 3,
  retryDelaySeconds: 5,
  rateLimitDelaySeconds: 1,
  requestTimeoutSeconds: 30,
} as const;

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

type EnvironmentReader = (name: keyof EnvironmentConfig) => string | undefined;

function readerFor(source: NodeJS.ProcessEnv): EnvironmentReader {
  return name => source[name];
}

export class ConfigurationManager {
  /**
   * Load and validate configuration from environment variables
   */
  static loadConfiguration(source: NodeJS.ProcessEnv = process.env): BackupConfig {
    const env = readerFor(source);

    const projectId = this.readString(env('LOCIZE_PROJECT_ID'));
    if (!projectId) {
      throw new ConfigurationError(
        'Missing required environment variables: LOCIZE_PROJECT_ID',
        'LOCIZE_PROJECT_ID'
      );
    }

    const s3Bucket = this.readString(env('S3_BUCKET_NAME'));
    const awsAccessKeyId = this.readString(env('AWS_ACCESS_KEY_ID'));
    const awsSecretAccessKey = this.readString(env('AWS_SECRET_ACCESS_KEY'));

    if (s3Bucket && awsAccessKeyId && !awsSecretAccessKey) {
      throw new ConfigurationError(
        'AWS_SECRET_ACCESS_KEY is required when AWS_ACCESS_KEY_ID is set',
        'AWS_SECRET_ACCESS_KEY'
      );
    }

    const storageType = s3Bucket ? 's3' : 'local';
    const cleanupLocalFiles = this.parseBoolean(env('CLEANUP_LOCAL_FILES'), true, 'CLEANUP_LOCAL_FILES');

    const config: BackupConfig = {
      projectId,
      languages: this.parseList(env('LOCIZE_LANGUAGES'), DEFAULTS.languages, 'LOCIZE_LANGUAGES'),
      namespaces: this.parseList(env('LOCIZE_NAMESPACES'), DEFAULTS.namespaces, 'LOCIZE_NAMESPACES'),
      version: this.readString(env('LOCIZE_VERSION')) ?? DEFAULTS.version,
      locizeApiUrl: (this.readString(env('LOCIZE_API_URL')) ?? DEFAULTS.locizeApiUrl).replace(/\/+$/, ''),
      requestTimeoutSeconds: this.parseNumber(
        env('LOCIZE_CLI_TIMEOUT'),
        DEFAULTS.requestTimeoutSeconds,
        'LOCIZE_CLI_TIMEOUT',
        { min: 0, exclusiveMin: true }
      ),
      storageType,
      awsRegion: this.readString(env('AWS_REGION')) ?? DEFAULTS.awsRegion,
      maxRetries: this.parseNumber(env('MAX_RETRIES'), DEFAULTS.maxRetries, 'MAX_RETRIES', {
        min: 1,
        integer: true,
      }),
      retryDelaySeconds: this.parseNumber(env('RETRY_DELAY'), DEFAULTS.retryDelaySeconds, 'RETRY_DELAY', {
        min: 0,
      }),
      rateLimitDelaySeconds: this.parseNumber(
        env('RATE_LIMIT_DELAY'),
        DEFAULTS.rateLimitDelaySeconds,
        'RATE_LIMIT_DELAY',
        { min: 0 }
      ),
      // Local-only mode never removes what it just backed up
      cleanupLocalFiles: storageType === 's3' ? cleanupLocalFiles : false,
      backupDir: this.readString(env('BACKUP_DIR')) ?? DEFAULTS.backupDir,
      logLevel: this.parseLogLevel(env('LOG_LEVEL')),
    };

    // Add optional properties only if they exist
    const apiKey = this.readString(env('LOCIZE_API_KEY'));
    if (apiKey) {
      config.apiKey = apiKey;
    }
    if (s3Bucket) {
      config.s3Bucket = s3Bucket;
    }
    if (awsAccessKeyId) {
      config.awsAccessKeyId = awsAccessKeyId;
    }
    if (awsSecretAccessKey) {
      config.awsSecretAccessKey = awsSecretAccessKey;
    }
    const awsProfile = this.readString(env('AWS_PROFILE'));
    if (awsProfile) {
      config.awsProfile = awsProfile;
    }
    const endpointUrl = this.readString(env('AWS_ENDPOINT_URL'));
    if (endpointUrl) {
      config.s3EndpointUrl = endpointUrl;
    }

    return config;
  }

  /**
   * Non-fatal findings about a loaded configuration, to be logged at startup
   */
  static getWarnings(config: BackupConfig, source: NodeJS.ProcessEnv = process.env): string[] {
    const env = readerFor(source);
    const warnings: string[] = [];

    if (!config.apiKey) {
      warnings.push('LOCIZE_API_KEY not set - only public projects will be accessible');
    }

    const cleanupRequested = this.parseBoolean(
      env('CLEANUP_LOCAL_FILES'),
      true,
      'CLEANUP_LOCAL_FILES'
    );
    if (config.storageType === 'local' && cleanupRequested) {
      warnings.push('CLEANUP_LOCAL_FILES is set to true but using local storage - setting to false');
    }

    if (config.storageType === 's3' && !config.awsAccessKeyId && !config.awsProfile) {
      warnings.push(
        'No AWS credentials found (AWS_ACCESS_KEY_ID or AWS_PROFILE). Assuming IAM role or instance profile is configured.'
      );
    }

    return warnings;
  }

  /**
   * Copy of the configuration that is safe to log
   */
  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    const { apiKey, awsAccessKeyId, awsSecretAccessKey, ...rest } = config;
    return {
      ...rest,
      apiKey: apiKey ? '[REDACTED]' : undefined,
      awsAccessKeyId: awsAccessKeyId ? `${awsAccessKeyId.slice(0, 8)}...` : undefined,
      awsSecretAccessKey: awsSecretAccessKey ? '[REDACTED]' : undefined,
    };
  }

  private static readString(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  }

  private static parseList(value: string | undefined, fallback: string, field: string): string[] {
    const raw = value === undefined || value.trim() === '' ? fallback : value;
    const items = raw
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);

    if (items.length === 0) {
      throw new ConfigurationError(`${field} must contain at least one entry`, field);
    }

    return Array.from(new Set(items));
  }

  private static parseNumber(
    value: string | undefined,
    fallback: number,
    field: string,
    rules: { min: number; exclusiveMin?: boolean; integer?: boolean }
  ): number {
    const raw = this.readString(value);
    if (raw === undefined) {
      return fallback;
    }

    const parsed = Number(raw);
    const valid =
      Number.isFinite(parsed) &&
      (rules.exclusiveMin ? parsed > rules.min : parsed >= rules.min) &&
      (!rules.integer || Number.isInteger(parsed));

    if (!valid) {
      const kind = rules.integer ? 'an integer' : 'a number';
      const bound = rules.exclusiveMin ? `greater than ${rules.min}` : `at least ${rules.min}`;
      throw new ConfigurationError(`${field} must be ${kind} ${bound}, got "${raw}"`, field);
    }

    return parsed;
  }

  private static parseBoolean(value: string | undefined, fallback: boolean, field: string): boolean {
    const raw = this.readString(value)?.toLowerCase();
    if (raw === undefined) {
      return fallback;
    }
    if (TRUE_VALUES.includes(raw)) {
      return true;
    }
    if (FALSE_VALUES.includes(raw)) {
      return false;
    }
    throw new ConfigurationError(`${field} must be true or false, got "${value}"`, field);
  }

  private static parseLogLevel(value: string | undefined): LogLevel {
    const raw = this.readString(value)?.toLowerCase();
    if (raw === undefined) {
      return LogLevel.INFO;
    }

    const level = Object.values(LogLevel).find(candidate => candidate === raw);
    if (!level) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of ERROR, WARN, SUCCESS, INFO, DEBUG, got "${value}"`,
        'LOG_LEVEL'
      );
    }
    return level;
  }
}
