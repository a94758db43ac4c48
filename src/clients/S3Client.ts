import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  PutObjectCommand,
  HeadBucketCommand,
  PutObjectCommandInput,
} from '@aws-sdk/client-s3';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { S3Client as IS3Client, UploadMetadata } from '../interfaces/S3Client';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { TOOL_NAME } from '../version';
import { withRetry, RetryExhaustedError, formatError, sleep as defaultSleep } from '../utils/retry';

export class UploadError extends Error {
  constructor(
    message: string,
    public readonly key: string,
    public readonly attempts: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'UploadError';
  }
}

// Retrying these cannot succeed without a configuration change
const NON_RETRYABLE_CODES = [
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'AccessDenied',
  'NoSuchBucket',
  'InvalidBucketName',
];

/**
 * Provenance metadata for an object uploaded now
 */
export function createUploadMetadata(version: string, now: Date): UploadMetadata {
  return {
    source: TOOL_NAME,
    timestamp: String(Math.floor(now.getTime() / 1000)),
    version,
  };
}

/**
 * S3Client implementation using AWS SDK v3
 * Uploads with a fixed number of attempts and a fixed delay between them
 */
export class S3Client implements IS3Client {
  private client: AWSS3Client;
  private bucket: string;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(
    config: BackupConfig,
    private readonly logger: Logger,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep
  ) {
    if (!config.s3Bucket) {
      throw new Error('S3Client requires an S3 bucket');
    }

    const clientConfig: S3ClientConfig = {
      region: config.awsRegion,
    };

    // Without explicit keys the SDK default chain applies (profile, IAM role)
    if (config.awsAccessKeyId && config.awsSecretAccessKey) {
      clientConfig.credentials = {
        accessKeyId: config.awsAccessKeyId,
        secretAccessKey: config.awsSecretAccessKey,
      };
    }

    // Use custom endpoint if provided (for S3-compatible services)
    if (config.s3EndpointUrl) {
      clientConfig.endpoint = config.s3EndpointUrl;
      clientConfig.forcePathStyle = true;
    }

    this.client = new AWSS3Client(clientConfig);
    this.bucket = config.s3Bucket;
    this.maxRetries = config.maxRetries;
    this.retryDelayMs = config.retryDelaySeconds * 1000;
  }

  /**
   * Upload a file to S3 with retry logic
   */
  async uploadFile(filePath: string, key: string, metadata: UploadMetadata): Promise<string> {
    let body: Buffer;
    try {
      body = await readFile(filePath);
    } catch (error) {
      throw new UploadError(`Cannot read ${filePath}: ${formatError(error)}`, key, 0, error);
    }

    const uploadParams: PutObjectCommandInput = {
      Bucket: this.bucket,
      Key: key,
      Body: body,
      ContentLength: body.length,
      ContentType: 'application/json',
      StorageClass: 'STANDARD_IA',
      Metadata: {
        source: metadata.source,
        timestamp: metadata.timestamp,
        version: metadata.version,
      },
    };

    try {
      await withRetry(
        async attempt => {
          this.logger.debug(
            `S3 upload attempt ${attempt}/${this.maxRetries} for ${basename(key)}`
          );
          await this.client.send(new PutObjectCommand(uploadParams));
        },
        `upload ${key}`,
        {
          maxAttempts: this.maxRetries,
          delayMs: this.retryDelayMs,
          isRetryable: error => !this.isNonRetryableError(error),
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn(`S3 upload failed (attempt ${attempt}/${this.maxRetries}): ${key}`, {
              error: formatError(error),
              retryInMs: delayMs,
            });
          },
          sleep: this.sleep,
        }
      );
    } catch (error) {
      const attempts = error instanceof RetryExhaustedError ? error.attempt : 1;
      const cause = error instanceof RetryExhaustedError ? error.cause : error;
      throw new UploadError(
        `Failed to upload to S3 after ${attempts} attempts: ${key} (${formatError(cause)})`,
        key,
        attempts,
        cause
      );
    }

    this.logger.debug(`Uploaded to S3: ${basename(key)}`);
    return `s3://${this.bucket}/${key}`;
  }

  /**
   * Test S3 connectivity and permissions
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return true;
    } catch (error) {
      this.logger.error(
        `S3 connection test failed for bucket ${this.bucket}`,
        error instanceof Error ? error : new Error(String(error))
      );
      return false;
    }
  }

  /**
   * Check if an error should not be retried
   */
  private isNonRetryableError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) {
      return false;
    }

    const name = 'name' in error ? error.name : undefined;
    const code = 'Code' in error ? error.Code : undefined;
    return (
      (typeof name === 'string' && NON_RETRYABLE_CODES.includes(name)) ||
      (typeof code === 'string' && NON_RETRYABLE_CODES.includes(code))
    );
  }
}
