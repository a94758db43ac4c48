jest.mock('fs/promises', () => ({
  readFile: jest.fn(),
}));

// Mock AWS SDK
const mockSend = jest.fn();

jest.mock('@aws-sdk/client-s3', () => ({
  S3Client: jest.fn(() => ({ send: mockSend })),
  PutObjectCommand: jest.fn((input: unknown) => ({ input })),
  HeadBucketCommand: jest.fn((input: unknown) => ({ input })),
}));

import { S3Client as AWSS3Client, PutObjectCommand, HeadBucketCommand } from '@aws-sdk/client-s3';
import { readFile } from 'fs/promises';
import { S3Client, UploadError, createUploadMetadata } from '../src/clients/S3Client';
import { createConfig, createMockLogger } from './helpers';

const mockReadFile = jest.mocked(readFile);

function awsError(name: string): Error {
  const error = new Error(`${name} error`);
  error.name = name;
  return error;
}

describe('S3Client', () => {
  const metadata = { source: 'locize-backup', timestamp: '1705329045', version: 'latest' };
  let logger: ReturnType<typeof createMockLogger>;
  let sleep: jest.Mock;
  let s3Client: S3Client;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = createMockLogger();
    sleep = jest.fn().mockResolvedValue(undefined);
    mockReadFile.mockResolvedValue(Buffer.from('{"hello":"Hello"}'));

    s3Client = new S3Client(
      createConfig({
        storageType: 's3',
        s3Bucket: 'test-bucket',
        awsRegion: 'eu-central-1',
        awsAccessKeyId: 'test-access-key',
        awsSecretAccessKey: 'test-secret',
        maxRetries: 3,
        retryDelaySeconds: 5,
      }),
      logger,
      sleep
    );
  });

  describe('constructor', () => {
    it('should pass region and explicit credentials to the SDK', () => {
      expect(AWSS3Client).toHaveBeenCalledWith({
        region: 'eu-central-1',
        credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
      });
    });

    it('should fall back to the default credential chain and honour a custom endpoint', () => {
      new S3Client(
        createConfig({
          storageType: 's3',
          s3Bucket: 'test-bucket',
          s3EndpointUrl: 'http://localhost:9000',
        }),
        logger
      );

      expect(AWSS3Client).toHaveBeenLastCalledWith({
        region: 'us-east-1',
        endpoint: 'http://localhost:9000',
        forcePathStyle: true,
      });
    });

    it('should require a bucket', () => {
      expect(() => new S3Client(createConfig(), logger)).toThrow('S3Client requires an S3 bucket');
    });
  });

  describe('uploadFile', () => {
    it('should upload with content type, storage class and metadata', async () => {
      mockSend.mockResolvedValue({});

      const location = await s3Client.uploadFile(
        '/tmp/i18n-frontend-en.json',
        '2024/01/15/i18n-frontend-en-20240115-143045.json',
        metadata
      );

      expect(location).toBe('s3://test-bucket/2024/01/15/i18n-frontend-en-20240115-143045.json');
      expect(PutObjectCommand).toHaveBeenCalledWith({
        Bucket: 'test-bucket',
        Key: '2024/01/15/i18n-frontend-en-20240115-143045.json',
        Body: Buffer.from('{"hello":"Hello"}'),
        ContentLength: 17,
        ContentType: 'application/json',
        StorageClass: 'STANDARD_IA',
        Metadata: metadata,
      });
      expect(mockSend).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should retry transient failures with the configured delay', async () => {
      mockSend
        .mockRejectedValueOnce(new Error('socket hang up'))
        .mockRejectedValueOnce(new Error('socket hang up'))
        .mockResolvedValue({});

      await s3Client.uploadFile('/tmp/file.json', 'key.json', metadata);

      expect(mockSend).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(5000);
      expect(logger.warn).toHaveBeenCalledWith('S3 upload failed (attempt 1/3): key.json', {
        error: 'Error: socket hang up',
        retryInMs: 5000,
      });
    });

    it('should throw UploadError after exhausting attempts', async () => {
      mockSend.mockRejectedValue(new Error('socket hang up'));

      const promise = s3Client.uploadFile('/tmp/file.json', 'key.json', metadata);

      await expect(promise).rejects.toBeInstanceOf(UploadError);
      await expect(promise).rejects.toMatchObject({
        message: 'Failed to upload to S3 after 3 attempts: key.json (Error: socket hang up)',
        key: 'key.json',
        attempts: 3,
      });
      expect(mockSend).toHaveBeenCalledTimes(3);
    });

    it('should not retry authentication failures', async () => {
      mockSend.mockRejectedValue(awsError('AccessDenied'));

      await expect(s3Client.uploadFile('/tmp/file.json', 'key.json', metadata)).rejects.toMatchObject({
        attempts: 1,
      });
      expect(mockSend).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should fail without uploading when the file cannot be read', async () => {
      mockReadFile.mockRejectedValue(new Error('ENOENT: no such file'));

      await expect(s3Client.uploadFile('/tmp/missing.json', 'key.json', metadata)).rejects.toMatchObject({
        name: 'UploadError',
        attempts: 0,
      });
      expect(mockSend).not.toHaveBeenCalled();
    });
  });

  describe('testConnection', () => {
    it('should return true when the bucket is reachable', async () => {
      mockSend.mockResolvedValue({});

      await expect(s3Client.testConnection()).resolves.toBe(true);
      expect(HeadBucketCommand).toHaveBeenCalledWith({ Bucket: 'test-bucket' });
    });

    it('should return false and log when the bucket is not reachable', async () => {
      mockSend.mockRejectedValue(awsError('NotFound'));

      await expect(s3Client.testConnection()).resolves.toBe(false);
      expect(logger.error).toHaveBeenCalledWith(
        'S3 connection test failed for bucket test-bucket',
        expect.any(Error)
      );
    });
  });
});

describe('createUploadMetadata', () => {
  it('should record the tool, epoch seconds and version', () => {
    expect(createUploadMetadata('production', new Date('2024-01-15T14:30:45.900Z'))).toEqual({
      source: 'locize-backup',
      timestamp: '1705329045',
      version: 'production',
    });
  });
});
