import { LogLevel } from './Logger';

export type StorageType = 'local' | 's3';

export interface BackupConfig {
  projectId: string;
  apiKey?: string;
  languages: string[];
  namespaces: string[];
  version: string; // "latest" or a pinned version name
  locizeApiUrl: string;
  requestTimeoutSeconds: number;

  storageType: StorageType;
  s3Bucket?: string;
  awsRegion: string;
  awsAccessKeyId?: string;
  awsSecretAccessKey?: string;
  awsProfile?: string;
  s3EndpointUrl?: string;

  maxRetries: number;
  retryDelaySeconds: number;
  rateLimitDelaySeconds: number;
  cleanupLocalFiles: boolean;
  backupDir: string;
  logLevel: LogLevel;
}
