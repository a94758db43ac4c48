import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { BackupConfig } from '../src/interfaces/BackupConfig';
import { Logger, LogLevel } from '../src/interfaces/Logger';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    success: jest.fn(),
    logConfigurationStart: jest.fn(),
    logPairComplete: jest.fn(),
    logPairFailure: jest.fn(),
    logRunSummary: jest.fn(),
  };
}

export function createConfig(overrides: Partial<BackupConfig> = {}): BackupConfig {
  return {
    projectId: 'test-project',
    languages: ['en'],
    namespaces: ['frontend'],
    version: 'latest',
    locizeApiUrl: 'https://api.locize.app',
    requestTimeoutSeconds: 30,
    storageType: 'local',
    awsRegion: 'us-east-1',
    maxRetries: 3,
    retryDelaySeconds: 5,
    rateLimitDelaySeconds: 1,
    cleanupLocalFiles: false,
    backupDir: '/tmp/locize-backup-test',
    logLevel: LogLevel.INFO,
    ...overrides,
  };
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'locize-backup-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
