import { mkdir, access, rm } from 'fs/promises';
import { constants } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { BackupManager as IBackupManager, RunResult } from '../interfaces/BackupManager';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { S3Client } from '../interfaces/S3Client';
import { TranslationFetcher } from '../interfaces/TranslationFetcher';
import { createUploadMetadata } from './S3Client';
import { SUMMARIES_DIR } from './SummaryReporter';
import { formatError, sleep as defaultSleep } from '../utils/retry';
import { formatDatePath, formatRunTimestamp } from '../utils/timestamp';

/**
 * A required collaborator (storage target) is unusable; raised before any work starts
 */
export class DependencyError extends Error {
  constructor(
    message: string,
    public readonly dependency: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DependencyError';
  }
}

export interface BackupPair {
  language: string;
  namespace: string;
}

/**
 * Running totals of a backup run, replaced (never mutated) after each pair
 */
export interface RunAccumulator {
  successful: number;
  failed: number;
  failedCombinations: string[];
}

export interface BackupManagerDependencies {
  fetcher: TranslationFetcher;
  s3Client: S3Client | null;
  logger: Logger;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Every (language, namespace) pair, languages outermost, in configuration order
 */
export function buildPairs(languages: string[], namespaces: string[]): BackupPair[] {
  return languages.flatMap(language => namespaces.map(namespace => ({ language, namespace })));
}

export function backupFileName(pair: BackupPair, timestamp: string): string {
  return `i18n-${pair.namespace}-${pair.language}-${timestamp}.json`;
}

export function recordOutcome(
  accumulator: RunAccumulator,
  pair: BackupPair,
  succeeded: boolean
): RunAccumulator {
  if (succeeded) {
    return { ...accumulator, successful: accumulator.successful + 1 };
  }
  return {
    successful: accumulator.successful,
    failed: accumulator.failed + 1,
    failedCombinations: [...accumulator.failedCombinations, `${pair.language}/${pair.namespace}`],
  };
}

/**
 * BackupManager implementation that orchestrates a complete backup run:
 * downloads every pair, uploads it when S3 is configured and cleans up
 * the working directory
 */
export class BackupManager implements IBackupManager {
  private readonly fetcher: TranslationFetcher;
  private readonly s3Client: S3Client | null;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private dailyDir: string | null = null;

  constructor(
    private readonly config: BackupConfig,
    dependencies: BackupManagerDependencies
  ) {
    this.fetcher = dependencies.fetcher;
    this.s3Client = dependencies.s3Client;
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? (() => new Date());
    this.sleep = dependencies.sleep ?? defaultSleep;
  }

  /**
   * Pre-flight: the backup directory must be writable and, in S3 mode,
   * the bucket reachable
   */
  async validateDependencies(): Promise<void> {
    const { backupDir } = this.config;

    try {
      await mkdir(backupDir, { recursive: true });
      await access(backupDir, constants.W_OK);
    } catch (error) {
      throw new DependencyError(
        `Backup directory is not writable: ${backupDir} (${formatError(error)})`,
        'backup-directory',
        error
      );
    }

    if (this.config.storageType === 's3') {
      if (!this.s3Client) {
        throw new DependencyError('S3 storage is configured but no S3 client is available', 's3');
      }
      const reachable = await this.s3Client.testConnection();
      if (!reachable) {
        throw new DependencyError(`S3 bucket is not reachable: s3://${this.config.s3Bucket}`, 's3');
      }
      this.logger.debug('S3 storage mode enabled');
    } else {
      this.logger.debug('Local storage mode enabled');
    }

    this.logger.debug('All required dependencies are available');
  }

  async executeBackup(): Promise<RunResult> {
    const startedAt = this.clock();
    const timestamp = formatRunTimestamp(startedAt);
    const runId = uuidv4();
    const dailyDir = await this.setupBackupDir(startedAt);
    const pairs = buildPairs(this.config.languages, this.config.namespaces);

    this.logger.info('Starting backup process', { runId, timestamp });
    this.logger.info(`Project ID: ${this.config.projectId}`);
    this.logger.info(`Version: ${this.config.version}`);
    this.logger.info(`Languages: ${this.config.languages.join(' ')}`);
    this.logger.info(`Namespaces: ${this.config.namespaces.join(' ')}`);
    this.logger.info(`Total combinations: ${pairs.length}`);
    this.logger.info(
      this.s3Client
        ? `Storage: S3 bucket s3://${this.config.s3Bucket}`
        : `Storage: Local directory ${this.config.backupDir}`
    );

    let accumulator: RunAccumulator = { successful: 0, failed: 0, failedCombinations: [] };

    for (const [index, pair] of pairs.entries()) {
      const succeeded = await this.processPair(pair, dailyDir, timestamp);
      accumulator = recordOutcome(accumulator, pair, succeeded);

      if (index < pairs.length - 1) {
        await this.sleep(this.config.rateLimitDelaySeconds * 1000);
      }
    }

    this.logger.info('Backup process completed');
    this.logger.logRunSummary(
      pairs.length,
      accumulator.successful,
      accumulator.failed,
      accumulator.failedCombinations
    );

    if (this.config.cleanupLocalFiles && accumulator.successful > 0) {
      this.logger.info('Cleaning up local files...');
      await this.cleanupWorkingDirectory();
    }

    const completedAt = this.clock();
    return {
      timestamp,
      runId,
      totalCombinations: pairs.length,
      successful: accumulator.successful,
      failed: accumulator.failed,
      failedCombinations: accumulator.failedCombinations,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };
  }

  /**
   * Remove this run's daily directory; the summaries directory is a sibling
   * of the date tree and is never touched
   */
  async cleanupWorkingDirectory(): Promise<void> {
    if (!this.dailyDir) {
      return;
    }
    await rm(this.dailyDir, { recursive: true, force: true });
    this.logger.debug(`Local backup files cleaned up (summaries preserved): ${this.dailyDir}`);
  }

  private async setupBackupDir(startedAt: Date): Promise<string> {
    const dailyDir = join(this.config.backupDir, formatDatePath(startedAt));
    await mkdir(dailyDir, { recursive: true });
    await mkdir(join(this.config.backupDir, SUMMARIES_DIR), { recursive: true });
    this.logger.debug(`Using daily backup directory: ${dailyDir}`);
    this.dailyDir = dailyDir;
    return dailyDir;
  }

  private async processPair(pair: BackupPair, dailyDir: string, timestamp: string): Promise<boolean> {
    const { language, namespace } = pair;
    const fileName = backupFileName(pair, timestamp);
    const localPath = join(dailyDir, fileName);

    this.logger.info(`Processing: ${language}/${namespace}`);

    const fetched = await this.fetcher.fetch(language, namespace, localPath);
    if (!fetched.success) {
      this.logger.logPairFailure(language, namespace, fetched.error);
      return false;
    }

    if (!this.s3Client) {
      this.logger.logPairComplete(language, namespace, localPath);
      return true;
    }

    const now = this.clock();
    const key = `${formatDatePath(now)}/${fileName}`;
    try {
      const location = await this.s3Client.uploadFile(
        localPath,
        key,
        createUploadMetadata(this.config.version, now)
      );
      this.logger.logPairComplete(language, namespace, location);
      return true;
    } catch (error) {
      this.logger.logPairFailure(language, namespace, formatError(error));
      return false;
    }
  }
}
