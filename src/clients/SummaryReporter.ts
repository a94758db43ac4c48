import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { BackupConfig } from '../interfaces/BackupConfig';
import { RunResult } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { S3Client } from '../interfaces/S3Client';
import {
  SummaryRecord,
  SummaryReporter as ISummaryReporter,
} from '../interfaces/SummaryReporter';
import { summaryFileName } from './BackupGate';
import { createUploadMetadata } from './S3Client';
import { formatError } from '../utils/retry';
import { formatBackupDate } from '../utils/timestamp';
import { TOOL_NAME, TOOL_VERSION } from '../version';

export const SUMMARIES_DIR = 'summaries';

export class SummaryDeliveryError extends Error {
  constructor(
    message: string,
    public readonly target: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'SummaryDeliveryError';
  }
}

/**
 * successful * 100 / total, rounded to two decimals; 0 when nothing ran
 */
export function calculateSuccessRate(successful: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Math.round((successful * 10000) / total) / 100;
}

export function buildSummaryRecord(result: RunResult, config: BackupConfig): SummaryRecord {
  const record: SummaryRecord = {
    timestamp: result.timestamp,
    run_id: result.runId,
    project_id: config.projectId,
    version: config.version,
    backup_date: formatBackupDate(result.completedAt),
    total_combinations: result.totalCombinations,
    successful: result.successful,
    failed: result.failed,
    success_rate: calculateSuccessRate(result.successful, result.totalCombinations),
    failed_combinations: [...result.failedCombinations],
    duration_ms: result.durationMs,
    storage_type: config.storageType,
    backup_method: 'locize-api',
    tool_version: `${TOOL_NAME}/${TOOL_VERSION}`,
  };

  if (config.storageType === 's3') {
    record.s3_bucket = config.s3Bucket;
  } else {
    record.local_backup_path = config.backupDir;
  }

  return record;
}

export class SummaryReporter implements ISummaryReporter {
  constructor(
    private readonly config: BackupConfig,
    private readonly logger: Logger,
    private readonly s3Client: S3Client | null,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Persist the summary locally and, in S3 mode, upload it. Delivery
   * problems are logged and never thrown.
   */
  async report(result: RunResult): Promise<SummaryRecord> {
    const record = buildSummaryRecord(result, this.config);
    const fileName = summaryFileName(result.timestamp);
    const summariesDir = join(this.config.backupDir, SUMMARIES_DIR);
    const localPath = join(summariesDir, fileName);

    try {
      await mkdir(summariesDir, { recursive: true });
      await writeFile(localPath, `${JSON.stringify(record, null, 2)}\n`, 'utf8');
    } catch (error) {
      const deliveryError = new SummaryDeliveryError(
        `Failed to write summary report: ${localPath}`,
        localPath,
        error
      );
      this.logger.error(deliveryError.message, deliveryError, { error: formatError(error) });
      return record;
    }

    if (this.config.storageType !== 's3' || !this.s3Client) {
      this.logger.success(`Summary report created: ${localPath}`);
      return record;
    }

    const key = `${SUMMARIES_DIR}/${fileName}`;
    try {
      const location = await this.s3Client.uploadFile(
        localPath,
        key,
        createUploadMetadata(this.config.version, this.clock())
      );
      this.logger.success(`Summary report uploaded: ${location}`);
    } catch (error) {
      const deliveryError = new SummaryDeliveryError('Failed to upload summary report', key, error);
      this.logger.warn(deliveryError.message, { key, error: formatError(error) });
      return record;
    }

    // Only drop the local copy once the remote one is confirmed
    if (this.config.cleanupLocalFiles) {
      try {
        await rm(localPath, { force: true });
        this.logger.debug(`Removed local summary: ${localPath}`);
      } catch (error) {
        this.logger.warn('Failed to remove local summary report', {
          path: localPath,
          error: formatError(error),
        });
      }
    }

    return record;
  }
}
