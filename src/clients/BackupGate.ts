import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { GateDecision, LatestSummary } from '../interfaces/BackupGate';
import { Logger } from '../interfaces/Logger';
import { formatError } from '../utils/retry';
import { parseRunTimestamp } from '../utils/timestamp';

/** Minimum time between two scheduled backups */
export const BACKUP_INTERVAL_SECONDS = 24 * 60 * 60;

const SUMMARY_FILE_PATTERN = /^backup-summary-\d{8}-\d{6}\.json$/;

export function summaryFileName(timestamp: string): string {
  return `backup-summary-${timestamp}.json`;
}

// fs errors may come from another realm (vm contexts), so no instanceof here
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Locate the newest summary. File names embed the record timestamp
 * (YYYYMMDD-HHMMSS), so lexical order is chronological order.
 */
export async function findLatestSummary(summariesDir: string): Promise<LatestSummary | null> {
  let entries: string[];
  try {
    entries = await readdir(summariesDir);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }

  const candidates = entries.filter(name => SUMMARY_FILE_PATTERN.test(name)).sort();
  const fileName = candidates[candidates.length - 1];
  if (fileName === undefined) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(await readFile(join(summariesDir, fileName), 'utf8'));
    const timestamp =
      typeof parsed === 'object' && parsed !== null && 'timestamp' in parsed
        ? parsed.timestamp
        : undefined;
    return { fileName, timestamp };
  } catch (error) {
    return { fileName, timestamp: undefined, readError: formatError(error) };
  }
}

/**
 * Decide whether a run may start, given the newest summary and the current time
 */
export function evaluateBackupGate(
  latest: LatestSummary | null,
  now: Date,
  force: boolean
): GateDecision {
  if (!latest) {
    return { action: 'proceed', reason: 'no-previous-backup' };
  }

  const lastBackup = parseRunTimestamp(latest.timestamp);
  if (!lastBackup) {
    return { action: 'proceed', reason: 'unreadable-timestamp' };
  }

  const elapsedSeconds = Math.floor((now.getTime() - lastBackup.getTime()) / 1000);
  const hoursSinceLastBackup = Math.floor(elapsedSeconds / 3600);

  if (elapsedSeconds >= BACKUP_INTERVAL_SECONDS) {
    return { action: 'proceed', reason: 'threshold-elapsed', hoursSinceLastBackup };
  }

  if (force) {
    return { action: 'proceed', reason: 'forced', hoursSinceLastBackup };
  }

  return {
    action: 'skip',
    hoursSinceLastBackup,
    remainingHours: BACKUP_INTERVAL_SECONDS / 3600 - hoursSinceLastBackup,
  };
}

/**
 * Reads the summaries directory and logs the gate decision
 */
export class BackupGate {
  constructor(
    private readonly summariesDir: string,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async check(force: boolean): Promise<GateDecision> {
    let latest: LatestSummary | null;
    try {
      latest = await findLatestSummary(this.summariesDir);
    } catch (error) {
      this.logger.warn('Could not read backup summaries, proceeding with backup', {
        summariesDir: this.summariesDir,
        error: formatError(error),
      });
      return { action: 'proceed', reason: 'no-previous-backup' };
    }

    const decision = evaluateBackupGate(latest, this.clock(), force);

    switch (decision.action) {
      case 'skip':
        this.logger.info(
          `Last backup was performed ${decision.hoursSinceLastBackup} hours ago (less than 24 hours)`
        );
        this.logger.info('Backup already performed within the last 24 hours');
        this.logger.info(
          `Next backup can be performed in approximately ${decision.remainingHours} hours`
        );
        this.logger.info('Use --force flag to override this check');
        break;
      case 'proceed':
        this.logProceed(decision, latest);
        break;
    }

    return decision;
  }

  private logProceed(
    decision: Extract<GateDecision, { action: 'proceed' }>,
    latest: LatestSummary | null
  ): void {
    switch (decision.reason) {
      case 'no-previous-backup':
        this.logger.debug('No previous backup summaries found, proceeding with backup');
        break;
      case 'unreadable-timestamp':
        this.logger.warn('Could not parse timestamp from latest summary, proceeding with backup', {
          summary: latest?.fileName,
          timestamp: latest?.timestamp,
          ...(latest?.readError ? { error: latest.readError } : {}),
        });
        break;
      case 'forced':
        this.logger.info(
          `Last backup was performed ${decision.hoursSinceLastBackup} hours ago (less than 24 hours)`
        );
        this.logger.info('Force mode enabled, proceeding with backup despite recent execution');
        break;
      case 'threshold-elapsed':
        this.logger.info(
          `Last backup was ${decision.hoursSinceLastBackup} hours ago, proceeding with new backup`
        );
        break;
    }
  }
}
