import { StorageType } from './BackupConfig';
import { RunResult } from './BackupManager';

/**
 * Durable JSON record describing one run. Keys are persisted as-is.
 */
export interface SummaryRecord {
  timestamp: string;
  run_id: string;
  project_id: string;
  version: string;
  backup_date: string;
  total_combinations: number;
  successful: number;
  failed: number;
  success_rate: number;
  failed_combinations: string[];
  duration_ms: number;
  storage_type: StorageType;
  s3_bucket?: string;
  local_backup_path?: string;
  backup_method: string;
  tool_version: string;
}

export interface SummaryReporter {
  /** Build, persist and (in S3 mode) upload the summary of a run */
  report(result: RunResult): Promise<SummaryRecord>;
}
