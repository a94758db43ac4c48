/**
 * Result of a complete backup run
 */
export interface RunResult {
  /** Run start in YYYYMMDD-HHMMSS (UTC), embedded in every artifact name */
  timestamp: string;

  /** Unique identifier of the run */
  runId: string;

  /** |languages| x |namespaces| */
  totalCombinations: number;

  successful: number;

  failed: number;

  /** Failed pairs as "language/namespace", in processing order */
  failedCombinations: string[];

  startedAt: Date;

  completedAt: Date;

  /** Duration of the run in milliseconds */
  durationMs: number;
}

/**
 * Interface for the backup run orchestrator
 */
export interface BackupManager {
  /** Process every configured pair and return the aggregate result */
  executeBackup(): Promise<RunResult>;

  /** Check that the local and remote storage targets are usable */
  validateDependencies(): Promise<void>;

  /** Remove the working directory of the current run, keeping summaries */
  cleanupWorkingDirectory(): Promise<void>;
}
